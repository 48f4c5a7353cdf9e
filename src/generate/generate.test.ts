import { describe, test, expect } from "vitest";
import { createPathConfig } from "#/config";
import type { EngineContext } from "#/core";
import { ConfigurationError, DependencyUnresolvableError } from "#/errors";
import {
  createFakePlatformClients,
  curseforgeRecord,
  downloadResponses,
  modrinthRecord,
} from "#/test-utils/fakes";
import {
  createMockFileSystem,
  createMockHttpClient,
  createMockLogger,
  createMockTokenProvider,
} from "#/test-utils/mocks";
import type { VersionRecord } from "#/platform";
import { generateModpack, runGenerate } from "./generate";

const PACK_YAML = `# test pack
name: Test Pack
author: tester
version: "1.0.0"
minecraftVersion: "1.20.1"
modLoader:
  id: fabric
  version: "0.15.11"
mods:
  curseforge:
    jei:
      projectId: 100
      versionId: 200
  modrinth:
    sodium:
      projectId: AANobbMI
      versionId: s1
`;

const jei = curseforgeRecord(100, 200, { name: "JEI", side: { client: "required", server: "unsupported" } });
const sodium = modrinthRecord("AANobbMI", "s1", {
  name: "Sodium",
  dependencies: [{ platform: "modrinth", projectId: "P7dR8mSH", kind: "required" }],
});
const fabricApi = modrinthRecord("P7dR8mSH", "f1", { name: "Fabric API" });

function setup(options: { yaml?: string; apiKeys?: { curseforge?: string }; records?: VersionRecord[] } = {}) {
  const records = options.records ?? [jei, sodium, fabricApi];
  const fs = createMockFileSystem({
    "/pack/modpack.yaml": options.yaml ?? PACK_YAML,
    "/pack/overrides/config/a.toml": "common",
  });
  const http = createMockHttpClient(downloadResponses(records));
  const logger = createMockLogger();
  const clients = createFakePlatformClients();
  for (const record of records) {
    if (record.id.platform === "curseforge") {
      clients.curseforge.add(record);
    } else {
      clients.modrinth.add(record);
    }
  }
  const ctx: EngineContext = {
    fs,
    http,
    tokens: createMockTokenProvider(options.apiKeys ?? { curseforge: "test-secret" }),
    logger,
    paths: createPathConfig("/pack", "/cache"),
  };
  return { fs, http, logger, clients, ctx };
}

describe("generate", () => {
  describe("generateModpack", () => {
    test("validates without writing anything when no output is requested", async () => {
      const { fs, http, clients, ctx } = setup();
      const before = [...fs.files.keys()];

      const result = await generateModpack(ctx, { clients });

      expect(result.validationOnly).toBe(true);
      expect(result.outputs).toEqual([]);
      expect(result.resolved.mods.map((m) => m.key)).toEqual(["fabric_api", "jei", "sodium"]);
      expect([...fs.files.keys()]).toEqual(before);
      expect(http.calls).toEqual([]);
    });

    test("a lone mod without dependencies keeps the side its platform reports", async () => {
      const yaml = PACK_YAML.split("  modrinth:")[0] ?? "";
      const { clients, ctx } = setup({ yaml, records: [jei] });

      const result = await generateModpack(ctx, { clients });

      expect(result.resolved.mods).toHaveLength(1);
      expect(result.resolved.mods[0]?.side).toEqual({ client: "required", server: "unsupported" });
    });

    test("writes every requested output", async () => {
      const { fs, clients, ctx } = setup();

      const result = await generateModpack(ctx, {
        clients,
        outputs: { curseforge: "/out", modrinth: "/out", server: "/srv" },
      });

      expect(result.outputs).toEqual([
        { format: "curseforge", path: "/out/Test Pack (1.0.0).zip" },
        { format: "modrinth", path: "/out/Test Pack (1.0.0).mrpack" },
        { format: "server", path: "/srv" },
      ]);
      expect(fs.exists("/out/Test Pack (1.0.0).zip")).toBe(true);
      expect(fs.exists("/out/Test Pack (1.0.0).mrpack")).toBe(true);
      expect(fs.readFile("/srv/config/a.toml")).toBe("common");
    });

    test("shares one download between outputs", async () => {
      const { http, clients, ctx } = setup();

      await generateModpack(ctx, { clients, outputs: { curseforge: "/out", server: "/srv" } });

      expect(http.callCount(sodium.downloadUrl ?? "")).toBe(1);
    });

    test("requires a CurseForge API key before any network access", async () => {
      const { clients, ctx } = setup({ apiKeys: {} });

      await expect(generateModpack(ctx, { clients })).rejects.toThrow(
        new ConfigurationError(
          "CurseForge mods are configured but no CurseForge API key is available (set CURSEFORGE_API_KEY)",
          ["mods.curseforge.jei"]
        )
      );
      expect(clients.curseforge.calls).toEqual([]);
      expect(clients.modrinth.calls).toEqual([]);
    });

    test("reports schema problems per field", async () => {
      const { clients, ctx } = setup({ yaml: PACK_YAML.replace("author: tester\n", "") });

      const err = await generateModpack(ctx, { clients }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err instanceof ConfigurationError ? err.details : []).toEqual(["author: Required"]);
    });

    test("fails when a required dependency is missing", async () => {
      const { clients, ctx } = setup({ records: [jei, sodium] });

      await expect(generateModpack(ctx, { clients })).rejects.toBeInstanceOf(DependencyUnresolvableError);
    });
  });

  describe("runGenerate", () => {
    test("returns 0 for a successful validation-only run", async () => {
      const { clients, ctx } = setup();

      expect(await runGenerate(ctx, { clients })).toBe(0);
    });

    test("returns 1 and logs the error on failure", async () => {
      const { logger, clients, ctx } = setup({ records: [jei, sodium] });

      const code = await runGenerate(ctx, { clients });

      expect(code).toBe(1);
      expect(logger.messages("error")).toEqual([
        "Mod sodium requires modrinth project P7dR8mSH, which could not be resolved: P7dR8mSH has no version for 1.20.1",
      ]);
    });

    test("returns 1 for malformed YAML", async () => {
      const { logger, clients, ctx } = setup({ yaml: "name: [unclosed\n" });

      const code = await runGenerate(ctx, { clients });

      expect(code).toBe(1);
      expect(logger.messages("error")[0]).toMatch(/^Invalid YAML syntax in \/pack\/modpack\.yaml/);
    });
  });
});
