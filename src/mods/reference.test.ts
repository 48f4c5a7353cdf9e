import { describe, test, expect } from "vitest";
import { ConfigurationError } from "#/errors";
import { PackConfigSchema, type PackConfigInput } from "#/schemas";
import { buildModReferences, compareKeys, describeModId, projectKey } from "./reference";

function config(mods: PackConfigInput["mods"]) {
  return PackConfigSchema.parse({
    name: "Test Pack",
    author: "tester",
    version: "1.0.0",
    minecraftVersion: "1.20.1",
    modLoader: { id: "fabric", version: "0.15.11" },
    mods,
  });
}

describe("reference", () => {
  describe("buildModReferences", () => {
    test("returns references from both sections sorted by key", () => {
      const references = buildModReferences(
        config({
          modrinth: { sodium: { projectId: "AANobbMI", versionId: "s1", side: "client" } },
          curseforge: { jei: { projectId: 238222, versionId: 4712866 } },
        })
      );

      expect(references.map((r) => r.key)).toEqual(["jei", "sodium"]);
      expect(references[0]?.id).toEqual({ platform: "curseforge", projectId: 238222, versionId: 4712866 });
      expect(references[1]?.sideOverride).toEqual({ client: "required", server: "unsupported" });
      expect(references[0]?.sideOverride).toBeUndefined();
    });

    test("splits ignored dependencies into projects and versions", () => {
      const [reference] = buildModReferences(
        config({
          modrinth: {
            sodium: {
              projectId: "AANobbMI",
              versionId: "s1",
              ignoredDeps: ["P7dR8mSH", { projectId: "ZOOM" }, { versionId: "v9" }],
            },
          },
        })
      );

      expect([...(reference?.ignoredProjects ?? [])]).toEqual(["P7dR8mSH", "ZOOM"]);
      expect([...(reference?.ignoredVersions ?? [])]).toEqual(["v9"]);
    });

    test("rejects a key used on both platforms", () => {
      expect(() =>
        buildModReferences(
          config({
            curseforge: { jei: { projectId: 1, versionId: 2 } },
            modrinth: { jei: { projectId: "u6dRKJwZ", versionId: "j1" } },
          })
        )
      ).toThrow(
        new ConfigurationError("Invalid mod list", ['mods: key "jei" is used in both the curseforge and modrinth sections'])
      );
    });

    test("rejects two keys for the same project", () => {
      expect(() =>
        buildModReferences(
          config({
            modrinth: {
              sodium: { projectId: "AANobbMI", versionId: "s1" },
              sodium_again: { projectId: "AANobbMI", versionId: "s2" },
            },
          })
        )
      ).toThrow(
        new ConfigurationError("Invalid mod list", [
          'mods: "sodium" and "sodium_again" both reference modrinth project AANobbMI (version s2)',
        ])
      );
    });
  });

  describe("identifiers", () => {
    test("projectKey ignores the version", () => {
      expect(projectKey({ platform: "curseforge", projectId: 238222, versionId: 1 })).toBe("curseforge:238222");
    });

    test("describeModId mentions the version only when present", () => {
      expect(describeModId({ platform: "modrinth", projectId: "AANobbMI" })).toBe("modrinth project AANobbMI");
      expect(describeModId({ platform: "curseforge", projectId: 1, versionId: 2 })).toBe("curseforge project 1 (version 2)");
    });
  });

  test("compareKeys orders by code unit", () => {
    expect(["b", "B", "a", "_"].sort(compareKeys)).toEqual(["B", "_", "a", "b"]);
  });
});
