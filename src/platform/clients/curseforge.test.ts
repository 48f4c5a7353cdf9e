import { describe, test, expect } from "vitest";
import { createLimiter } from "#/core";
import { ConfigurationError, UnexpectedResponseError } from "#/errors";
import { createMockHttpClient, createMockLogger, jsonResponse } from "#/test-utils/mocks";
import { CurseForgeClient, sideHintFromGameVersions } from "./curseforge";

const BASE = "https://cf.test/v1";

function apiFile(overrides: Record<string, unknown> = {}) {
  return {
    id: 4712866,
    modId: 238222,
    displayName: "JEI 15.2.0",
    fileName: "jei-1.20.1-fabric-15.2.0.jar",
    fileLength: 1234,
    fileDate: "2023-10-01T00:00:00Z",
    downloadUrl: "https://edge.test/files/jei.jar",
    hashes: [
      { value: "ABCDEF", algo: 1 },
      { value: "123456", algo: 2 },
    ],
    gameVersions: ["1.20.1", "Fabric", "Client"],
    dependencies: [
      { modId: 306612, relationType: 3 },
      { modId: 111, relationType: 2 },
      { modId: 222, relationType: 5 },
      { modId: 333, relationType: 1 },
    ],
    ...overrides,
  };
}

const MOD = { data: { id: 238222, name: "Just Enough Items (JEI)", allowModDistribution: true } };

function client(responses: Map<string, Response>, apiKey: string | undefined = "test-secret", attempts = 1) {
  const http = createMockHttpClient(responses);
  const cf = new CurseForgeClient({
    http,
    apiKey,
    retry: { attempts, delayMs: 0 },
    limiter: createLimiter(4),
    logger: createMockLogger(),
    baseUrl: BASE,
  });
  return { http, cf };
}

describe("CurseForgeClient", () => {
  test("maps a file into a version record", async () => {
    const { cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse(MOD)],
        [`${BASE}/mods/238222/files/4712866`, jsonResponse({ data: apiFile() })],
      ])
    );

    const lookup = await cf.fetchModVersion(238222, 4712866);

    expect(lookup).toEqual({
      found: true,
      record: {
        id: { platform: "curseforge", projectId: 238222, versionId: 4712866 },
        projectName: "Just Enough Items (JEI)",
        versionName: "JEI 15.2.0",
        fileName: "jei-1.20.1-fabric-15.2.0.jar",
        fileSize: 1234,
        downloadUrl: "https://edge.test/files/jei.jar",
        hashes: { sha1: "abcdef", md5: "123456" },
        dependencies: [
          { platform: "curseforge", projectId: 306612, kind: "required" },
          { platform: "curseforge", projectId: 111, kind: "optional" },
          { platform: "curseforge", projectId: 222, kind: "incompatible" },
        ],
        side: { client: "required", server: "unsupported" },
        gameVersions: ["1.20.1", "Fabric", "Client"],
        distributionAllowed: true,
      },
    });
  });

  test("sends the API key", async () => {
    const { http, cf } = client(new Map());
    let headers: RequestInit["headers"];
    const fetch = http.fetch.bind(http);
    http.fetch = async (url, init) => {
      headers = init?.headers;
      return fetch(url, init);
    };

    await cf.fetchModVersion(1, 2);

    expect(headers).toMatchObject({ "x-api-key": "test-secret" });
  });

  test("withheld files have no download URL and no distribution", async () => {
    const { cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse({ data: { ...MOD.data, allowModDistribution: false } })],
        [`${BASE}/mods/238222/files/4712866`, jsonResponse({ data: apiFile({ downloadUrl: null }) })],
      ])
    );

    const lookup = await cf.fetchModVersion(238222, 4712866);

    expect(lookup.found && lookup.record.downloadUrl).toBeNull();
    expect(lookup.found && lookup.record.distributionAllowed).toBe(false);
  });

  test("a malformed body fails once without retrying", async () => {
    const { http, cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse({ data: { id: 238222 } })],
        [`${BASE}/mods/238222/files/4712866`, jsonResponse({ data: apiFile() })],
      ]),
      "test-secret",
      3
    );

    const err = await cf.fetchModVersion(238222, 4712866).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(UnexpectedResponseError);
    expect(err instanceof UnexpectedResponseError && err.message).toBe(
      `Unexpected response from ${BASE}/mods/238222: data.name: Required`
    );
    expect(http.callCount(`${BASE}/mods/238222`)).toBe(1);
  });

  test("a missing project is not found", async () => {
    const { cf } = client(new Map());

    expect(await cf.fetchModVersion(238222, 4712866)).toEqual({
      found: false,
      reason: "CurseForge project 238222 does not exist",
    });
  });

  test("a file of another project is not found", async () => {
    const { cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse(MOD)],
        [`${BASE}/mods/238222/files/4712866`, jsonResponse({ data: apiFile({ modId: 999 }) })],
      ])
    );

    expect(await cf.fetchModVersion(238222, 4712866)).toEqual({
      found: false,
      reason: "CurseForge file 4712866 belongs to project 999, not 238222",
    });
  });

  test("latest version is the newest file for the game version", async () => {
    const { cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse(MOD)],
        [
          `${BASE}/mods/238222/files?gameVersion=1.20.1&modLoaderType=4`,
          jsonResponse({
            data: [
              apiFile({ id: 1, fileDate: "2023-01-01T00:00:00Z" }),
              apiFile({ id: 3, fileDate: "2023-03-01T00:00:00Z", gameVersions: ["1.19.2"] }),
              apiFile({ id: 2, fileDate: "2023-02-01T00:00:00Z" }),
            ],
          }),
        ],
      ])
    );

    const lookup = await cf.fetchLatestVersion(238222, { gameVersion: "1.20.1", loader: "fabric" });

    expect(lookup.found && lookup.record.id.versionId).toBe(2);
  });

  test("fetches project metadata once", async () => {
    const { http, cf } = client(
      new Map([
        [`${BASE}/mods/238222`, jsonResponse(MOD)],
        [`${BASE}/mods/238222/files/1`, jsonResponse({ data: apiFile({ id: 1 }) })],
        [`${BASE}/mods/238222/files/2`, jsonResponse({ data: apiFile({ id: 2 }) })],
      ])
    );

    await Promise.all([cf.fetchModVersion(238222, 1), cf.fetchModVersion(238222, 2)]);

    expect(http.callCount(`${BASE}/mods/238222`)).toBe(1);
  });

  test("requires an API key", async () => {
    const { http, cf } = client(new Map(), undefined);

    await expect(cf.fetchModVersion(1, 2)).rejects.toBeInstanceOf(ConfigurationError);
    expect(http.calls).toEqual([]);
  });

  describe("sideHintFromGameVersions", () => {
    test("reads the Client and Server tags", () => {
      expect(sideHintFromGameVersions(["1.20.1", "Server"])).toEqual({ client: "unsupported", server: "required" });
      expect(sideHintFromGameVersions(["1.20.1", "Client", "Server"])).toEqual({ client: "required", server: "required" });
      expect(sideHintFromGameVersions(["1.20.1"])).toBeUndefined();
    });
  });
});
