import { describe, test, expect } from "vitest";
import {
  CurseForgeModSchema,
  EngineSettingsSchema,
  ModKeySchema,
  ModrinthModSchema,
  PackConfigSchema,
  SideOverrideSchema,
} from "./index";

const basePack = {
  name: "Test Pack",
  author: "tester",
  version: "1.0.0",
  minecraftVersion: "1.20.1",
  modLoader: { id: "fabric", version: "0.15.11" },
};

describe("schemas", () => {
  describe("PackConfigSchema", () => {
    test("accepts a pack without mods", () => {
      const config = PackConfigSchema.parse(basePack);

      expect(config.mods).toEqual({ curseforge: {}, modrinth: {} });
      expect(config.description).toBe("");
    });

    test("rejects unknown loaders", () => {
      expect(PackConfigSchema.safeParse({ ...basePack, modLoader: { id: "rift", version: "1" } }).success).toBe(false);
    });

    test("rejects unknown top-level keys", () => {
      expect(PackConfigSchema.safeParse({ ...basePack, lockfile: true }).success).toBe(false);
    });

    test("rejects blank names", () => {
      expect(PackConfigSchema.safeParse({ ...basePack, name: "   " }).success).toBe(false);
    });
  });

  describe("CurseForgeModSchema", () => {
    test("requires positive 32-bit integer ids", () => {
      expect(CurseForgeModSchema.safeParse({ projectId: 238222, versionId: 4712866 }).success).toBe(true);
      expect(CurseForgeModSchema.safeParse({ projectId: "238222", versionId: 4712866 }).success).toBe(false);
      expect(CurseForgeModSchema.safeParse({ projectId: 0, versionId: 1 }).success).toBe(false);
      expect(CurseForgeModSchema.safeParse({ projectId: 2_147_483_648, versionId: 1 }).success).toBe(false);
    });

    test("defaults ignoredDeps to an empty list", () => {
      expect(CurseForgeModSchema.parse({ projectId: 1, versionId: 2 }).ignoredDeps).toEqual([]);
    });

    test("accepts bare, project and version ignore entries", () => {
      const mod = CurseForgeModSchema.parse({
        projectId: 1,
        versionId: 2,
        ignoredDeps: [3, { projectId: 4 }, { versionId: 5 }],
      });

      expect(mod.ignoredDeps).toEqual([3, { projectId: 4 }, { versionId: 5 }]);
    });
  });

  describe("ModrinthModSchema", () => {
    test("trims ids", () => {
      expect(ModrinthModSchema.parse({ projectId: " AANobbMI ", versionId: "s1" }).projectId).toBe("AANobbMI");
    });

    test("rejects empty ids", () => {
      expect(ModrinthModSchema.safeParse({ projectId: "", versionId: "s1" }).success).toBe(false);
    });
  });

  describe("SideOverrideSchema", () => {
    test("accepts shorthands and per-side objects", () => {
      expect(SideOverrideSchema.parse("client")).toBe("client");
      expect(SideOverrideSchema.parse({ server: "optional" })).toEqual({ server: "optional" });
    });

    test("rejects unknown sides", () => {
      expect(SideOverrideSchema.safeParse("desktop").success).toBe(false);
      expect(SideOverrideSchema.safeParse({ client: "maybe" }).success).toBe(false);
    });
  });

  describe("ModKeySchema", () => {
    test("accepts identifier-like keys", () => {
      expect(ModKeySchema.safeParse("fabric_api").success).toBe(true);
      expect(ModKeySchema.safeParse("jei-1.20").success).toBe(true);
    });

    test("rejects keys with spaces or leading punctuation", () => {
      expect(ModKeySchema.safeParse("fabric api").success).toBe(false);
      expect(ModKeySchema.safeParse("_hidden").success).toBe(false);
    });
  });

  describe("EngineSettingsSchema", () => {
    test("fills every default", () => {
      expect(EngineSettingsSchema.parse({})).toEqual({
        maxConcurrentRequests: 8,
        maxConcurrentDownloads: 5,
        retryAttempts: 3,
        retryDelayMs: 250,
      });
    });
  });
});
