import { describe, test, expect } from "vitest";
import { TEST_PACK } from "#/test-utils/context";
import { curseforgeRecord, modrinthRecord, resolvedMod } from "#/test-utils/fakes";
import { curseForgeManifestFile, installerUrl, modrinthIndex } from "./manifest";

describe("manifest", () => {
  describe("installerUrl", () => {
    test("points each loader at its installer or server profile", () => {
      expect(installerUrl("forge", "1.20.1", "47.2.0")).toBe(
        "https://maven.minecraftforge.net/net/minecraftforge/forge/1.20.1-47.2.0/forge-1.20.1-47.2.0-installer.jar"
      );
      expect(installerUrl("neoforge", "1.20.4", "20.4.80")).toBe(
        "https://maven.neoforged.net/releases/net/neoforged/neoforge/20.4.80/neoforge-20.4.80-installer.jar"
      );
      expect(installerUrl("quilt", "1.20.1", "0.25.0")).toBe(
        "https://meta.quiltmc.org/v3/versions/loader/1.20.1/0.25.0/server/json"
      );
    });
  });

  describe("modrinthIndex", () => {
    test("names the loader dependency the way the format expects", () => {
      const index = modrinthIndex({ ...TEST_PACK, modLoader: { id: "quilt", version: "0.25.0" } }, []);

      expect(index.dependencies).toEqual({ minecraft: "1.20.1", "quilt-loader": "0.25.0" });
    });
  });

  describe("curseForgeManifestFile", () => {
    test("only CurseForge mods get a manifest line", () => {
      expect(curseForgeManifestFile(resolvedMod("jei", curseforgeRecord(100, 1000)))).toEqual({
        projectID: 100,
        fileID: 1000,
        required: true,
      });
      expect(curseForgeManifestFile(resolvedMod("sodium", modrinthRecord("AANobbMI", "s1")))).toBeUndefined();
    });
  });
});
