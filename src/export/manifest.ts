/**
 * Output manifest shapes and builders
 */

import type { ResolvedMod, SideRequirement } from "#/mods";
import type { ModLoaderType, PackMetadata } from "#/schemas";
import { OVERRIDES_DIR } from "#/constants";

export interface CurseForgeManifestFile {
  projectID: number;
  fileID: number;
  required: boolean;
}

export interface CurseForgeManifest {
  minecraft: {
    version: string;
    modLoaders: Array<{ id: string; primary: boolean }>;
  };
  manifestType: "minecraftModpack";
  manifestVersion: 1;
  name: string;
  version: string;
  author: string;
  files: CurseForgeManifestFile[];
  overrides: string;
}

export interface ModrinthIndexFile {
  path: string;
  hashes: { sha1: string; sha512: string };
  env: { client: SideRequirement; server: SideRequirement };
  downloads: string[];
  fileSize: number;
}

export type ModrinthLoaderDependency = "forge" | "neoforge" | "fabric-loader" | "quilt-loader";

export interface ModrinthIndex {
  formatVersion: 1;
  game: "minecraft";
  versionId: string;
  name: string;
  summary: string;
  files: ModrinthIndexFile[];
  dependencies: { minecraft: string } & Partial<Record<ModrinthLoaderDependency, string>>;
}

export interface ModloaderReference {
  minecraftVersion: string;
  loader: ModLoaderType;
  loaderVersion: string;
  /** Installer jar (Forge, NeoForge) or server launch profile (Fabric, Quilt) */
  installerUrl: string;
}

const MODRINTH_LOADER_KEYS: Record<ModLoaderType, ModrinthLoaderDependency> = {
  forge: "forge",
  neoforge: "neoforge",
  fabric: "fabric-loader",
  quilt: "quilt-loader",
};

export function curseForgeManifest(pack: PackMetadata, files: CurseForgeManifestFile[]): CurseForgeManifest {
  return {
    minecraft: {
      version: pack.minecraftVersion,
      modLoaders: [{ id: `${pack.modLoader.id}-${pack.modLoader.version}`, primary: true }],
    },
    manifestType: "minecraftModpack",
    manifestVersion: 1,
    name: pack.name,
    version: pack.version,
    author: pack.author,
    files,
    overrides: OVERRIDES_DIR,
  };
}

export function curseForgeManifestFile(mod: ResolvedMod): CurseForgeManifestFile | undefined {
  if (mod.id.platform !== "curseforge") return undefined;
  return { projectID: mod.id.projectId, fileID: mod.id.versionId, required: true };
}

export function modrinthIndex(pack: PackMetadata, files: ModrinthIndexFile[]): ModrinthIndex {
  const dependencies: ModrinthIndex["dependencies"] = { minecraft: pack.minecraftVersion };
  dependencies[MODRINTH_LOADER_KEYS[pack.modLoader.id]] = pack.modLoader.version;

  return {
    formatVersion: 1,
    game: "minecraft",
    versionId: pack.version,
    name: pack.name,
    summary: pack.description,
    files,
    dependencies,
  };
}

/**
 * Where a server for this loader gets its launcher.
 *
 * @example installerUrl("fabric", "1.20.1", "0.15.11") → "https://meta.fabricmc.net/v2/versions/loader/1.20.1/0.15.11/server/json"
 */
export function installerUrl(loader: ModLoaderType, minecraftVersion: string, loaderVersion: string): string {
  switch (loader) {
    case "forge":
      return `https://maven.minecraftforge.net/net/minecraftforge/forge/${minecraftVersion}-${loaderVersion}/forge-${minecraftVersion}-${loaderVersion}-installer.jar`;
    case "neoforge":
      return `https://maven.neoforged.net/releases/net/neoforged/neoforge/${loaderVersion}/neoforge-${loaderVersion}-installer.jar`;
    case "fabric":
      return `https://meta.fabricmc.net/v2/versions/loader/${minecraftVersion}/${loaderVersion}/server/json`;
    case "quilt":
      return `https://meta.quiltmc.org/v3/versions/loader/${minecraftVersion}/${loaderVersion}/server/json`;
  }
}

export function modloaderReference(pack: PackMetadata): ModloaderReference {
  return {
    minecraftVersion: pack.minecraftVersion,
    loader: pack.modLoader.id,
    loaderVersion: pack.modLoader.version,
    installerUrl: installerUrl(pack.modLoader.id, pack.minecraftVersion, pack.modLoader.version),
  };
}

export function toJson(value: unknown): Buffer {
  return Buffer.from(`${JSON.stringify(value, null, 2)}\n`);
}
