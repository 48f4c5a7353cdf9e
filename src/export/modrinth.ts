/**
 * Modrinth .mrpack
 *
 * modrinth.index.json lists every Modrinth mod, direct or transitive, with
 * its download URL, hashes and per-side env. CurseForge files cannot be
 * referenced by URL in this format, so they are bundled into the override
 * folder matching their sides.
 */

import { join, posix } from "path";
import {
  CLIENT_OVERRIDES_DIR,
  MODRINTH_MANIFEST_FILE,
  MODS_DIR,
  OVERRIDES_DIR,
  SERVER_OVERRIDES_DIR,
} from "#/constants";
import { ConfigurationError } from "#/errors";
import { includedOnSide, type ResolvedMod } from "#/mods";
import { OVERRIDE_DIRS } from "#/overrides";
import { addModFile, addOverrideTree, materializeMods } from "./assemble";
import type { ExportContext, ExportInput, ExportOptions, ExportResult } from "./export.types";
import { OutputLayout, writeZipAtomically } from "./layout";
import { modrinthIndex, toJson, type ModrinthIndexFile } from "./manifest";

export function modrinthPackName(input: Pick<ExportInput, "pack">): string {
  return `${input.pack.name} (${input.pack.version}).mrpack`;
}

/**
 * Override folder for a bundled file, or undefined when neither side wants it.
 */
export function bundleDirFor(mod: ResolvedMod, includeOptional: boolean): string | undefined {
  const client = includedOnSide(mod.side, "client", includeOptional);
  const server = includedOnSide(mod.side, "server", includeOptional);
  if (client && server) return OVERRIDES_DIR;
  if (client) return CLIENT_OVERRIDES_DIR;
  if (server) return SERVER_OVERRIDES_DIR;
  return undefined;
}

function isInstalled(mod: ResolvedMod): boolean {
  return mod.side.client !== "unsupported" || mod.side.server !== "unsupported";
}

async function indexFile(ctx: ExportContext, mod: ResolvedMod): Promise<ModrinthIndexFile> {
  const record = mod.version;
  if (!record.downloadUrl) {
    throw new ConfigurationError(`Mod ${mod.key}: ${record.fileName} has no download URL`);
  }

  let { sha1, sha512 } = record.hashes;
  if (!sha1 || !sha512) {
    const artifact = await ctx.cache.materialize(record, mod.key);
    sha1 = artifact.hashes.sha1;
    sha512 = artifact.hashes.sha512;
  }

  return {
    path: posix.join(MODS_DIR, record.fileName),
    hashes: { sha1, sha512 },
    env: { client: mod.side.client, server: mod.side.server },
    downloads: [record.downloadUrl],
    fileSize: record.fileSize,
  };
}

export async function exportModrinthPack(
  ctx: ExportContext,
  input: ExportInput,
  outputDir: string,
  options: ExportOptions = {}
): Promise<ExportResult> {
  const outputPath = join(outputDir, modrinthPackName(input));
  ctx.logger.info(`Creating Modrinth pack at '${outputPath}'...`);

  const includeOptional = options.includeOptional ?? true;
  const layout = new OutputLayout();

  const indexed = input.resolved.mods.filter((mod) => mod.id.platform === "modrinth" && isInstalled(mod));
  const files = await Promise.all(indexed.map((mod) => indexFile(ctx, mod)));
  for (const mod of indexed) {
    // Launchers install these into mods/, where bundled files land too
    for (const dir of [OVERRIDES_DIR, CLIENT_OVERRIDES_DIR, SERVER_OVERRIDES_DIR]) {
      layout.reserve(posix.join(dir, MODS_DIR, mod.version.fileName), `mod ${mod.key}`);
    }
  }

  const bundled: Array<{ mod: ResolvedMod; dir: string }> = [];
  for (const mod of input.resolved.mods) {
    if (mod.id.platform !== "curseforge") continue;
    const dir = bundleDirFor(mod, includeOptional);
    if (dir) {
      bundled.push({ mod, dir });
    }
  }

  const artifacts = await materializeMods(ctx, bundled.map(({ mod }) => mod));
  for (const { mod, dir } of bundled) {
    addModFile(ctx, layout, posix.join(dir, MODS_DIR), mod, artifacts);
  }

  addOverrideTree(ctx, layout, input.overrides.common, OVERRIDE_DIRS.common, "override");
  addOverrideTree(ctx, layout, input.overrides.client, OVERRIDE_DIRS.client, "client override");
  addOverrideTree(ctx, layout, input.overrides.server, OVERRIDE_DIRS.server, "server override");
  layout.add(MODRINTH_MANIFEST_FILE, "index", () => toJson(modrinthIndex(input.pack, files)));

  await writeZipAtomically(ctx.fs, outputPath, layout);

  ctx.logger.info(`Created Modrinth pack at '${outputPath}'.`);
  return { format: "modrinth", path: outputPath };
}
