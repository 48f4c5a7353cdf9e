/**
 * Helpers shared by the exporters
 */

import { posix } from "path";
import type { CachedArtifact } from "#/cache";
import { withFilesystem } from "#/errors";
import { includedOnSide, type GameSide, type ResolvedMod, type ResolvedPack } from "#/mods";
import { rawModFiles, readOverride, sortedEntries, type OverrideTree } from "#/overrides";
import type { ExportContext } from "./export.types";
import type { OutputLayout } from "./layout";

/**
 * Download (or reuse) every mod in `mods`, concurrently. Keyed by mod key.
 */
export async function materializeMods(
  ctx: ExportContext,
  mods: readonly ResolvedMod[]
): Promise<Map<string, CachedArtifact>> {
  const entries = await Promise.all(
    mods.map(async (mod) => [mod.key, await ctx.cache.materialize(mod.version, mod.key)] as const)
  );
  return new Map(entries);
}

export function modsForSide(resolved: ResolvedPack, side: GameSide, includeOptional: boolean): ResolvedMod[] {
  return resolved.mods.filter((mod) => includedOnSide(mod.side, side, includeOptional));
}

/**
 * Place a downloaded mod at `<dir>/<file name>`.
 */
export function addModFile(
  ctx: ExportContext,
  layout: OutputLayout,
  dir: string,
  mod: ResolvedMod,
  artifacts: ReadonlyMap<string, CachedArtifact>
): void {
  const artifact = artifacts.get(mod.key);
  if (!artifact) {
    throw new Error(`Mod ${mod.key} was not materialized`);
  }
  const { fs } = ctx;
  layout.add(posix.join(dir, mod.version.fileName), `mod ${mod.key}`, () =>
    withFilesystem(artifact.path, () => fs.readFileBinary(artifact.path))
  );
}

/**
 * Copy a tree under `prefix` ("" for the output root). Raw jars under
 * `mods/` are shipped as they are and logged.
 */
export function addOverrideTree(
  ctx: ExportContext,
  layout: OutputLayout,
  tree: OverrideTree,
  prefix: string,
  label: string
): void {
  const { fs } = ctx;
  for (const [path, source] of sortedEntries(tree)) {
    layout.add(prefix ? posix.join(prefix, path) : path, `${label} file ${path}`, () => readOverride(fs, source));
  }
  for (const path of rawModFiles(tree)) {
    ctx.logger.info(`Bundling unmanaged mod ${path} (${label})`);
  }
}
