/**
 * Server directory
 *
 * A ready-to-run layout: mods/ with every server-side mod, common and
 * server overrides merged at the root, and modloader.json pointing at the
 * loader's installer.
 */

import { MODLOADER_REFERENCE_FILE, MODS_DIR } from "#/constants";
import { mergeOverrides } from "#/overrides";
import { addModFile, addOverrideTree, materializeMods, modsForSide } from "./assemble";
import type { ExportContext, ExportInput, ExportOptions, ExportResult } from "./export.types";
import { OutputLayout, writeDirectoryAtomically } from "./layout";
import { modloaderReference, toJson } from "./manifest";

export async function exportServerDirectory(
  ctx: ExportContext,
  input: ExportInput,
  outputDir: string,
  options: ExportOptions = {}
): Promise<ExportResult> {
  ctx.logger.info(`Creating server base at '${outputDir}'...`);

  const serverMods = modsForSide(input.resolved, "server", options.includeOptional ?? true);
  const layout = new OutputLayout();

  const artifacts = await materializeMods(ctx, serverMods);
  for (const mod of serverMods) {
    addModFile(ctx, layout, MODS_DIR, mod, artifacts);
  }

  addOverrideTree(ctx, layout, mergeOverrides(input.overrides, "server"), "", "override");
  layout.add(MODLOADER_REFERENCE_FILE, "modloader reference", () => toJson(modloaderReference(input.pack)));

  writeDirectoryAtomically(ctx.fs, outputDir, layout);

  ctx.logger.info(`Created server base at '${outputDir}'.`);
  return { format: "server", path: outputDir };
}
