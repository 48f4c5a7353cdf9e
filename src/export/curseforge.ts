/**
 * CurseForge modpack ZIP
 *
 * manifest.json lists direct CurseForge mods by id; everything else the
 * client needs (Modrinth mods, transitive CurseForge dependencies) is
 * bundled under overrides/mods/.
 */

import { join, posix } from "path";
import { CURSEFORGE_MANIFEST_FILE, MODS_DIR, OVERRIDES_DIR } from "#/constants";
import type { ResolvedMod } from "#/mods";
import { mergeOverrides } from "#/overrides";
import { addModFile, addOverrideTree, materializeMods, modsForSide } from "./assemble";
import type { ExportContext, ExportInput, ExportOptions, ExportResult } from "./export.types";
import { OutputLayout, writeZipAtomically } from "./layout";
import { curseForgeManifest, curseForgeManifestFile, toJson, type CurseForgeManifestFile } from "./manifest";

export function curseForgeZipName(input: Pick<ExportInput, "pack">): string {
  return `${input.pack.name} (${input.pack.version}).zip`;
}

export async function exportCurseForgeZip(
  ctx: ExportContext,
  input: ExportInput,
  outputDir: string,
  options: ExportOptions = {}
): Promise<ExportResult> {
  const outputPath = join(outputDir, curseForgeZipName(input));
  ctx.logger.info(`Creating CurseForge zip at '${outputPath}'...`);

  const clientMods = modsForSide(input.resolved, "client", options.includeOptional ?? false);
  const listed: CurseForgeManifestFile[] = [];
  const bundled: ResolvedMod[] = [];

  for (const mod of clientMods) {
    const file = mod.origin === "direct" ? curseForgeManifestFile(mod) : undefined;
    if (file) {
      listed.push(file);
    } else {
      bundled.push(mod);
    }
  }

  const layout = new OutputLayout();
  const artifacts = await materializeMods(ctx, bundled);
  for (const mod of bundled) {
    addModFile(ctx, layout, posix.join(OVERRIDES_DIR, MODS_DIR), mod, artifacts);
  }

  addOverrideTree(ctx, layout, mergeOverrides(input.overrides, "client"), OVERRIDES_DIR, "override");
  layout.add(CURSEFORGE_MANIFEST_FILE, "manifest", () => toJson(curseForgeManifest(input.pack, listed)));

  await writeZipAtomically(ctx.fs, outputPath, layout);

  ctx.logger.info(`Created CurseForge zip at '${outputPath}'.`);
  return { format: "curseforge", path: outputPath };
}
