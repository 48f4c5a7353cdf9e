/**
 * Generate pipeline
 *
 * load → resolve → export each requested output concurrently.
 * Every exporter reads the same frozen ResolvedPack and shares one cache.
 */

import { ArtifactCache } from "#/cache";
import { loadPackConfig, resolveEngineSettings } from "#/config";
import { createLimiter, type EngineContext } from "#/core";
import { ConfigurationError, ResolutionFailedError, describeError } from "#/errors";
import {
  exportCurseForgeZip,
  exportModrinthPack,
  exportServerDirectory,
  type ExportContext,
  type ExportInput,
  type ExportResult,
  type OutputFormat,
} from "#/export";
import { pluralize } from "#/formatters";
import { buildModReferences, type ModReference } from "#/mods";
import { loadOverrideTrees } from "#/overrides";
import { createPlatformClients, retryPolicyFromSettings } from "#/platform";
import { resolvePack } from "#/resolver";
import type { GenerateOptions, GenerateResult } from "./generate.types";

const OUTPUT_ORDER: OutputFormat[] = ["curseforge", "modrinth", "server"];

const EXPORTERS: Record<
  OutputFormat,
  (ctx: ExportContext, input: ExportInput, outputDir: string, options: { includeOptional?: boolean }) => Promise<ExportResult>
> = {
  curseforge: exportCurseForgeZip,
  modrinth: exportModrinthPack,
  server: exportServerDirectory,
};

function requireCurseForgeKey(ctx: EngineContext, references: readonly ModReference[]): void {
  const curseforge = references.filter((reference) => reference.id.platform === "curseforge");
  if (curseforge.length > 0 && !ctx.tokens.getApiKey("curseforge")) {
    throw new ConfigurationError(
      "CurseForge mods are configured but no CurseForge API key is available (set CURSEFORGE_API_KEY)",
      curseforge.map((reference) => `mods.curseforge.${reference.key}`)
    );
  }
}

export async function generateModpack(ctx: EngineContext, options: GenerateOptions = {}): Promise<GenerateResult> {
  const settings = resolveEngineSettings(options.settings);
  const config = options.config ?? loadPackConfig(ctx);
  const references = buildModReferences(config);
  requireCurseForgeKey(ctx, references);

  const clients = options.clients ?? createPlatformClients(ctx, settings);
  ctx.logger.info(`Resolving ${pluralize(references.length, "mod")} for ${config.name} ${config.version}...`);
  const resolved = await resolvePack(references, clients, {
    gameVersion: config.minecraftVersion,
    loader: config.modLoader.id,
    logger: ctx.logger,
  });

  const requested = OUTPUT_ORDER.flatMap((format) => {
    const dir = options.outputs?.[format];
    return dir ? [{ format, dir }] : [];
  });

  if (requested.length === 0) {
    ctx.logger.info(`All ${pluralize(resolved.mods.length, "mod")} verified. No outputs requested, nothing written.`);
    return { resolved, outputs: [], validationOnly: true };
  }

  const { mods: _mods, ...pack } = config;
  const input: ExportInput = { pack, resolved, overrides: loadOverrideTrees(ctx.fs, ctx.paths.sourceDir) };
  const exportCtx: ExportContext = {
    fs: ctx.fs,
    logger: ctx.logger,
    cache: new ArtifactCache({
      fs: ctx.fs,
      http: ctx.http,
      cacheDir: ctx.paths.cacheDir,
      retry: retryPolicyFromSettings(settings),
      limiter: createLimiter(settings.maxConcurrentDownloads),
      logger: ctx.logger,
    }),
  };

  // Wait for every exporter before failing, so none is mid-write when the error surfaces
  const settled = await Promise.allSettled(
    requested.map(({ format, dir }) =>
      EXPORTERS[format](exportCtx, input, dir, { includeOptional: options.includeOptional?.[format] })
    )
  );

  const outputs: ExportResult[] = [];
  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
    outputs.push(outcome.value);
  }

  return { resolved, outputs, validationOnly: false };
}

/**
 * generateModpack with exit-code mapping: 0 on success, 1 on any failure.
 */
export async function runGenerate(ctx: EngineContext, options: GenerateOptions = {}): Promise<number> {
  try {
    await generateModpack(ctx, options);
    return 0;
  } catch (err) {
    if (err instanceof ResolutionFailedError) {
      ctx.logger.error(`${pluralize(err.failures.length, "mod")} failed resolution:`);
      for (const failure of err.failures) {
        ctx.logger.error(`  ${failure.message}`);
      }
    } else {
      ctx.logger.error(describeError(err));
    }
    return 1;
  }
}
