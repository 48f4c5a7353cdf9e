/**
 * Pack configuration and engine settings loading
 */

import { join } from "path";
import type { EngineContext, PathConfig } from "#/core";
import { PACK_CONFIG_FILE } from "#/constants";
import { ConfigurationError, withFilesystem } from "#/errors";
import { safeParseYaml, safeValidate, toConfigurationError } from "#/friendly-errors";
import {
  EngineSettingsSchema,
  PackConfigSchema,
  type EngineSettings,
  type EngineSettingsInput,
  type PackConfig,
} from "#/schemas";

/**
 * Standard layout: modpack.yaml inside the source directory.
 */
export function createPathConfig(sourceDir: string, cacheDir: string): PathConfig {
  return { sourceDir, configFile: join(sourceDir, PACK_CONFIG_FILE), cacheDir };
}

export function readPackConfigText(ctx: Pick<EngineContext, "fs" | "paths">): string {
  const { fs, paths } = ctx;
  if (!fs.exists(paths.configFile)) {
    throw new ConfigurationError(`No ${PACK_CONFIG_FILE} found at ${paths.configFile}`);
  }
  return withFilesystem(paths.configFile, () => fs.readFile(paths.configFile));
}

/**
 * Read and validate modpack.yaml. Fails with ConfigurationError, one detail per issue.
 */
export function loadPackConfig(ctx: Pick<EngineContext, "fs" | "paths">): PackConfig {
  const result = safeParseYaml(readPackConfigText(ctx), PackConfigSchema, ctx.paths.configFile);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  return result.data;
}

export function resolveEngineSettings(input: EngineSettingsInput = {}): EngineSettings {
  const result = safeValidate(input, EngineSettingsSchema, "engine settings");
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  return result.data;
}
