import type { ExportResult, OutputFormat } from "#/export";
import type { ResolvedPack } from "#/mods";
import type { PlatformClients } from "#/platform";
import type { EngineSettingsInput, PackConfig } from "#/schemas";

export interface GenerateOptions {
  /** Destination directory per requested output. None requested = validation only. */
  outputs?: Partial<Record<OutputFormat, string>>;
  /** Per-output override of the optional-mod default */
  includeOptional?: Partial<Record<OutputFormat, boolean>>;
  settings?: EngineSettingsInput;
  /** Already-validated config; read from paths.configFile when absent */
  config?: PackConfig;
  /** Platform clients to use instead of the HTTP-backed ones */
  clients?: PlatformClients;
}

export interface GenerateResult {
  resolved: ResolvedPack;
  outputs: ExportResult[];
  validationOnly: boolean;
}
