import type { PlatformName } from "#/mods";
import type { PlatformClients } from "#/platform";
import type { EngineSettingsInput } from "#/schemas";

export interface AddModsOptions {
  platform: PlatformName;
  /** Project ids or slugs as typed by the user */
  projectIds: string[];
  settings?: EngineSettingsInput;
  clients?: PlatformClients;
}

export interface AddModsResult {
  /** Keys of newly configured mods */
  added: string[];
  /** Keys whose pinned version changed */
  updated: string[];
  /** Keys already pinned to the newest version */
  unchanged: string[];
  /** Requested ids with no version for the pack's game version and loader */
  skipped: string[];
  /** Whether modpack.yaml was rewritten */
  written: boolean;
}
