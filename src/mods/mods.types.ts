/**
 * Mod reference model
 *
 * Platform identifiers are a tagged union: a CurseForge id is never
 * comparable to a Modrinth id, and every id carries its platform.
 */

import type { PlatformName } from "#/core";
import type { VersionRecord } from "#/platform";

export type { PlatformName };

export interface PlatformIdTypes {
  curseforge: number;
  modrinth: string;
}

export type PlatformIdOf<P extends PlatformName> = PlatformIdTypes[P];

export type PlatformProjectId =
  | { platform: "curseforge"; projectId: number }
  | { platform: "modrinth"; projectId: string };

export type PlatformModId =
  | { platform: "curseforge"; projectId: number; versionId: number }
  | { platform: "modrinth"; projectId: string; versionId: string };

/** Ordered: required > optional > unsupported */
export type SideRequirement = "required" | "optional" | "unsupported";

export interface SideRequirements {
  client: SideRequirement;
  server: SideRequirement;
}

export type SideOverride = Partial<SideRequirements>;

export type GameSide = keyof SideRequirements;

/**
 * One configured mod. Built once from validated config, never mutated.
 */
export interface ModReference {
  key: string;
  id: PlatformModId;
  sideOverride?: SideOverride;
  /** Stringified project ids of the same platform to skip during resolution */
  ignoredProjects: ReadonlySet<string>;
  /** Stringified version ids of the same platform to skip during resolution */
  ignoredVersions: ReadonlySet<string>;
}

export type ModOrigin = "direct" | "dependency";

export interface ResolvedMod {
  key: string;
  id: PlatformModId;
  side: SideRequirements;
  origin: ModOrigin;
  /** Keys of the mods whose dependency edges pulled this one in, sorted */
  requiredBy: readonly string[];
  version: VersionRecord;
}

/**
 * Closure of the configured mods. Sorted by key, frozen after resolution.
 */
export interface ResolvedPack {
  readonly mods: readonly ResolvedMod[];
}
