/**
 * Platform types and interfaces
 *
 * The resolver NEVER knows what CurseForge or Modrinth is - only that there's
 * "a platform client" that turns native ids into a VersionRecord.
 */

import type { PlatformIdOf, PlatformModId, PlatformName, SideOverride } from "#/mods";
import type { ModLoaderType } from "#/schemas";

export type DependencyKind = "required" | "optional" | "incompatible";

/**
 * Declared dependency of a mod version. Always refers to the same platform
 * as the declaring mod; `versionId` is set when the platform pins one.
 * `unresolvedReason` marks an edge whose target the platform could not
 * identify; it is never fetched.
 */
export type ModDependency =
  | { platform: "curseforge"; projectId: number; versionId?: number; kind: DependencyKind; unresolvedReason?: string }
  | { platform: "modrinth"; projectId: string; versionId?: string; kind: DependencyKind; unresolvedReason?: string };

export type HashAlgorithm = "sha512" | "sha1" | "md5";

/** Lower-case hex digests as published by the platform */
export type FileHashes = Partial<Record<HashAlgorithm, string>>;

/**
 * Platform-neutral metadata for one mod version (one file).
 */
export interface VersionRecord {
  /** Canonical ids as reported by the platform */
  id: PlatformModId;
  projectName: string;
  versionName: string;
  fileName: string;
  fileSize: number;
  /** Null when the platform withholds the file from third-party tools */
  downloadUrl: string | null;
  hashes: FileHashes;
  dependencies: ModDependency[];
  /** Side hint, only for the sides the platform actually records */
  side?: SideOverride;
  gameVersions: string[];
  distributionAllowed: boolean;
}

export type VersionLookup =
  | { found: true; record: VersionRecord }
  | { found: false; reason: string };

export interface VersionFilter {
  gameVersion: string;
  loader: ModLoaderType;
}

/**
 * Platform client interface.
 * Not-found is a result; transient failures throw TransientNetworkError
 * once the retry budget is spent.
 */
export interface PlatformClient<P extends PlatformName> {
  readonly platform: P;
  readonly displayName: string;

  /**
   * Fetch a specific version of a project
   */
  fetchModVersion(projectId: PlatformIdOf<P>, versionId: PlatformIdOf<P>): Promise<VersionLookup>;

  /**
   * Fetch the newest version of a project compatible with the pack
   */
  fetchLatestVersion(projectId: PlatformIdOf<P>, filter: VersionFilter): Promise<VersionLookup>;
}

export interface PlatformClients {
  curseforge: PlatformClient<"curseforge">;
  modrinth: PlatformClient<"modrinth">;
}

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  /** Base delay; attempt n waits n × delayMs before the next try */
  delayMs: number;
}
