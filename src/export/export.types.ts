import type { FileSystem, Logger } from "#/core";
import type { ArtifactCache } from "#/cache";
import type { ResolvedPack } from "#/mods";
import type { OverrideTrees } from "#/overrides";
import type { PackMetadata } from "#/schemas";

export interface ExportContext {
  fs: FileSystem;
  cache: ArtifactCache;
  logger: Logger;
}

/**
 * Everything an exporter reads. Never mutated by exporters.
 */
export interface ExportInput {
  pack: PackMetadata;
  resolved: ResolvedPack;
  overrides: OverrideTrees;
}

export interface ExportOptions {
  /** Include mods whose requirement on the target side is only optional */
  includeOptional?: boolean;
}

export type OutputFormat = "curseforge" | "modrinth" | "server";

export interface ExportResult {
  format: OutputFormat;
  path: string;
}
