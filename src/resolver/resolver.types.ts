import type { Logger } from "#/core";
import type { ModReference, SideRequirements } from "#/mods";
import type { ModDependency, VersionRecord } from "#/platform";
import type { ModLoaderType } from "#/schemas";

export interface ResolveOptions {
  gameVersion: string;
  loader: ModLoaderType;
  logger: Logger;
}

/**
 * A (platform, project) pair claimed during traversal.
 */
export interface GraphNode {
  /** projectKey of the node, e.g. "modrinth:AANobbMI" */
  project: string;
  /** Config key for direct mods; generated after traversal for dependencies */
  key?: string;
  reference?: ModReference;
  /** Dependency edge that first claimed this node */
  claimedBy?: ModDependency;
  record?: VersionRecord;
  /** Set when the node could not be fetched */
  missingReason?: string;
  /** Effective side; fixed for direct mods, computed for dependencies */
  side?: SideRequirements;
  /** Failed verification; kept to stop re-fetching, never expanded */
  failed: boolean;
}

export interface GraphEdge {
  from: string;
  to: string;
  kind: "required" | "optional";
}

export interface Conflict {
  from: string;
  to: string;
}
