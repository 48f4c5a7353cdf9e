/**
 * Typed dispatch from a tagged id to the matching client.
 */

import { describeModId, type PlatformModId, type PlatformName } from "#/mods";
import type { ModDependency, PlatformClients, VersionFilter, VersionLookup } from "./platform.types";

export function platformDisplayName(clients: PlatformClients, platform: PlatformName): string {
  return clients[platform].displayName;
}

export function lookupModVersion(clients: PlatformClients, id: PlatformModId): Promise<VersionLookup> {
  switch (id.platform) {
    case "curseforge":
      return clients.curseforge.fetchModVersion(id.projectId, id.versionId);
    case "modrinth":
      return clients.modrinth.fetchModVersion(id.projectId, id.versionId);
  }
}

/**
 * Name for logs and errors. Unresolved edges are named by the version they point at.
 */
export function describeDependency(dependency: ModDependency): string {
  if (dependency.unresolvedReason !== undefined && dependency.versionId !== undefined) {
    return `${dependency.platform} version ${dependency.versionId}`;
  }
  return describeModId(dependency);
}

/**
 * Pinned dependencies resolve to their pinned version, others to the newest
 * version matching the pack.
 */
export async function lookupDependency(
  clients: PlatformClients,
  dependency: ModDependency,
  filter: VersionFilter
): Promise<VersionLookup> {
  if (dependency.unresolvedReason !== undefined) {
    return { found: false, reason: dependency.unresolvedReason };
  }
  switch (dependency.platform) {
    case "curseforge":
      return dependency.versionId !== undefined
        ? clients.curseforge.fetchModVersion(dependency.projectId, dependency.versionId)
        : clients.curseforge.fetchLatestVersion(dependency.projectId, filter);
    case "modrinth":
      return dependency.versionId !== undefined
        ? clients.modrinth.fetchModVersion(dependency.projectId, dependency.versionId)
        : clients.modrinth.fetchLatestVersion(dependency.projectId, filter);
  }
}
