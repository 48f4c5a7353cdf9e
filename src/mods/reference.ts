/**
 * Mod reference construction and identifier helpers
 *
 * Config is normalized to ModReference once; downstream code never
 * looks at the raw config sections again.
 */

import { ConfigurationError } from "#/errors";
import type { CurseForgeModConfig, ModrinthModConfig, PackConfig } from "#/schemas";
import type { ModReference, PlatformModId, PlatformProjectId } from "./mods.types";
import { sideOverrideFromConfig } from "./side";

type IgnoredDependencyConfig =
  | string
  | number
  | { projectId: string | number }
  | { versionId: string | number };

/**
 * Stable map key for a (platform, project) pair.
 *
 * @example projectKey({ platform: "curseforge", projectId: 238222 }) → "curseforge:238222"
 */
export function projectKey(id: PlatformProjectId | PlatformModId): string {
  return `${id.platform}:${id.projectId}`;
}

/**
 * Human-readable id for logs and error messages.
 *
 * @example describeModId({ platform: "modrinth", projectId: "AANobbMI", versionId: "OihdIimA" }) → "modrinth project AANobbMI (version OihdIimA)"
 */
export function describeModId(id: PlatformProjectId | PlatformModId): string {
  const base = `${id.platform} project ${id.projectId}`;
  const versionId = "versionId" in id ? id.versionId : undefined;
  return versionId !== undefined ? `${base} (version ${versionId})` : base;
}

function splitIgnored(
  entries: readonly IgnoredDependencyConfig[]
): { projects: Set<string>; versions: Set<string> } {
  const projects = new Set<string>();
  const versions = new Set<string>();

  for (const entry of entries) {
    if (typeof entry === "object") {
      if ("projectId" in entry) {
        projects.add(String(entry.projectId));
      } else {
        versions.add(String(entry.versionId));
      }
    } else {
      projects.add(String(entry));
    }
  }

  return { projects, versions };
}

function toReference(
  key: string,
  id: PlatformModId,
  mod: CurseForgeModConfig | ModrinthModConfig,
  ignored: { projects: Set<string>; versions: Set<string> }
): ModReference {
  return Object.freeze({
    key,
    id,
    sideOverride: sideOverrideFromConfig(mod.side),
    ignoredProjects: ignored.projects,
    ignoredVersions: ignored.versions,
  });
}

/**
 * Build the configured mod set, sorted by key.
 *
 * Throws ConfigurationError when a key appears in both platform sections
 * or when two keys point at the same project.
 */
export function buildModReferences(config: PackConfig): ModReference[] {
  const references: ModReference[] = [];
  const problems: string[] = [];

  for (const [key, mod] of Object.entries(config.mods.curseforge)) {
    references.push(
      toReference(
        key,
        { platform: "curseforge", projectId: mod.projectId, versionId: mod.versionId },
        mod,
        splitIgnored(mod.ignoredDeps)
      )
    );
  }

  for (const [key, mod] of Object.entries(config.mods.modrinth)) {
    if (key in config.mods.curseforge) {
      problems.push(`mods: key "${key}" is used in both the curseforge and modrinth sections`);
      continue;
    }
    references.push(
      toReference(
        key,
        { platform: "modrinth", projectId: mod.projectId, versionId: mod.versionId },
        mod,
        splitIgnored(mod.ignoredDeps)
      )
    );
  }

  references.sort((a, b) => compareKeys(a.key, b.key));

  const keyByProject = new Map<string, string>();
  for (const reference of references) {
    const project = projectKey(reference.id);
    const existing = keyByProject.get(project);
    if (existing) {
      problems.push(`mods: "${existing}" and "${reference.key}" both reference ${describeModId(reference.id)}`);
      continue;
    }
    keyByProject.set(project, reference.key);
  }

  if (problems.length > 0) {
    throw new ConfigurationError("Invalid mod list", problems);
  }

  return references;
}

/**
 * Locale-independent key ordering, used wherever output order must be deterministic.
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
