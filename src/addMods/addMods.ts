/**
 * Add or update mods in modpack.yaml
 *
 * Each project is pinned to its newest version for the pack's game version
 * and loader. Projects without such a version are skipped with a warning.
 * The YAML document is edited in place so comments and layout survive; the
 * previous file is kept next to it as modpack.yaml.bak.
 */

import { parseDocument, type Document } from "yaml";
import { resolveEngineSettings, readPackConfigText } from "#/config";
import type { EngineContext } from "#/core";
import { ConfigurationError, withFilesystem } from "#/errors";
import { safeValidate, toConfigurationError } from "#/friendly-errors";
import { uniqueModKey, type PlatformModId, type PlatformName, type SideOverride } from "#/mods";
import {
  createPlatformClients,
  platformDisplayName,
  type PlatformClients,
  type VersionFilter,
  type VersionLookup,
  type VersionRecord,
} from "#/platform";
import { CurseForgeIdSchema, PackConfigSchema, type PackConfig } from "#/schemas";
import type { AddModsOptions, AddModsResult } from "./addMods.types";

interface ConfiguredMod {
  key: string;
  projectId: string;
  versionId: string;
}

function parseConfigDocument(text: string, filepath: string): { doc: Document; config: PackConfig } {
  const doc = parseDocument(text);
  const [first] = doc.errors;
  if (first) {
    throw new ConfigurationError(`Invalid YAML syntax in ${filepath}`, [first.message.split("\n")[0] ?? first.message]);
  }

  const result = safeValidate(doc.toJS(), PackConfigSchema, filepath);
  if (!result.success) {
    throw toConfigurationError(result.error);
  }
  return { doc, config: result.data };
}

function configuredMods(config: PackConfig, platform: PlatformName): ConfiguredMod[] {
  return Object.entries(config.mods[platform]).map(([key, mod]) => ({
    key,
    projectId: String(mod.projectId),
    versionId: String(mod.versionId),
  }));
}

function curseForgeProjectId(input: string): number {
  const parsed = CurseForgeIdSchema.safeParse(Number(input.trim()));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid CurseForge project id "${input}"`, ["CurseForge project ids are positive integers"]);
  }
  return parsed.data;
}

function fetchLatest(
  clients: PlatformClients,
  platform: PlatformName,
  projectId: string,
  filter: VersionFilter
): Promise<VersionLookup> {
  switch (platform) {
    case "curseforge":
      return clients.curseforge.fetchLatestVersion(curseForgeProjectId(projectId), filter);
    case "modrinth":
      return clients.modrinth.fetchLatestVersion(projectId.trim(), filter);
  }
}

function knownSides(side: SideOverride | undefined): SideOverride | undefined {
  if (!side) return undefined;
  const known: SideOverride = {};
  if (side.client) known.client = side.client;
  if (side.server) known.server = side.server;
  return known.client || known.server ? known : undefined;
}

function modEntry(id: PlatformModId, side: SideOverride | undefined): Record<string, unknown> {
  const entry: Record<string, unknown> = { projectId: id.projectId, versionId: id.versionId };
  const sides = knownSides(side);
  if (sides) {
    entry.side = sides;
  }
  return entry;
}

export async function addMods(ctx: EngineContext, options: AddModsOptions): Promise<AddModsResult> {
  const { platform } = options;
  const configFile = ctx.paths.configFile;
  const { doc, config } = parseConfigDocument(readPackConfigText(ctx), configFile);

  if (platform === "curseforge" && options.projectIds.length > 0 && !ctx.tokens.getApiKey("curseforge")) {
    throw new ConfigurationError(
      "Adding CurseForge mods requires a CurseForge API key (set CURSEFORGE_API_KEY)"
    );
  }

  const clients = options.clients ?? createPlatformClients(ctx, resolveEngineSettings(options.settings));
  const displayName = platformDisplayName(clients, platform);
  const filter: VersionFilter = { gameVersion: config.minecraftVersion, loader: config.modLoader.id };

  const lookups = await Promise.all(
    options.projectIds.map(async (projectId) => ({ projectId, lookup: await fetchLatest(clients, platform, projectId, filter) }))
  );

  const result: AddModsResult = { added: [], updated: [], unchanged: [], skipped: [], written: false };
  const found: Array<{ requested: string; record: VersionRecord }> = [];
  for (const { projectId, lookup } of lookups) {
    if (!lookup.found) {
      ctx.logger.warn(`[${displayName}] No valid version found for project ID ${projectId}: ${lookup.reason}`);
      result.skipped.push(projectId);
      continue;
    }
    found.push({ requested: projectId.trim(), record: lookup.record });
  }

  const existing = configuredMods(config, platform);
  const taken = new Set([...Object.keys(config.mods.curseforge), ...Object.keys(config.mods.modrinth)]);
  const seen = new Set<string>();

  found.forEach(({ requested, record }) => {
    const canonical = String(record.id.projectId);
    const versionId = String(record.id.versionId);
    if (seen.has(canonical)) return;
    seen.add(canonical);

    const current = existing.find((mod) => mod.projectId === canonical || mod.projectId === requested);
    if (current && current.versionId === versionId) {
      ctx.logger.info(`[${displayName}] ${current.key} is already at the newest version (${record.versionName})`);
      result.unchanged.push(current.key);
      return;
    }

    if (current) {
      doc.setIn(["mods", platform, current.key, "versionId"], record.id.versionId);
      ctx.logger.info(`[${displayName}] Updated ${current.key} to ${record.versionName}`);
      result.updated.push(current.key);
      return;
    }

    const key = uniqueModKey(record.projectName, record.id.projectId, taken);
    taken.add(key);
    doc.setIn(["mods", platform, key], modEntry(record.id, record.side));
    ctx.logger.info(`[${displayName}] Added ${record.projectName} as ${key} (${record.versionName})`);
    result.added.push(key);
  });

  if (result.added.length === 0 && result.updated.length === 0) {
    ctx.logger.info("Nothing to change, modpack.yaml left as is.");
    return result;
  }

  withFilesystem(configFile, () => {
    ctx.fs.copyFile(configFile, `${configFile}.bak`);
    ctx.fs.writeFile(configFile, doc.toString());
  });
  result.written = true;
  return result;
}
