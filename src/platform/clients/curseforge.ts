/**
 * CurseForge platform client
 *
 * Talks to the CurseForge Core API (v1). Integer mod ids and file ids.
 * Requires an API key; requests without one fail as configuration errors.
 */

import { z } from "zod";
import type { HttpClient, Limiter, Logger } from "#/core";
import { CURSEFORGE_API_URL, USER_AGENT } from "#/constants";
import { ConfigurationError, UnexpectedResponseError } from "#/errors";
import { formatZodIssues } from "#/friendly-errors";
import type { SideOverride } from "#/mods";
import type { ModLoaderType } from "#/schemas";
import { fetchJson } from "../http";
import type {
  DependencyKind,
  FileHashes,
  ModDependency,
  PlatformClient,
  RetryPolicy,
  VersionFilter,
  VersionLookup,
  VersionRecord,
} from "../platform.types";

// FileRelationType
const RELATION_OPTIONAL = 2;
const RELATION_REQUIRED = 3;
const RELATION_INCOMPATIBLE = 5;

// HashAlgo
const HASH_SHA1 = 1;
const HASH_MD5 = 2;

const MOD_LOADER_TYPE: Record<ModLoaderType, number> = {
  forge: 1,
  fabric: 4,
  quilt: 5,
  neoforge: 6,
};

/**
 * Shape of GET /mods/{modId}
 */
const ApiModResponseSchema = z.object({
  data: z.object({
    id: z.number(),
    name: z.string(),
    allowModDistribution: z.boolean().nullish(),
  }),
});
type ApiMod = z.infer<typeof ApiModResponseSchema>["data"];

const ApiFileSchema = z.object({
  id: z.number(),
  modId: z.number(),
  displayName: z.string(),
  fileName: z.string(),
  fileLength: z.number(),
  fileDate: z.string(),
  downloadUrl: z.string().nullish(),
  hashes: z.array(z.object({ value: z.string(), algo: z.number() })).default([]),
  gameVersions: z.array(z.string()).default([]),
  dependencies: z.array(z.object({ modId: z.number(), relationType: z.number() })).default([]),
});
type ApiFile = z.infer<typeof ApiFileSchema>;

const ApiFileResponseSchema = z.object({ data: ApiFileSchema });
const ApiFileListResponseSchema = z.object({ data: z.array(ApiFileSchema) });

export interface CurseForgeClientOptions {
  http: HttpClient;
  apiKey: string | undefined;
  retry: RetryPolicy;
  limiter: Limiter;
  logger: Logger;
  baseUrl?: string;
}

function relationKind(relationType: number): DependencyKind | undefined {
  switch (relationType) {
    case RELATION_REQUIRED:
      return "required";
    case RELATION_OPTIONAL:
      return "optional";
    case RELATION_INCOMPATIBLE:
      return "incompatible";
    default:
      // Embedded libraries, tools and includes never need a separate file
      return undefined;
  }
}

/**
 * CurseForge tags side support as pseudo game versions ("Client", "Server").
 */
export function sideHintFromGameVersions(gameVersions: string[]): SideOverride | undefined {
  const client = gameVersions.includes("Client");
  const server = gameVersions.includes("Server");
  if (!client && !server) {
    return undefined;
  }
  return {
    client: client ? "required" : "unsupported",
    server: server ? "required" : "unsupported",
  };
}

export class CurseForgeClient implements PlatformClient<"curseforge"> {
  readonly platform = "curseforge" as const;
  readonly displayName = "CurseForge";

  private http: HttpClient;
  private apiKey: string | undefined;
  private retry: RetryPolicy;
  private limiter: Limiter;
  private logger: Logger;
  private baseUrl: string;
  private modCache = new Map<number, Promise<ApiMod | null>>();

  constructor(options: CurseForgeClientOptions) {
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.retry = options.retry;
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.baseUrl = options.baseUrl ?? CURSEFORGE_API_URL;
  }

  private getHeaders(): Record<string, string> {
    if (!this.apiKey) {
      throw new ConfigurationError("A CurseForge API key is required to load CurseForge mods");
    }
    return {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
      "x-api-key": this.apiKey,
    };
  }

  /**
   * GET a path and validate the body. Null when the resource does not exist.
   */
  private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S> | null> {
    const url = `${this.baseUrl}${path}`;
    const headers = this.getHeaders();
    this.logger.debug(`[CurseForge] GET ${url}`);

    const outcome = await this.limiter(() => fetchJson(this.http, url, headers, this.retry));
    if (!outcome.found) {
      return null;
    }

    const parsed = schema.safeParse(outcome.value);
    if (!parsed.success) {
      throw new UnexpectedResponseError(url, formatZodIssues(parsed.error));
    }
    return parsed.data;
  }

  private loadMod(modId: number): Promise<ApiMod | null> {
    let cached = this.modCache.get(modId);
    if (!cached) {
      cached = this.getJson(`/mods/${modId}`, ApiModResponseSchema).then((body) => body?.data ?? null);
      this.modCache.set(modId, cached);
    }
    return cached;
  }

  private toRecord(mod: ApiMod, file: ApiFile): VersionRecord {
    const hashes: FileHashes = {};
    for (const hash of file.hashes) {
      if (hash.algo === HASH_SHA1) {
        hashes.sha1 = hash.value.toLowerCase();
      } else if (hash.algo === HASH_MD5) {
        hashes.md5 = hash.value.toLowerCase();
      }
    }

    const dependencies: ModDependency[] = [];
    for (const dependency of file.dependencies) {
      const kind = relationKind(dependency.relationType);
      if (kind) {
        dependencies.push({ platform: "curseforge", projectId: dependency.modId, kind });
      }
    }

    return {
      id: { platform: "curseforge", projectId: mod.id, versionId: file.id },
      projectName: mod.name,
      versionName: file.displayName,
      fileName: file.fileName,
      fileSize: file.fileLength,
      downloadUrl: file.downloadUrl ?? null,
      hashes,
      dependencies,
      side: sideHintFromGameVersions(file.gameVersions),
      gameVersions: file.gameVersions,
      distributionAllowed: mod.allowModDistribution !== false,
    };
  }

  async fetchModVersion(projectId: number, versionId: number): Promise<VersionLookup> {
    const [mod, fileBody] = await Promise.all([
      this.loadMod(projectId),
      this.getJson(`/mods/${projectId}/files/${versionId}`, ApiFileResponseSchema),
    ]);

    if (!mod) {
      return { found: false, reason: `CurseForge project ${projectId} does not exist` };
    }
    if (!fileBody) {
      return { found: false, reason: `CurseForge file ${versionId} of project ${projectId} does not exist` };
    }
    if (fileBody.data.modId !== projectId) {
      return {
        found: false,
        reason: `CurseForge file ${versionId} belongs to project ${fileBody.data.modId}, not ${projectId}`,
      };
    }

    return { found: true, record: this.toRecord(mod, fileBody.data) };
  }

  async fetchLatestVersion(projectId: number, filter: VersionFilter): Promise<VersionLookup> {
    const query = new URLSearchParams({
      gameVersion: filter.gameVersion,
      modLoaderType: String(MOD_LOADER_TYPE[filter.loader]),
    });

    const [mod, listBody] = await Promise.all([
      this.loadMod(projectId),
      this.getJson(`/mods/${projectId}/files?${query.toString()}`, ApiFileListResponseSchema),
    ]);

    if (!mod) {
      return { found: false, reason: `CurseForge project ${projectId} does not exist` };
    }

    const newest = (listBody?.data ?? [])
      .filter((file) => file.gameVersions.includes(filter.gameVersion))
      .reduce<ApiFile | undefined>(
        (best, file) => (best === undefined || file.fileDate > best.fileDate ? file : best),
        undefined
      );

    if (!newest) {
      return {
        found: false,
        reason: `CurseForge project ${projectId} has no file for Minecraft ${filter.gameVersion} (${filter.loader})`,
      };
    }

    return { found: true, record: this.toRecord(mod, newest) };
  }
}
