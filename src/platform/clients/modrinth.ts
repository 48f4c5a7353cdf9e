/**
 * Modrinth platform client
 *
 * Talks to the Modrinth Labrinth API (v2). String project and version ids;
 * project slugs are accepted and canonicalized to ids in the returned record.
 */

import { z } from "zod";
import type { HttpClient, Limiter, Logger } from "#/core";
import { MODRINTH_API_URL, USER_AGENT } from "#/constants";
import { UnexpectedResponseError } from "#/errors";
import { formatZodIssues } from "#/friendly-errors";
import type { SideOverride } from "#/mods";
import type { ModLoaderType } from "#/schemas";
import { fetchJson } from "../http";
import type {
  ModDependency,
  PlatformClient,
  RetryPolicy,
  VersionFilter,
  VersionLookup,
  VersionRecord,
} from "../platform.types";

const EnvSupportSchema = z.enum(["required", "optional", "unsupported", "unknown"]);

/**
 * Shape of GET /project/{id}
 */
const ApiProjectSchema = z.object({
  id: z.string(),
  slug: z.string(),
  title: z.string(),
  project_type: z.string(),
  client_side: EnvSupportSchema.catch("unknown"),
  server_side: EnvSupportSchema.catch("unknown"),
});
type ApiProject = z.infer<typeof ApiProjectSchema>;

/**
 * Shape of GET /version/{id}
 */
const ApiVersionSchema = z.object({
  id: z.string(),
  project_id: z.string(),
  name: z.string(),
  version_number: z.string(),
  date_published: z.string(),
  game_versions: z.array(z.string()).default([]),
  loaders: z.array(z.string()).default([]),
  files: z.array(
    z.object({
      url: z.string(),
      filename: z.string(),
      primary: z.boolean(),
      size: z.number(),
      hashes: z.object({ sha1: z.string(), sha512: z.string() }),
    })
  ),
  dependencies: z
    .array(
      z.object({
        version_id: z.string().nullish(),
        project_id: z.string().nullish(),
        dependency_type: z.string(),
      })
    )
    .default([]),
});
type ApiVersion = z.infer<typeof ApiVersionSchema>;

export interface ModrinthClientOptions {
  http: HttpClient;
  apiKey?: string;
  retry: RetryPolicy;
  limiter: Limiter;
  logger: Logger;
  baseUrl?: string;
}

/**
 * Loaders whose mods a pack on `loader` can use.
 * Quilt loads Fabric mods.
 */
export function compatibleLoaders(loader: ModLoaderType): string[] {
  return loader === "quilt" ? ["quilt", "fabric"] : [loader];
}

function sideHint(project: ApiProject): SideOverride | undefined {
  const hint: SideOverride = {};
  if (project.client_side !== "unknown") hint.client = project.client_side;
  if (project.server_side !== "unknown") hint.server = project.server_side;
  return Object.keys(hint).length > 0 ? hint : undefined;
}

export class ModrinthClient implements PlatformClient<"modrinth"> {
  readonly platform = "modrinth" as const;
  readonly displayName = "Modrinth";

  private http: HttpClient;
  private apiKey?: string;
  private retry: RetryPolicy;
  private limiter: Limiter;
  private logger: Logger;
  private baseUrl: string;
  private projectCache = new Map<string, Promise<ApiProject | null>>();
  private versionCache = new Map<string, Promise<ApiVersion | null>>();

  constructor(options: ModrinthClientOptions) {
    this.http = options.http;
    this.apiKey = options.apiKey;
    this.retry = options.retry;
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.baseUrl = options.baseUrl ?? MODRINTH_API_URL;
  }

  private getHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
    };
    if (this.apiKey) {
      headers["Authorization"] = this.apiKey;
    }
    return headers;
  }

  private async getJson<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S> | null> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`[Modrinth] GET ${url}`);

    const outcome = await this.limiter(() => fetchJson(this.http, url, this.getHeaders(), this.retry));
    if (!outcome.found) {
      return null;
    }

    const parsed = schema.safeParse(outcome.value);
    if (!parsed.success) {
      throw new UnexpectedResponseError(url, formatZodIssues(parsed.error));
    }
    return parsed.data;
  }

  private loadProject(projectId: string): Promise<ApiProject | null> {
    let cached = this.projectCache.get(projectId);
    if (!cached) {
      cached = this.getJson(`/project/${encodeURIComponent(projectId)}`, ApiProjectSchema);
      this.projectCache.set(projectId, cached);
    }
    return cached;
  }

  private loadVersion(versionId: string): Promise<ApiVersion | null> {
    let cached = this.versionCache.get(versionId);
    if (!cached) {
      cached = this.getJson(`/version/${encodeURIComponent(versionId)}`, ApiVersionSchema);
      this.versionCache.set(versionId, cached);
    }
    return cached;
  }

  /**
   * Normalize declared dependencies. A dependency that names only a version
   * is looked up to learn its project. When that version does not exist the
   * edge is kept as unresolved so the resolver can report it.
   */
  private async normalizeDependencies(version: ApiVersion): Promise<ModDependency[]> {
    const dependencies: ModDependency[] = [];

    for (const dependency of version.dependencies) {
      const kind = dependency.dependency_type;
      if (kind !== "required" && kind !== "optional" && kind !== "incompatible") {
        continue;
      }

      const versionId = dependency.version_id ?? undefined;
      let projectId = dependency.project_id ?? undefined;

      if (!projectId && versionId) {
        const pinned = await this.loadVersion(versionId);
        projectId = pinned?.project_id;
        if (!projectId && kind !== "incompatible") {
          dependencies.push({
            platform: "modrinth",
            projectId: `version:${versionId}`,
            versionId,
            kind,
            unresolvedReason: `Modrinth version ${versionId} does not exist`,
          });
          continue;
        }
      }

      if (!projectId) {
        this.logger.warn(`[Modrinth] Skipping unidentifiable ${kind} dependency of version ${version.id}`);
        continue;
      }

      dependencies.push({ platform: "modrinth", projectId, versionId, kind });
    }

    return dependencies;
  }

  private async toRecord(project: ApiProject, version: ApiVersion): Promise<VersionLookup> {
    if (project.project_type !== "mod") {
      return { found: false, reason: `Modrinth project ${project.slug} exists, but is not a mod` };
    }

    const file = version.files.find((f) => f.primary) ?? version.files[0];
    if (!file) {
      return { found: false, reason: `Modrinth version ${version.id} has no files` };
    }

    const record: VersionRecord = {
      id: { platform: "modrinth", projectId: project.id, versionId: version.id },
      projectName: project.title,
      versionName: version.version_number,
      fileName: file.filename,
      fileSize: file.size,
      downloadUrl: file.url,
      hashes: { sha1: file.hashes.sha1.toLowerCase(), sha512: file.hashes.sha512.toLowerCase() },
      dependencies: await this.normalizeDependencies(version),
      side: sideHint(project),
      gameVersions: version.game_versions,
      distributionAllowed: true,
    };

    return { found: true, record };
  }

  async fetchModVersion(projectId: string, versionId: string): Promise<VersionLookup> {
    const [project, version] = await Promise.all([this.loadProject(projectId), this.loadVersion(versionId)]);

    if (!project) {
      return { found: false, reason: `Modrinth project ${projectId} does not exist` };
    }
    if (!version) {
      return { found: false, reason: `Modrinth version ${versionId} does not exist` };
    }
    if (version.project_id !== project.id) {
      return {
        found: false,
        reason: `Modrinth version ${versionId} belongs to project ${version.project_id}, not ${projectId}`,
      };
    }

    return this.toRecord(project, version);
  }

  async fetchLatestVersion(projectId: string, filter: VersionFilter): Promise<VersionLookup> {
    const query = new URLSearchParams({
      loaders: JSON.stringify(compatibleLoaders(filter.loader)),
      game_versions: JSON.stringify([filter.gameVersion]),
    });

    const [project, versions] = await Promise.all([
      this.loadProject(projectId),
      this.getJson(`/project/${encodeURIComponent(projectId)}/version?${query.toString()}`, z.array(ApiVersionSchema)),
    ]);

    if (!project) {
      return { found: false, reason: `Modrinth project ${projectId} does not exist` };
    }

    const newest = (versions ?? []).reduce<ApiVersion | undefined>(
      (best, version) => (best === undefined || version.date_published > best.date_published ? version : best),
      undefined
    );

    if (!newest) {
      return {
        found: false,
        reason: `Modrinth project ${projectId} has no version for Minecraft ${filter.gameVersion} (${filter.loader})`,
      };
    }

    this.versionCache.set(newest.id, Promise.resolve(newest));
    return this.toRecord(project, newest);
  }
}
