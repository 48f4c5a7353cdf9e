/**
 * Test utilities - In-memory platform clients
 */

import { createHash } from "crypto";
import type {
  ModOrigin,
  PlatformIdOf,
  PlatformModId,
  PlatformName,
  ResolvedMod,
  SideOverride,
  SideRequirements,
} from "#/mods";
import type {
  ModDependency,
  PlatformClient,
  PlatformClients,
  VersionFilter,
  VersionLookup,
  VersionRecord,
} from "#/platform";
import { binaryResponse } from "./mocks";

export interface RecordOptions {
  name?: string;
  fileName?: string;
  dependencies?: ModDependency[];
  side?: SideOverride;
  gameVersions?: string[];
  distributionAllowed?: boolean;
  downloadUrl?: string | null;
}

export function sha1(content: string | Buffer): string {
  return createHash("sha1").update(content).digest("hex");
}

export function sha512(content: string | Buffer): string {
  return createHash("sha512").update(content).digest("hex");
}

function buildRecord(id: PlatformModId, options: RecordOptions): VersionRecord {
  const name = options.name ?? `Project ${id.projectId}`;
  const fileName = options.fileName ?? `${String(id.projectId).toLowerCase()}-${id.versionId}.jar`;
  const content = `jar:${id.platform}:${id.projectId}:${id.versionId}`;
  const downloadUrl =
    options.downloadUrl === undefined ? `https://files.test/${id.platform}/${id.versionId}/${fileName}` : options.downloadUrl;

  return {
    id,
    projectName: name,
    versionName: `${name} ${id.versionId}`,
    fileName,
    fileSize: Buffer.byteLength(content),
    downloadUrl,
    hashes:
      id.platform === "modrinth" ? { sha1: sha1(content), sha512: sha512(content) } : { sha1: sha1(content) },
    dependencies: options.dependencies ?? [],
    side: options.side,
    gameVersions: options.gameVersions ?? ["1.20.1"],
    distributionAllowed: options.distributionAllowed ?? true,
  };
}

export function modrinthRecord(projectId: string, versionId: string, options: RecordOptions = {}): VersionRecord {
  return buildRecord({ platform: "modrinth", projectId, versionId }, options);
}

export function curseforgeRecord(projectId: number, versionId: number, options: RecordOptions = {}): VersionRecord {
  return buildRecord({ platform: "curseforge", projectId, versionId }, options);
}

/**
 * Content a fake record's download URL serves, matching its declared hashes.
 */
export function recordContent(record: VersionRecord): string {
  return `jar:${record.id.platform}:${record.id.projectId}:${record.id.versionId}`;
}

/**
 * Platform client over a fixed list of records. The newest version of a
 * project is the one registered last; `aliases` map slugs to project ids
 * and `delay` holds back answers for a project.
 */
export class FakePlatformClient<P extends PlatformName> implements PlatformClient<P> {
  readonly calls: string[] = [];
  private records: VersionRecord[] = [];
  private aliases = new Map<string, string>();
  private delays = new Map<string, number>();

  constructor(
    readonly platform: P,
    readonly displayName: string
  ) {}

  add(...records: VersionRecord[]): this {
    this.records.push(...records);
    return this;
  }

  alias(slug: string, projectId: string): this {
    this.aliases.set(slug, projectId);
    return this;
  }

  delay(projectId: string, ms: number): this {
    this.delays.set(projectId, ms);
    return this;
  }

  private async wait(project: string): Promise<void> {
    const ms = this.delays.get(project);
    if (ms !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, ms));
    }
  }

  private canonical(projectId: PlatformIdOf<P>): string {
    const key = String(projectId);
    return this.aliases.get(key) ?? key;
  }

  async fetchModVersion(projectId: PlatformIdOf<P>, versionId: PlatformIdOf<P>): Promise<VersionLookup> {
    this.calls.push(`version:${projectId}:${versionId}`);
    const project = this.canonical(projectId);
    await this.wait(project);
    const record = this.records.find(
      (r) => String(r.id.projectId) === project && String(r.id.versionId) === String(versionId)
    );
    return record ? { found: true, record } : { found: false, reason: `version ${versionId} of ${projectId} does not exist` };
  }

  async fetchLatestVersion(projectId: PlatformIdOf<P>, filter: VersionFilter): Promise<VersionLookup> {
    this.calls.push(`latest:${projectId}`);
    const project = this.canonical(projectId);
    await this.wait(project);
    const candidates = this.records.filter(
      (r) => String(r.id.projectId) === project && r.gameVersions.includes(filter.gameVersion)
    );
    const record = candidates[candidates.length - 1];
    return record ? { found: true, record } : { found: false, reason: `${projectId} has no version for ${filter.gameVersion}` };
  }
}

export function createFakePlatformClients(): PlatformClients & {
  curseforge: FakePlatformClient<"curseforge">;
  modrinth: FakePlatformClient<"modrinth">;
} {
  return {
    curseforge: new FakePlatformClient("curseforge", "CurseForge"),
    modrinth: new FakePlatformClient("modrinth", "Modrinth"),
  };
}

export const BOTH: SideRequirements = { client: "required", server: "required" };
export const CLIENT: SideRequirements = { client: "required", server: "unsupported" };
export const SERVER: SideRequirements = { client: "unsupported", server: "required" };
export const OPTIONAL: SideRequirements = { client: "optional", server: "optional" };

export function resolvedMod(
  key: string,
  record: VersionRecord,
  side: SideRequirements = BOTH,
  origin: ModOrigin = "direct"
): ResolvedMod {
  return { key, id: record.id, side, origin, requiredBy: [], version: record };
}

/**
 * HTTP responses serving each record's file at its download URL.
 */
export function downloadResponses(records: VersionRecord[]): Map<string, Response> {
  const responses = new Map<string, Response>();
  for (const record of records) {
    if (record.downloadUrl) {
      responses.set(record.downloadUrl, binaryResponse(Buffer.from(recordContent(record))));
    }
  }
  return responses;
}
