/**
 * Dependency resolver
 *
 * Breadth-first over the remote dependency graph, one level at a time:
 * all fetches of a level run concurrently (bounded by the platform clients),
 * then results are expanded in claim order (configured mods by key, each
 * level's nodes in the order they were claimed) so claims, pinned versions
 * and generated keys never depend on response timing.
 */

import {
  ConfigurationError,
  DependencyUnresolvableError,
  IncompatibleModsError,
  ModVerificationError,
  NotFoundError,
  ResolutionFailedError,
  type ModpackError,
} from "#/errors";
import {
  compareKeys,
  describeModId,
  effectiveSide,
  joinSides,
  meetSides,
  projectKey,
  uniqueModKey,
  type ModReference,
  type ResolvedMod,
  type ResolvedPack,
  type SideRequirements,
} from "#/mods";
import {
  describeDependency,
  lookupDependency,
  lookupModVersion,
  platformDisplayName,
  type ModDependency,
  type PlatformClients,
  type VersionFilter,
} from "#/platform";
import type { Conflict, GraphEdge, GraphNode, ResolveOptions } from "./resolver.types";

const UNSUPPORTED_BOTH: SideRequirements = { client: "unsupported", server: "unsupported" };
const OPTIONAL_BOTH: SideRequirements = { client: "optional", server: "optional" };

interface Claim {
  node: GraphNode;
  dependency: ModDependency;
}

interface Failure {
  key: string;
  error: ModpackError;
}

function isIgnored(reference: ModReference | undefined, dependency: ModDependency): boolean {
  if (!reference) return false;
  if (reference.ignoredProjects.has(String(dependency.projectId))) return true;
  return dependency.versionId !== undefined && reference.ignoredVersions.has(String(dependency.versionId));
}

function sameSides(a: SideRequirements | undefined, b: SideRequirements): boolean {
  return a !== undefined && a.client === b.client && a.server === b.server;
}

class PackResolver {
  private nodes = new Map<string, GraphNode>();
  private edges: GraphEdge[] = [];
  private conflicts: Conflict[] = [];
  private failures: Failure[] = [];
  private filter: VersionFilter;

  constructor(
    private clients: PlatformClients,
    private options: ResolveOptions
  ) {
    this.filter = { gameVersion: options.gameVersion, loader: options.loader };
  }

  async resolve(references: readonly ModReference[]): Promise<ResolvedPack> {
    let frontier = await this.fetchDirect(references);

    while (frontier.length > 0) {
      const claimed = this.expand(frontier);
      frontier = await this.fetchDependencies(claimed);
    }

    this.assignDependencyKeys();
    this.computeSides();
    this.checkMissing();
    this.checkConflicts();

    if (this.failures.length > 0) {
      const ordered = [...this.failures].sort((a, b) => compareKeys(a.key, b.key));
      const [only] = ordered;
      throw ordered.length === 1 && only ? only.error : new ResolutionFailedError(ordered.map((f) => f.error));
    }

    return this.buildPack();
  }

  private keyOf(project: string): string {
    return this.nodes.get(project)?.key ?? project;
  }

  private fail(key: string, error: ModpackError): void {
    this.failures.push({ key, error });
  }

  /**
   * Level 0: every configured mod, in key order. Claims use the canonical
   * project id the platform reports, so a slug and an id for the same
   * project collide here.
   */
  private async fetchDirect(references: readonly ModReference[]): Promise<GraphNode[]> {
    const ordered = [...references].sort((a, b) => compareKeys(a.key, b.key));
    const lookups = await Promise.all(ordered.map((reference) => lookupModVersion(this.clients, reference.id)));
    const frontier: GraphNode[] = [];

    ordered.forEach((reference, index) => {
      const lookup = lookups[index];
      const platform = platformDisplayName(this.clients, reference.id.platform);

      if (!lookup || !lookup.found) {
        this.fail(reference.key, new NotFoundError(reference.key, lookup?.reason ?? `${describeModId(reference.id)} not found`));
        this.options.logger.error(`[${platform}] Mod (in config: ${reference.key}) FAILED verification.`);
        return;
      }

      const record = lookup.record;
      const project = projectKey(record.id);
      const existing = this.nodes.get(project);
      if (existing) {
        this.fail(
          reference.key,
          new ConfigurationError(`Mods ${existing.key} and ${reference.key} resolve to the same project ${project}`)
        );
        return;
      }

      const node: GraphNode = {
        project,
        key: reference.key,
        reference,
        record,
        side: effectiveSide(reference.sideOverride, record.side),
        failed: false,
      };
      this.nodes.set(project, node);

      const problem = this.verifyDirect(node);
      if (problem) {
        node.failed = true;
        this.fail(reference.key, new ModVerificationError(reference.key, problem));
        this.options.logger.error(`[${platform}] Mod (in config: ${reference.key}) FAILED verification.`);
        return;
      }

      this.options.logger.info(`[${platform}] Mod ${record.projectName} (in config: ${reference.key}) verified.`);
      frontier.push(node);
    });

    return frontier;
  }

  private verifyDirect(node: GraphNode): string | undefined {
    const record = node.record;
    if (!record) return undefined;
    if (!record.distributionAllowed) {
      return "The mod does not allow third-party distribution. Add its file to overrides/mods/ instead.";
    }
    if (!record.gameVersions.includes(this.options.gameVersion)) {
      return `Expected Minecraft version ${this.options.gameVersion}, but the file supports [${record.gameVersions.join(", ")}]`;
    }
    return undefined;
  }

  /**
   * Walk the frontier in claim order, each node's dependencies in declared
   * order, and claim unseen projects. Claiming is synchronous, so each
   * project is fetched at most once and the first requester wins.
   */
  private expand(frontier: GraphNode[]): Claim[] {
    const claimed: Claim[] = [];

    for (const node of frontier) {
      for (const dependency of node.record?.dependencies ?? []) {
        if (isIgnored(node.reference, dependency)) {
          this.options.logger.debug(`Ignoring dependency ${describeDependency(dependency)} of ${this.keyOf(node.project)}`);
          continue;
        }

        const target = projectKey(dependency);
        if (target === node.project) continue;

        const kind = dependency.kind;
        if (kind === "incompatible") {
          this.conflicts.push({ from: node.project, to: target });
          continue;
        }

        this.edges.push({ from: node.project, to: target, kind });

        if (!this.nodes.has(target)) {
          const pending: GraphNode = { project: target, claimedBy: dependency, failed: false };
          this.nodes.set(target, pending);
          claimed.push({ node: pending, dependency });
        }
      }
    }

    return claimed;
  }

  private async fetchDependencies(claimed: Claim[]): Promise<GraphNode[]> {
    const lookups = await Promise.all(
      claimed.map(({ dependency }) => lookupDependency(this.clients, dependency, this.filter))
    );
    const frontier: GraphNode[] = [];

    claimed.forEach(({ node }, index) => {
      const lookup = lookups[index];
      if (!lookup || !lookup.found) {
        node.missingReason = lookup?.reason ?? `${node.project} not found`;
        return;
      }

      node.record = lookup.record;
      if (!lookup.record.distributionAllowed) {
        node.failed = true;
        return;
      }
      if (!lookup.record.gameVersions.includes(this.options.gameVersion)) {
        this.options.logger.warn(
          `Dependency ${lookup.record.projectName} (${lookup.record.versionName}) does not list Minecraft ${this.options.gameVersion}`
        );
      }
      frontier.push(node);
    });

    return frontier;
  }

  private dependencyNodes(): GraphNode[] {
    return [...this.nodes.values()]
      .filter((node) => !node.reference)
      .sort((a, b) => compareKeys(a.project, b.project));
  }

  private assignDependencyKeys(): void {
    const taken = new Set<string>();
    for (const node of this.nodes.values()) {
      if (node.key) taken.add(node.key);
    }

    for (const node of this.dependencyNodes()) {
      const projectId = node.claimedBy?.projectId ?? node.project;
      node.key = uniqueModKey(node.record?.projectName ?? String(projectId), projectId, taken);
      taken.add(node.key);
    }
  }

  /**
   * Dependency sides: meet(platform hint, join of incoming contributions).
   * An optional edge caps its contribution at optional. Iterated to a
   * fixpoint since a dependency's side feeds its own dependencies.
   */
  private computeSides(): void {
    const dependencies = this.dependencyNodes().filter((node) => node.record && !node.missingReason);
    for (const node of dependencies) {
      node.side = UNSUPPORTED_BOTH;
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const node of dependencies) {
        let wanted = UNSUPPORTED_BOTH;
        for (const edge of this.edges) {
          if (edge.to !== node.project) continue;
          const fromSide = this.nodes.get(edge.from)?.side;
          if (!fromSide) continue;
          wanted = joinSides(wanted, edge.kind === "optional" ? meetSides(fromSide, OPTIONAL_BOTH) : fromSide);
        }

        const next = meetSides(effectiveSide(undefined, node.record?.side), wanted);
        if (!sameSides(node.side, next)) {
          node.side = next;
          changed = true;
        }
      }
    }
  }

  private checkMissing(): void {
    const reported = new Set<string>();

    for (const edge of this.edges) {
      const target = this.nodes.get(edge.to);
      if (!target || !target.missingReason) continue;

      const from = this.keyOf(edge.from);
      const dependencyName = target.claimedBy ? describeDependency(target.claimedBy) : edge.to;
      if (edge.kind === "optional") {
        this.options.logger.info(`[FYI] Missing optional dependency for ${from}: ${dependencyName} (${target.missingReason})`);
        continue;
      }

      const id = `${edge.from}->${edge.to}`;
      if (reported.has(id)) continue;
      reported.add(id);
      this.fail(
        from,
        new DependencyUnresolvableError(
          from,
          dependencyName,
          `Mod ${from} requires ${dependencyName}, which could not be resolved: ${target.missingReason}`
        )
      );
    }

    for (const node of this.dependencyNodes()) {
      if (!node.failed || !node.record || !node.key) continue;
      const incoming = this.edges.filter((edge) => edge.to === node.project);
      const requiredBy = [
        ...new Set(incoming.filter((edge) => edge.kind === "required").map((edge) => this.keyOf(edge.from))),
      ].sort(compareKeys);

      if (requiredBy.length === 0) {
        const wantedBy = [...new Set(incoming.map((edge) => this.keyOf(edge.from)))].sort(compareKeys);
        this.options.logger.info(
          `[FYI] Skipping optional dependency ${node.record.projectName} of ${wantedBy.join(", ")}: it does not allow third-party distribution`
        );
        continue;
      }

      this.fail(
        node.key,
        new ModVerificationError(
          node.key,
          `${node.record.projectName} (required by ${requiredBy.join(", ")}) does not allow third-party distribution. Add its file to overrides/mods/ and ignore the dependency.`
        )
      );
    }
  }

  private checkConflicts(): void {
    const reported = new Set<string>();

    for (const conflict of this.conflicts) {
      const target = this.nodes.get(conflict.to);
      if (!target || !target.record || target.missingReason || (target.failed && !target.reference)) continue;

      const from = this.keyOf(conflict.from);
      const to = this.keyOf(conflict.to);
      const id = [from, to].sort(compareKeys).join("|");
      if (reported.has(id)) continue;
      reported.add(id);

      this.fail(from, new IncompatibleModsError(from, to));
    }
  }

  private buildPack(): ResolvedPack {
    const requesters = new Map<string, Set<string>>();
    for (const edge of this.edges) {
      const set = requesters.get(edge.to) ?? new Set<string>();
      set.add(this.keyOf(edge.from));
      requesters.set(edge.to, set);
    }

    const mods: ResolvedMod[] = [];
    for (const node of this.nodes.values()) {
      if (!node.record || !node.key || !node.side || node.missingReason || node.failed) continue;

      mods.push(
        Object.freeze({
          key: node.key,
          id: node.record.id,
          side: Object.freeze({ ...node.side }),
          origin: node.reference ? ("direct" as const) : ("dependency" as const),
          requiredBy: Object.freeze([...(requesters.get(node.project) ?? [])].sort(compareKeys)),
          version: node.record,
        })
      );

      if (!node.reference) {
        const platform = platformDisplayName(this.clients, node.record.id.platform);
        this.options.logger.info(`[${platform}] Added dependency ${node.record.projectName} (as ${node.key})`);
      }
    }

    mods.sort((a, b) => compareKeys(a.key, b.key));
    return Object.freeze({ mods: Object.freeze(mods) });
  }
}

/**
 * Compute the closure of the configured mods.
 *
 * Fails when a configured mod is missing or fails verification, when a
 * required dependency cannot be fetched, or when two mods in the final set
 * are declared incompatible.
 */
export function resolvePack(
  references: readonly ModReference[],
  clients: PlatformClients,
  options: ResolveOptions
): Promise<ResolvedPack> {
  return new PackResolver(clients, options).resolve(references);
}
