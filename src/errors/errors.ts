/**
 * Error taxonomy
 *
 * Every fatal condition in the engine is one of these classes.
 * The CLI only needs `instanceof ModpackError` to pick an exit code;
 * `code` is stable for scripting and tests.
 */

export type ModpackErrorCode =
  | "CONFIGURATION"
  | "NOT_FOUND"
  | "DEPENDENCY_UNRESOLVABLE"
  | "INCOMPATIBLE_MODS"
  | "MOD_VERIFICATION"
  | "INTEGRITY"
  | "TRANSIENT_NETWORK"
  | "UNEXPECTED_RESPONSE"
  | "FILESYSTEM"
  | "RESOLUTION_FAILED";

export abstract class ModpackError extends Error {
  abstract readonly code: ModpackErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing configuration. Raised before any network access.
 */
export class ConfigurationError extends ModpackError {
  readonly code = "CONFIGURATION" as const;

  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(details.length > 0 ? `${message}\n  ${details.join("\n  ")}` : message);
  }
}

/**
 * A configured project or version does not exist on its platform.
 */
export class NotFoundError extends ModpackError {
  readonly code = "NOT_FOUND" as const;

  constructor(
    readonly modKey: string,
    readonly reason: string
  ) {
    super(`Mod ${modKey}: ${reason}`);
  }
}

/**
 * A required transitive dependency could not be fetched.
 */
export class DependencyUnresolvableError extends ModpackError {
  readonly code: ModpackErrorCode = "DEPENDENCY_UNRESOLVABLE";

  constructor(
    readonly modKey: string,
    readonly dependency: string,
    message?: string
  ) {
    super(message ?? `Mod ${modKey} requires ${dependency}, which could not be resolved`);
  }
}

/**
 * Two mods in the final set declare an incompatibility.
 */
export class IncompatibleModsError extends DependencyUnresolvableError {
  override readonly code: ModpackErrorCode = "INCOMPATIBLE_MODS";

  constructor(modKey: string, conflictingKey: string) {
    super(modKey, conflictingKey, `Mod ${modKey} is incompatible with ${conflictingKey}, but both are in the pack`);
  }
}

/**
 * A directly configured mod failed a pack-level check (game version, distribution rights).
 */
export class ModVerificationError extends ModpackError {
  readonly code = "MOD_VERIFICATION" as const;

  constructor(
    readonly modKey: string,
    readonly reason: string
  ) {
    super(`Mod ${modKey}: ${reason}`);
  }
}

/**
 * Downloaded bytes do not match the platform-declared hash. Never retried.
 */
export class IntegrityError extends ModpackError {
  readonly code = "INTEGRITY" as const;

  constructor(
    readonly url: string,
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Integrity check failed for ${url}: expected ${expected}, got ${actual}`);
  }
}

/**
 * Timeout, rate limit or server error that outlived the retry budget.
 */
export class TransientNetworkError extends ModpackError {
  readonly code = "TRANSIENT_NETWORK" as const;

  constructor(
    readonly url: string,
    readonly attempts: number,
    reason: string
  ) {
    super(`Request to ${url} failed after ${attempts} attempt(s): ${reason}`);
  }
}

/**
 * A platform answered, but not in the shape its API documents. Never retried.
 */
export class UnexpectedResponseError extends ModpackError {
  readonly code = "UNEXPECTED_RESPONSE" as const;

  constructor(
    readonly url: string,
    readonly issues: string[]
  ) {
    super(`Unexpected response from ${url}: ${issues.join("; ")}`);
  }
}

/**
 * Cache or output write failure.
 */
export class FilesystemError extends ModpackError {
  readonly code = "FILESYSTEM" as const;

  constructor(
    readonly path: string,
    cause: unknown
  ) {
    super(`Filesystem error at ${path}: ${describeError(cause)}`, { cause });
  }
}

/**
 * Several mods failed in the same resolution pass. Failures are ordered by mod key.
 */
export class ResolutionFailedError extends ModpackError {
  readonly code = "RESOLUTION_FAILED" as const;

  constructor(readonly failures: ModpackError[]) {
    super(`${failures.length} mods failed resolution:\n  ${failures.map((f) => f.message).join("\n  ")}`);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Run a synchronous filesystem operation, wrapping anything it throws in FilesystemError.
 */
export function withFilesystem<T>(path: string, operation: () => T): T {
  try {
    return operation();
  } catch (err) {
    if (err instanceof ModpackError) {
      throw err;
    }
    throw new FilesystemError(path, err);
  }
}
