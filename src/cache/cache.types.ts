import type { FileSystem, HttpClient, Limiter, Logger } from "#/core";
import type { RetryPolicy } from "#/platform";

/**
 * A mod file present in the local store
 */
export interface CachedArtifact {
  path: string;
  size: number;
  /** Both digests, computed from the stored bytes */
  hashes: { sha1: string; sha512: string };
}

export interface ArtifactCacheOptions {
  fs: FileSystem;
  http: HttpClient;
  cacheDir: string;
  retry: RetryPolicy;
  /** Bounds simultaneous downloads */
  limiter: Limiter;
  logger: Logger;
}
