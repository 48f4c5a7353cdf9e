export { ArtifactCache, digest, preferredDigest, type Digest } from "./cache";
export type { CachedArtifact, ArtifactCacheOptions } from "./cache.types";
