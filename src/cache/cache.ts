/**
 * Content-addressed artifact cache
 *
 * Files live at <cacheDir>/<algo>/<first two hex chars>/<hex> and are never
 * modified once written. Concurrent requests for the same digest share one
 * download.
 */

import { createHash, randomUUID } from "crypto";
import { dirname, join } from "path";
import { SingleFlight } from "#/core";
import { USER_AGENT } from "#/constants";
import { ConfigurationError, IntegrityError, NotFoundError, withFilesystem } from "#/errors";
import { formatBytes } from "#/formatters";
import { fetchBinary, type FileHashes, type HashAlgorithm, type VersionRecord } from "#/platform";
import type { ArtifactCacheOptions, CachedArtifact } from "./cache.types";

const HASH_PREFERENCE: HashAlgorithm[] = ["sha512", "sha1", "md5"];

export interface Digest {
  algorithm: HashAlgorithm;
  hex: string;
}

export function digest(algorithm: HashAlgorithm, content: Buffer): string {
  return createHash(algorithm).update(content).digest("hex");
}

/**
 * Strongest digest the platform declared, if any.
 */
export function preferredDigest(hashes: FileHashes): Digest | undefined {
  for (const algorithm of HASH_PREFERENCE) {
    const hex = hashes[algorithm];
    if (hex) {
      return { algorithm, hex: hex.toLowerCase() };
    }
  }
  return undefined;
}

export class ArtifactCache {
  private flights = new SingleFlight<CachedArtifact>();

  constructor(private options: ArtifactCacheOptions) {}

  storePath(entry: Digest): string {
    return join(this.options.cacheDir, entry.algorithm, entry.hex.slice(0, 2), entry.hex);
  }

  /**
   * Return a local copy of the record's file, downloading it on a miss.
   *
   * @param label - Name used in errors, usually the mod key
   */
  materialize(record: VersionRecord, label: string = record.fileName): Promise<CachedArtifact> {
    const url = record.downloadUrl;
    if (!url) {
      return Promise.reject(
        new ConfigurationError(`${label}: ${record.fileName} has no download URL. Add it to overrides/mods/ instead.`)
      );
    }

    const declared = preferredDigest(record.hashes);
    const key = declared ? `${declared.algorithm}:${declared.hex}` : `url:${url}`;
    return this.flights.run(key, () => this.fetchIntoStore(record, url, declared, label));
  }

  private describe(path: string, content: Buffer): CachedArtifact {
    return {
      path,
      size: content.length,
      hashes: { sha1: digest("sha1", content), sha512: digest("sha512", content) },
    };
  }

  private readStored(path: string): CachedArtifact {
    const { fs } = this.options;
    return this.describe(path, withFilesystem(path, () => fs.readFileBinary(path)));
  }

  private async fetchIntoStore(
    record: VersionRecord,
    url: string,
    declared: Digest | undefined,
    label: string
  ): Promise<CachedArtifact> {
    const { fs, http, limiter, retry, logger } = this.options;

    if (declared) {
      const cachedPath = this.storePath(declared);
      if (fs.exists(cachedPath)) {
        logger.debug(`Cache hit for ${record.fileName}`);
        return this.readStored(cachedPath);
      }
    }

    logger.debug(`Downloading ${url}`);
    const outcome = await limiter(() => fetchBinary(http, url, { "User-Agent": USER_AGENT }, retry));
    if (!outcome.found) {
      throw new NotFoundError(label, `download of ${record.fileName} returned HTTP ${outcome.status}`);
    }
    const content = outcome.value;

    if (declared) {
      const actual = digest(declared.algorithm, content);
      if (actual !== declared.hex) {
        throw new IntegrityError(url, `${declared.algorithm}:${declared.hex}`, `${declared.algorithm}:${actual}`);
      }
    }

    const entry = declared ?? { algorithm: "sha512" as const, hex: digest("sha512", content) };
    const path = this.storePath(entry);
    if (!fs.exists(path)) {
      this.writeAtomically(path, content);
    }

    logger.info(`Downloaded ${record.fileName} (${formatBytes(content.length)})`);
    return this.describe(path, content);
  }

  /**
   * Write beside the final path, then rename into place.
   * Readers never see a partial entry.
   */
  private writeAtomically(path: string, content: Buffer): void {
    const { fs } = this.options;
    const tempPath = `${path}.tmp-${randomUUID()}`;

    withFilesystem(path, () => {
      fs.mkdir(dirname(path), { recursive: true });
      try {
        fs.writeFileBinary(tempPath, content);
        fs.rename(tempPath, path);
      } finally {
        if (fs.exists(tempPath)) {
          fs.unlink(tempPath);
        }
      }
    });
  }
}
