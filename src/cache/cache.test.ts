import { describe, test, expect } from "vitest";
import { createLimiter } from "#/core";
import { ConfigurationError, IntegrityError, NotFoundError } from "#/errors";
import { modrinthRecord, recordContent, sha1, sha512 } from "#/test-utils/fakes";
import {
  binaryResponse,
  createMockFileSystem,
  createMockHttpClient,
  createMockLogger,
  type MockResponse,
} from "#/test-utils/mocks";
import { ArtifactCache, preferredDigest } from "./cache";

function setup(responses: Map<string, MockResponse> = new Map(), attempts = 1) {
  const fs = createMockFileSystem();
  const http = createMockHttpClient(responses);
  const logger = createMockLogger();
  const cache = new ArtifactCache({
    fs,
    http,
    cacheDir: "/cache",
    retry: { attempts, delayMs: 0 },
    limiter: createLimiter(2),
    logger,
  });
  return { fs, http, logger, cache };
}

describe("cache", () => {
  describe("preferredDigest", () => {
    test("prefers sha512 over sha1 over md5", () => {
      expect(preferredDigest({ md5: "aa", sha1: "BB", sha512: "cc" })).toEqual({ algorithm: "sha512", hex: "cc" });
      expect(preferredDigest({ md5: "aa", sha1: "BB" })).toEqual({ algorithm: "sha1", hex: "bb" });
      expect(preferredDigest({})).toBeUndefined();
    });
  });

  describe("materialize", () => {
    test("downloads into the content-addressed store", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const content = recordContent(record);
      const { fs, cache } = setup(new Map([[record.downloadUrl ?? "", binaryResponse(Buffer.from(content))]]));
      const hex = sha512(content);

      const artifact = await cache.materialize(record);

      expect(artifact.path).toBe(`/cache/sha512/${hex.slice(0, 2)}/${hex}`);
      expect(artifact.size).toBe(Buffer.byteLength(content));
      expect(artifact.hashes).toEqual({ sha1: sha1(content), sha512: hex });
      expect(fs.readFile(artifact.path)).toBe(content);
    });

    test("concurrent requests for the same hash download once", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const url = record.downloadUrl ?? "";
      const { http, cache } = setup(new Map([[url, binaryResponse(Buffer.from(recordContent(record)))]]));

      const [first, second] = await Promise.all([cache.materialize(record), cache.materialize(record)]);

      expect(http.callCount(url)).toBe(1);
      expect(second.path).toBe(first.path);
      expect(second.hashes).toEqual(first.hashes);
    });

    test("serves a stored file without network access", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const url = record.downloadUrl ?? "";
      const { http, cache } = setup(new Map([[url, binaryResponse(Buffer.from(recordContent(record)))]]));
      await cache.materialize(record);

      const again = await cache.materialize(record);

      expect(http.callCount(url)).toBe(1);
      expect(again.hashes.sha512).toBe(sha512(recordContent(record)));
    });

    test("rejects bytes that do not match the declared hash and stores nothing", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const url = record.downloadUrl ?? "";
      const { fs, cache } = setup(new Map([[url, binaryResponse(Buffer.from("tampered"))]]));

      await expect(cache.materialize(record)).rejects.toBeInstanceOf(IntegrityError);

      expect([...fs.files.keys()]).toEqual([]);
    });

    test("does not retry a download whose hash does not match", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const url = record.downloadUrl ?? "";
      const { http, cache } = setup(new Map([[url, binaryResponse(Buffer.from("tampered"))]]), 3);

      await expect(cache.materialize(record)).rejects.toBeInstanceOf(IntegrityError);

      expect(http.callCount(url)).toBe(1);
    });

    test("the download limiter caps concurrent downloads", async () => {
      const records = ["a1", "b1", "c1", "d1", "e1"].map((versionId) => modrinthRecord(versionId.toUpperCase(), versionId));
      let inFlight = 0;
      let peak = 0;
      const responses = new Map<string, MockResponse>(
        records.map((record) => [
          record.downloadUrl ?? "",
          async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 10));
            inFlight--;
            return binaryResponse(Buffer.from(recordContent(record)));
          },
        ])
      );
      const { http, cache } = setup(responses);

      await Promise.all(records.map((record) => cache.materialize(record)));

      expect(peak).toBe(2);
      expect(http.calls).toHaveLength(5);
    });

    test("keys a file without declared hashes by its computed sha512", async () => {
      const record = { ...modrinthRecord("AAAA", "a1"), hashes: {} };
      const url = record.downloadUrl ?? "";
      const { cache } = setup(new Map([[url, binaryResponse(Buffer.from("unhashed"))]]));
      const hex = sha512("unhashed");

      const artifact = await cache.materialize(record);

      expect(artifact.path).toBe(`/cache/sha512/${hex.slice(0, 2)}/${hex}`);
    });

    test("reports a missing download as NotFoundError", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const { cache } = setup();

      await expect(cache.materialize(record, "alpha")).rejects.toThrow(
        new NotFoundError("alpha", "download of aaaa-a1.jar returned HTTP 404")
      );
    });

    test("refuses a record without a download URL", async () => {
      const record = modrinthRecord("AAAA", "a1", { downloadUrl: null });
      const { cache } = setup();

      await expect(cache.materialize(record, "alpha")).rejects.toBeInstanceOf(ConfigurationError);
    });

    test("logs each completed download", async () => {
      const record = modrinthRecord("AAAA", "a1");
      const { logger, cache } = setup(
        new Map([[record.downloadUrl ?? "", binaryResponse(Buffer.from(recordContent(record)))]])
      );

      await cache.materialize(record);

      expect(logger.messages("info")).toEqual(["Downloaded aaaa-a1.jar (20 B)"]);
    });
  });
});
