/**
 * Test utilities - Wired contexts over the in-memory mocks
 */

import { ArtifactCache } from "#/cache";
import { createLimiter } from "#/core";
import type { ExportContext } from "#/export";
import type { VersionRecord } from "#/platform";
import type { PackMetadata } from "#/schemas";
import { downloadResponses } from "./fakes";
import { createMockFileSystem, createMockHttpClient, createMockLogger } from "./mocks";

export const TEST_PACK: PackMetadata = {
  name: "Test Pack",
  description: "A pack for tests",
  author: "tester",
  version: "1.0.0",
  minecraftVersion: "1.20.1",
  modLoader: { id: "fabric", version: "0.15.11" },
};

export function createTestExportContext(records: VersionRecord[] = []) {
  const fs = createMockFileSystem();
  const http = createMockHttpClient(downloadResponses(records));
  const logger = createMockLogger();
  const cache = new ArtifactCache({
    fs,
    http,
    cacheDir: "/cache",
    retry: { attempts: 1, delayMs: 0 },
    limiter: createLimiter(4),
    logger,
  });
  const ctx: ExportContext = { fs, cache, logger };
  return { fs, http, logger, cache, ctx };
}
