/**
 * Platform module
 *
 * Fetches mod version metadata from CurseForge and Modrinth and
 * normalizes it into VersionRecord.
 */

// Types
export * from "./platform.types";

// HTTP plumbing (retry, not-found handling)
export { fetchWithRetry, fetchJson, fetchBinary, isRetryableStatus, type HttpOutcome } from "./http";

// Dispatch helpers
export * from "./lookup";

// Factory (client creation)
export { createPlatformClients, retryPolicyFromSettings } from "./factory";

// Clients (direct access if needed)
export { CurseForgeClient, sideHintFromGameVersions } from "./clients/curseforge";
export { ModrinthClient, compatibleLoaders } from "./clients/modrinth";
