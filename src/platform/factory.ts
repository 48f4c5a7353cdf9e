/**
 * Platform client factory
 *
 * Single decision point for creating platform clients.
 * Each platform gets its own request limiter so neither can exceed the cap.
 */

import { createLimiter, type EngineContext } from "#/core";
import type { EngineSettings } from "#/schemas";
import { CurseForgeClient } from "./clients/curseforge";
import { ModrinthClient } from "./clients/modrinth";
import type { PlatformClients, RetryPolicy } from "./platform.types";

export function retryPolicyFromSettings(settings: EngineSettings): RetryPolicy {
  return { attempts: settings.retryAttempts, delayMs: settings.retryDelayMs };
}

export function createPlatformClients(
  ctx: Pick<EngineContext, "http" | "tokens" | "logger">,
  settings: EngineSettings
): PlatformClients {
  const retry = retryPolicyFromSettings(settings);

  return {
    curseforge: new CurseForgeClient({
      http: ctx.http,
      apiKey: ctx.tokens.getApiKey("curseforge"),
      retry,
      limiter: createLimiter(settings.maxConcurrentRequests),
      logger: ctx.logger,
    }),
    modrinth: new ModrinthClient({
      http: ctx.http,
      apiKey: ctx.tokens.getApiKey("modrinth"),
      retry,
      limiter: createLimiter(settings.maxConcurrentRequests),
      logger: ctx.logger,
    }),
  };
}
