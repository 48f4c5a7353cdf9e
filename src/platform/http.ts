/**
 * HTTP plumbing shared by the platform clients and the download cache.
 *
 * 404/410 are answers, not failures, and are never retried.
 * 408/425/429/5xx and thrown fetches are retried with linear backoff.
 */

import type { HttpClient } from "#/core";
import { ConfigurationError, TransientNetworkError, describeError } from "#/errors";
import type { RetryPolicy } from "./platform.types";

export type HttpOutcome<T> =
  | { found: true; value: T }
  | { found: false; status: number };

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

function statusLine(response: Response): string {
  return `HTTP ${response.status} ${response.statusText}`.trim();
}

/**
 * Fetch `url` and read the body with `read`, retrying transient failures.
 * A body that fails to read counts as a transient failure too.
 */
export async function fetchWithRetry<T>(
  http: HttpClient,
  url: string,
  init: RequestInit,
  policy: RetryPolicy,
  read: (response: Response) => Promise<T>
): Promise<HttpOutcome<T>> {
  let lastReason = "no attempt was made";

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      const response = await http.fetch(url, init);

      if (response.ok) {
        return { found: true, value: await read(response) };
      }

      if (response.status === 404 || response.status === 410) {
        return { found: false, status: response.status };
      }

      if (!isRetryableStatus(response.status)) {
        throw new ConfigurationError(`Request to ${url} was rejected: ${statusLine(response)}`);
      }

      lastReason = statusLine(response);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        throw err;
      }
      lastReason = describeError(err);
    }

    if (attempt < policy.attempts) {
      await wait(policy.delayMs * attempt);
    }
  }

  throw new TransientNetworkError(url, policy.attempts, lastReason);
}

export function fetchJson(
  http: HttpClient,
  url: string,
  headers: Record<string, string>,
  policy: RetryPolicy
): Promise<HttpOutcome<unknown>> {
  return fetchWithRetry(http, url, { headers }, policy, (response) => response.json());
}

export async function fetchBinary(
  http: HttpClient,
  url: string,
  headers: Record<string, string>,
  policy: RetryPolicy
): Promise<HttpOutcome<Buffer>> {
  return fetchWithRetry(http, url, { headers, redirect: "follow" }, policy, async (response) =>
    Buffer.from(await response.arrayBuffer())
  );
}
