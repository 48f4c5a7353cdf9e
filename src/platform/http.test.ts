import { describe, test, expect } from "vitest";
import { ConfigurationError, TransientNetworkError } from "#/errors";
import { createMockHttpClient, errorResponse, jsonResponse } from "#/test-utils/mocks";
import { fetchBinary, fetchJson, isRetryableStatus } from "./http";

const URL = "https://api.test/v1/thing";
const policy = { attempts: 3, delayMs: 0 };

function sequence(...responses: Array<Response | Error>): () => Promise<Response> {
  let index = 0;
  return async () => {
    const next = responses[Math.min(index++, responses.length - 1)];
    if (!next || next instanceof Error) {
      throw next ?? new Error("no response");
    }
    return next;
  };
}

describe("http", () => {
  test("isRetryableStatus covers throttling and server errors", () => {
    expect([408, 425, 429, 500, 503].every(isRetryableStatus)).toBe(true);
    expect([400, 401, 403, 404].some(isRetryableStatus)).toBe(false);
  });

  test("returns the parsed body", async () => {
    const http = createMockHttpClient(new Map([[URL, jsonResponse({ id: 1 })]]));

    expect(await fetchJson(http, URL, {}, policy)).toEqual({ found: true, value: { id: 1 } });
  });

  test("404 and 410 are answers, not retried", async () => {
    const http = createMockHttpClient(new Map([[URL, errorResponse(410, "Gone")]]));

    expect(await fetchJson(http, URL, {}, policy)).toEqual({ found: false, status: 410 });
    expect(http.callCount(URL)).toBe(1);
  });

  test("retries transient failures until one succeeds", async () => {
    const http = createMockHttpClient(
      new Map([[URL, sequence(errorResponse(503, "Service Unavailable"), new Error("socket hang up"), jsonResponse([]))]])
    );

    expect(await fetchJson(http, URL, {}, policy)).toEqual({ found: true, value: [] });
    expect(http.callCount(URL)).toBe(3);
  });

  test("gives up after the retry budget with the last reason", async () => {
    const http = createMockHttpClient(new Map([[URL, sequence(errorResponse(429, "Too Many Requests"))]]));

    await expect(fetchJson(http, URL, {}, policy)).rejects.toThrow(
      new TransientNetworkError(URL, 3, "HTTP 429 Too Many Requests")
    );
    expect(http.callCount(URL)).toBe(3);
  });

  test("client errors fail at once", async () => {
    const http = createMockHttpClient(new Map([[URL, errorResponse(403, "Forbidden")]]));

    await expect(fetchJson(http, URL, {}, policy)).rejects.toThrow(
      new ConfigurationError(`Request to ${URL} was rejected: HTTP 403 Forbidden`)
    );
    expect(http.callCount(URL)).toBe(1);
  });

  test("fetchBinary returns the raw bytes", async () => {
    const http = createMockHttpClient(new Map([[URL, new Response("jar-bytes")]]));

    const outcome = await fetchBinary(http, URL, {}, policy);

    expect(outcome.found && outcome.value.toString()).toBe("jar-bytes");
  });
});
