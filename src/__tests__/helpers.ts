import { vi } from "vitest";
import { createHttpClient } from "../fetcher/index.js";
import { Session } from "../fetcher/session.js";
import type { DatasetFetchConfig } from "../types.js";
import { CONFIG_DEFAULTS } from "../types.js";

// ---------------------------------------------------------------------------
// Shared fixtures for tests that replace globalThis.fetch.
// ---------------------------------------------------------------------------

/** A route answers a request with a response, possibly depending on the request. */
export type Route = Response | ((init: RequestInit | undefined) => Response);

/** Build an HTML response. */
export function htmlResponse(
  body: string,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/html; charset=utf-8", ...headers },
  });
}

/** Build a binary response with the given content type. */
export function binaryResponse(
  body: string,
  contentType = "application/octet-stream",
  headers: Record<string, string> = {},
): Response {
  return new Response(body, {
    status: 200,
    headers: { "content-type": contentType, ...headers },
  });
}

/** Build a redirect response. */
export function redirectResponse(
  location: string,
  status = 302,
  headers: Record<string, string> = {},
): Response {
  return new Response(null, { status, headers: { location, ...headers } });
}

/** The URL string of a fetch input. */
export function requestUrl(input: RequestInfo | URL): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * Create a fetch mock that answers from a table of exact URLs.
 * Unknown URLs get a 404. Static responses are cloned per call so a
 * route can be hit more than once.
 */
export function routeFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const route = routes[requestUrl(input)];
    if (route === undefined) {
      return new Response("not found", {
        status: 404,
        headers: { "content-type": "text/plain" },
      });
    }
    return typeof route === "function" ? route(init) : route.clone();
  });
}

/** URLs requested from a fetch mock, in order. */
export function requestedUrls(mockFetch: ReturnType<typeof routeFetch>): string[] {
  return mockFetch.mock.calls.map(([input]) => requestUrl(input));
}

/** Fast, single-attempt client settings for tests. */
export const TEST_CLIENT_CONFIG = {
  maxAttempts: 1,
  retryDelay: 0,
  pageTimeout: 5_000,
  fileTimeout: 5_000,
  hostInterval: 0,
} satisfies Partial<DatasetFetchConfig>;

/** Create a Session over a real client that calls globalThis.fetch. */
export function createTestSession(): Session {
  return new Session(createHttpClient(TEST_CLIENT_CONFIG));
}

/** A complete config with no delays, for engine tests. */
export function makeConfig(overrides: Partial<DatasetFetchConfig> = {}): DatasetFetchConfig {
  return {
    ...CONFIG_DEFAULTS,
    ...TEST_CLIENT_CONFIG,
    url: "https://data.test/",
    pageDelay: 0,
    downloadDelay: 0,
    ...overrides,
  };
}
