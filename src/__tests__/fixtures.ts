import { AdminClient, type AdminClientOptions } from "../index";
import type { AdminSettings } from "../types";

export const shopHost = "example.myshopify.com";
export const apiBase = `https://${shopHost}/admin/api/2025-10/`;

export const settings: AdminSettings = {
  apiKey: "test-key",
  apiSecretKey: "test-secret",
  hostName: shopHost,
  accessToken: "test-token",
};

export const jsonResponse = (
  data: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response =>
  new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });

export const throttledResponse = (retryAfter?: string): Response =>
  jsonResponse(
    { errors: "Exceeded 2 calls per second for api client." },
    429,
    retryAfter === undefined ? {} : { "Retry-After": retryAfter }
  );

export const linkHeader = (
  links: Array<{ pageInfo: string; rel: "next" | "previous" }>
): string =>
  links
    .map(
      ({ pageInfo, rel }) =>
        `<${apiBase}products.json?limit=250&page_info=${pageInfo}>; rel="${rel}"`
    )
    .join(", ");

export const getHeader = (headers: unknown, name: string): string | null => {
  const lower = name.toLowerCase();
  if (headers && typeof headers === "object") {
    if (headers instanceof Headers) {
      return headers.get(name);
    }
    if (Array.isArray(headers)) {
      for (const entry of headers) {
        if (!Array.isArray(entry) || entry.length < 2) continue;
        const [k, v] = entry;
        if (typeof k === "string" && k.toLowerCase() === lower) {
          return typeof v === "string" ? v : null;
        }
      }
      return null;
    }
    for (const [k, v] of Object.entries(headers)) {
      if (k.toLowerCase() === lower) return typeof v === "string" ? v : null;
    }
  }
  return null;
};

export type FetchMock = jest.Mock<
  Promise<Response>,
  [url: string, init?: { headers?: unknown }]
>;

export function makeFetch(
  handler: (url: URL, callIndex: number) => Response | Promise<Response>
): FetchMock {
  let calls = 0;
  return jest.fn(async (url: string, _init?: { headers?: unknown }) =>
    handler(new URL(url), calls++)
  );
}

export function requestedUrl(fetchApi: FetchMock, callIndex: number): URL {
  const call = fetchApi.mock.calls[callIndex];
  if (!call) throw new Error(`No request #${callIndex}`);
  return new URL(call[0]);
}

export function makeClient(
  fetchApi: FetchMock,
  overrides: { settings?: AdminSettings; options?: AdminClientOptions } = {}
) {
  const sleep = jest.fn((_ms: number) => Promise.resolve());
  const admin = new AdminClient(overrides.settings ?? settings, {
    fetchApi,
    sleep,
    ...overrides.options,
  });
  return { admin, sleep };
}
