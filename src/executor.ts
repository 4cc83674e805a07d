import { AdminApiError, describeError } from "./errors";
import type { ApiRecord, ApiResponse, QueryParams } from "./types";

/** Retries spent on 429 responses before the request is given up. */
export const MAX_RATE_LIMIT_RETRIES = 5;

/** Pause after every successful request, keeping callers under the bucket rate. */
export const SUCCESS_PAUSE_MS = 500;

const DEFAULT_RETRY_AFTER_SECONDS = 1;

/**
 * Issues one GET through the bound Admin REST client.
 */
export type RestGet = (path: string, query: QueryParams) => Promise<Response>;

export type RequestOutcome =
  | { kind: "success"; response: ApiResponse }
  | { kind: "rate-limited"; retryAfterSeconds: number; detail: string }
  | { kind: "failure"; error: AdminApiError };

export type ExecutorOptions = {
  sleep: (ms: number) => Promise<void>;
};

const isRecord = (value: unknown): value is ApiRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Whole seconds from a `Retry-After` header; Shopify sends values like "2.0".
 */
export function parseRetryAfter(value: string | null | undefined): number {
  if (value === null || value === undefined || !value.trim()) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  const seconds = Number.parseFloat(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }
  return Math.trunc(seconds);
}

function decodeJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function serializeErrors(errors: unknown): string {
  return typeof errors === "string" ? errors : JSON.stringify(errors);
}

/**
 * Performs a single GET and classifies the result. Never throws.
 */
export async function requestOnce(
  get: RestGet,
  path: string,
  query: QueryParams
): Promise<RequestOutcome> {
  let response: Response;
  let text: string;
  try {
    response = await get(path, query);
    text = await response.text();
  } catch (error) {
    return {
      kind: "failure",
      error: new AdminApiError(
        `Error fetching ${path}: ${describeError(error)}`,
        { path, detail: describeError(error), cause: error }
      ),
    };
  }

  const decoded = decodeJson(text);
  const errors = isRecord(decoded) ? decoded.errors : undefined;

  if (response.status === 429) {
    return {
      kind: "rate-limited",
      retryAfterSeconds: parseRetryAfter(response.headers.get("Retry-After")),
      detail: errors !== undefined ? serializeErrors(errors) : text,
    };
  }

  if (!response.ok) {
    const detail = errors !== undefined ? serializeErrors(errors) : text;
    return {
      kind: "failure",
      error: new AdminApiError(
        `Error fetching ${path}: HTTP ${response.status} ${detail}`.trim(),
        { path, status: response.status, detail }
      ),
    };
  }

  if (!isRecord(decoded)) {
    return {
      kind: "failure",
      error: new AdminApiError(
        `Error fetching ${path}: response body is not a JSON object`,
        { path, status: response.status, detail: text }
      ),
    };
  }

  if ("errors" in decoded) {
    const detail = JSON.stringify(errors);
    return {
      kind: "failure",
      error: new AdminApiError(`API Error: ${detail}`, {
        path,
        status: response.status,
        detail,
      }),
    };
  }

  return {
    kind: "success",
    response: {
      status: response.status,
      headers: response.headers,
      body: decoded,
    },
  };
}

/**
 * Runs one logical GET, absorbing up to five 429 responses with the
 * server-directed delay. Any other failure is raised on the first attempt.
 */
export async function executeRequest(
  get: RestGet,
  path: string,
  query: QueryParams,
  options: ExecutorOptions
): Promise<ApiResponse> {
  let retries = 0;

  for (;;) {
    const outcome = await requestOnce(get, path, query);

    switch (outcome.kind) {
      case "success":
        await options.sleep(SUCCESS_PAUSE_MS);
        return outcome.response;

      case "rate-limited": {
        if (retries >= MAX_RATE_LIMIT_RETRIES) {
          throw new AdminApiError(
            `Error fetching ${path}: rate limited after ${retries} retries`,
            { path, status: 429, detail: outcome.detail }
          );
        }
        retries++;
        const delayMs = outcome.retryAfterSeconds * 1000;
        console.warn(
          `Rate limited fetching ${path}, retry ${retries}/${MAX_RATE_LIMIT_RETRIES} in ${delayMs}ms`
        );
        await options.sleep(delayMs);
        break;
      }

      case "failure":
        throw outcome.error;
    }
  }
}
