/**
 * Raised when the Admin API rejects a request, answers with an `errors`
 * payload, or keeps throttling past the retry ceiling.
 */
export class AdminApiError extends Error {
  readonly path: string;
  readonly status?: number;
  /** Serialized error payload or raw response text. */
  readonly detail: string;

  constructor(
    message: string,
    context: { path: string; status?: number; detail: string; cause?: unknown }
  ) {
    super(message, { cause: context.cause });
    this.name = "AdminApiError";
    this.path = context.path;
    this.status = context.status;
    this.detail = context.detail;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

/**
 * Raised when a client is requested but the settings cannot produce a session.
 */
export class AdminApiConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AdminApiConfigError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error occurred";
}
