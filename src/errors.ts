export type ErrorClass = "retryable" | "terminal";

/** Non-2xx response from an upstream HTTP API. */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body?: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
  }
}

/** Raised once a retryable failure has used up every attempt. Always terminal. */
export class RetryExhaustedError extends Error {
  constructor(
    label: string,
    public readonly attempts: number,
    lastError: unknown,
  ) {
    super(`${label} failed after ${attempts} attempts: ${describeError(lastError)}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

const RETRYABLE_NETWORK_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function statusOf(error: Error): number | undefined {
  if (error instanceof HttpError) {
    return error.status;
  }
  // SDK errors (e.g. @google/genai ApiError) expose a numeric status
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function networkCodeOf(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  // undici wraps socket failures: TypeError("fetch failed", { cause })
  const cause = error.cause;
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return undefined;
}

export function classifyError(error: unknown): ErrorClass {
  if (!(error instanceof Error)) {
    return "terminal";
  }
  if (error instanceof RetryExhaustedError) {
    return "terminal";
  }
  // DOMException from AbortSignal.timeout() carries the same name
  if (error instanceof TimeoutError || error.name === "TimeoutError") {
    return "retryable";
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS_CODES.has(status) ? "retryable" : "terminal";
  }

  const code = networkCodeOf(error);
  if (code !== undefined && RETRYABLE_NETWORK_CODES.has(code)) {
    return "retryable";
  }
  if (error instanceof TypeError && error.message === "fetch failed") {
    return "retryable";
  }
  return "terminal";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
