import { classifyError, describeError, RetryExhaustedError, TimeoutError, type ErrorClass } from "./errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  /** Replaced in tests to observe the backoff schedule without waiting. */
  sleep?: (ms: number) => Promise<void>;
}

export interface RetryOptions extends RetryPolicy {
  label: string;
  timeoutMs?: number;
  classify?: (error: unknown) => ErrorClass;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before the attempt following `attempt` (1-based): base, 2x base, 4x base...
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

async function runAttempt<T>(
  call: (signal: AbortSignal) => Promise<T>,
  label: string,
  timeoutMs: number | undefined,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    return call(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Runs one outbound call with per-attempt timeout and exponential backoff.
 * Terminal errors are rethrown untouched; a retryable error on the last attempt
 * becomes a RetryExhaustedError.
 */
export async function withRetry<T>(
  call: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const { label, timeoutMs, maxAttempts } = options;
  const classify = options.classify ?? classifyError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await runAttempt(call, label, timeoutMs);
    } catch (error) {
      if (classify(error) === "terminal") {
        throw error;
      }
      if (attempt >= maxAttempts) {
        console.error(`[retry] ${label}: giving up after ${attempt}/${maxAttempts} attempts: ${describeError(error)}`);
        throw new RetryExhaustedError(label, attempt, error);
      }
      const delayMs = backoffDelay(options, attempt);
      console.warn(`[retry] ${label}: attempt ${attempt}/${maxAttempts} failed (${describeError(error)}). Retrying in ${delayMs}ms...`);
      await sleep(delayMs);
    }
  }
}
