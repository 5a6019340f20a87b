export interface RetryOptions {
  attempts?: number;
  timeoutMs?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class HttpStatusError extends Error {
  readonly status: number;
  /** Server-requested wait before the next attempt, e.g. from a 429. */
  readonly retryAfterMs: number | null;

  constructor(status: number, message: string, retryAfterMs: number | null = null) {
    super(message);
    this.name = "HttpStatusError";
    this.status = status;
    this.retryAfterMs = retryAfterMs;
  }
}

export class TimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

const DEFAULTS = {
  attempts: 3,
  timeoutMs: 15_000,
  baseDelayMs: 500,
  maxDelayMs: 10_000
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

function retryDelay(error: unknown, attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (error instanceof HttpStatusError && error.retryAfterMs !== null) {
    return Math.min(Math.max(0, error.retryAfterMs), maxDelayMs);
  }
  return backoffDelay(attempt, baseDelayMs, maxDelayMs);
}

// Settles on timeout even when `fn` ignores its signal.
function withDeadline<T>(fn: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Runs `fn` with a per-attempt timeout, retrying transient failures with
 * exponential backoff (or the server's retry-after, capped at `maxDelayMs`).
 * Client errors (4xx other than 429) are thrown at once.
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULTS.attempts);
  const timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await withDeadline(fn, timeoutMs);
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt === attempts) break;
      await sleep(retryDelay(error, attempt, baseDelayMs, maxDelayMs));
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}

export async function fetchJson(
  url: string,
  options: RetryOptions & { headers?: Record<string, string> } = {}
): Promise<unknown> {
  return withRetry(async (signal) => {
    const response = await fetch(url, {
      headers: { Accept: "application/json", ...options.headers },
      signal
    });

    if (!response.ok) {
      const payload = await response.text().catch(() => "");
      throw new HttpStatusError(response.status, `GET ${url} failed ${response.status}: ${payload}`);
    }

    const body: unknown = await response.json();
    return body;
  }, options);
}
