const TRANSIENT_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET',
]);
const TRANSIENT_PATTERNS = ['rate limit', 'too many requests', 'overloaded', 'socket hang up', 'fetch failed'];

const MAX_RETRY_AFTER_MS = 30_000;

function readNumber(source: unknown, key: string): number | null {
  if (typeof source !== 'object' || source === null || !(key in source)) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : null;
}

function readString(source: unknown, key: string): string | null {
  if (typeof source !== 'object' || source === null || !(key in source)) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : null;
}

/**
 * HTTP status carried by an SDK error (`status`) or by our own provider
 * errors (`status` set on HttpStatusError).
 */
export function getStatusCode(error: unknown): number | null {
  return readNumber(error, 'status') ?? readNumber(error, 'statusCode');
}

export function isTransientError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status !== null) return TRANSIENT_STATUSES.has(status);

  const code = readString(error, 'code')?.toUpperCase();
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;
  const causeCode = readString(readCause(error), 'code')?.toUpperCase();
  if (causeCode && TRANSIENT_ERROR_CODES.has(causeCode)) return true;

  if (error instanceof Error && error.name === 'TimeoutError') return true;
  const msg = error instanceof Error ? error.message.toLowerCase() : '';
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

function readCause(error: unknown): unknown {
  return error instanceof Error ? error.cause : undefined;
}

/** Retry-After header (seconds) carried by an HttpStatusError, in ms. */
function getRetryAfterMs(error: unknown): number {
  const raw = readString(error, 'retryAfter');
  if (!raw) return 0;
  const seconds = Number.parseFloat(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) return 0;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

/** Non-2xx response from an upstream HTTP API. */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly retryAfter: string | null = null,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  onRetry?: (attempt: number, error: Error) => void;
  sleep?: (ms: number) => Promise<void>;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const sleep = options?.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isTransientError(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('withRetry exhausted without an error');
}
