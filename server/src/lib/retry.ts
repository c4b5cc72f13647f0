const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object';
}

function asObject(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) return headers.get(name);
  const bag = asObject(headers);
  if (!bag) return null;
  const key = Object.keys(bag).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? bag[key] : undefined;
  return typeof value === 'string' ? value : null;
}

export function getStatusCode(error: unknown): number | null {
  const top = asObject(error);
  if (!top) return null;
  if (typeof top.status === 'number') return top.status;
  if (typeof top.statusCode === 'number') return top.statusCode;
  const response = asObject(top.response);
  return typeof response?.status === 'number' ? response.status : null;
}

function getErrorCode(error: unknown): string | null {
  const code = asObject(error)?.code;
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransientError(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  // A stage deadline is not retried: the abort is deliberate.
  if (error.name === 'AbortError') return false;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("API error 429: ...")
  return /\b(408|425|429|500|502|503|504|529)\b/.test(msg);
}

/**
 * Retry-After header from provider errors, in milliseconds (0 if absent).
 */
function getRetryAfterMs(error: unknown): number {
  const top = asObject(error);
  const retryAfter = readHeader(top?.headers, 'retry-after')
    ?? readHeader(asObject(top?.response)?.headers, 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    // Cap at 60s
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  /** Stop retrying once the caller's deadline has fired. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || options?.signal?.aborted || !isTransientError(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error('withRetry exhausted without an error');
}
