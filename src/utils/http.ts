/**
 * HTTP utilities: timeout-bounded GET with optional retry for the reference
 * sheet download.
 * Self-contained - no external retry imports.
 */

import { createLogger } from './logger';

const logger = createLogger('http');

// =============================================================================
// Types
// =============================================================================

export interface FetchTextOptions {
  /** Per-attempt timeout (default 15 seconds) */
  timeoutMs?: number;
  /** Total attempts including the first one (default 1, i.e. no retry) */
  attempts?: number;
  /** Base delay between attempts; doubled each retry */
  minDelay?: number;
  /** Injected for tests; defaults to global fetch */
  fetchImpl?: typeof fetch;
}

/** Non-2xx response. Carries the status so callers can report it. */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

const DEFAULT_MIN_DELAY_MS = 500;

// =============================================================================
// Helpers
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryable(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

async function fetchOnce(
  url: string,
  fetchImpl: typeof fetch,
  timeoutMs: number,
): Promise<string> {
  const response = await fetchImpl(url, {
    method: 'GET',
    redirect: 'follow',
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    // Free the connection; the body is not needed.
    await response.body?.cancel().catch((error: unknown) => {
      logger.debug({ url, error }, 'Failed to discard response body');
    });
    throw new HttpStatusError(response.status, response.statusText);
  }
  return response.text();
}

// =============================================================================
// Public API
// =============================================================================

/**
 * GET a URL and return the body as text.
 *
 * Throws HttpStatusError for non-2xx responses, or the underlying fetch error
 * (network failure, TimeoutError from the abort signal).
 */
export async function fetchText(url: string, options: FetchTextOptions = {}): Promise<string> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const maxAttempts = Math.max(1, options.attempts ?? 1);
  const minDelay = options.minDelay ?? DEFAULT_MIN_DELAY_MS;

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const started = Date.now();
      const body = await fetchOnce(url, fetchImpl, timeoutMs);
      logger.debug({ url, attempt, bytes: body.length, ms: Date.now() - started }, 'HTTP GET complete');
      return body;
    } catch (error) {
      lastError = error;
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delay = minDelay * Math.pow(2, attempt - 1);
      logger.warn({ url, attempt, delay, error }, 'HTTP request failed; retrying');
      await sleep(delay);
    }
  }

  throw lastError;
}
