import {
  PermanentError,
  RetryExhaustedError,
  TransientError,
  errorMessage,
} from "../errors.js";

import type { RunLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicy {
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface RequestOptions {
  timeoutMs: number;
  method?: "GET" | "HEAD";
  headers?: Record<string, string>;
}

// Statuses that confirm the resource does not exist
const DEFINITIVE_ABSENCE = new Set([404, 410]);

// ============================================================================
// Requests
// ============================================================================

/**
 * Map an HTTP response onto the retry taxonomy.
 */
export function classifyResponse(response: Response, url: string): Response {
  if (response.ok) {
    return response;
  }

  const reason = `HTTP ${String(response.status)} ${response.statusText} for ${url}`;
  if (DEFINITIVE_ABSENCE.has(response.status)) {
    throw new PermanentError(reason, response.status);
  }
  throw new TransientError(reason, { status: response.status });
}

/**
 * Single request with a timeout. Network failures and timeouts surface as
 * TransientError; the response is returned unclassified.
 */
export async function sendRequest(
  url: string,
  options: RequestOptions,
  log: RunLogger
): Promise<Response> {
  const method = options.method ?? "GET";
  log.debug({ method, url }, "Sending request");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers: options.headers,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new TransientError(`Request to ${url} failed: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const duration = Math.round(performance.now() - startTime);

  log.debug(
    {
      method,
      url,
      status: response.status,
      duration: `${String(duration)}ms`,
    },
    "Received response"
  );

  return response;
}

/**
 * GET a JSON document. A body that does not parse is treated as a
 * truncated transfer and is retry-eligible.
 */
export async function fetchJson(
  url: string,
  options: RequestOptions,
  log: RunLogger
): Promise<unknown> {
  const response = classifyResponse(await sendRequest(url, options, log), url);

  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new TransientError(`Invalid JSON from ${url}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// ============================================================================
// Retry
// ============================================================================

/**
 * Linear backoff: the wait after failed attempt n is n × base.
 */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return attempt * baseDelayMs;
}

/**
 * Run `operation` until it succeeds, a PermanentError is thrown, or the
 * attempt ceiling is reached (RetryExhaustedError).
 */
export async function withRetry<T>(
  label: string,
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  log: RunLogger,
  sleep: Sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    log.info(
      { operation: label, attempt, maxAttempts: policy.maxAttempts },
      "Attempting fetch"
    );

    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof PermanentError) {
        log.error({ operation: label, error: error.message }, "Permanent failure, not retrying");
        throw error;
      }

      lastError = error;
      log.error(
        { operation: label, attempt, error: errorMessage(error) },
        "Fetch attempt failed"
      );

      if (attempt < policy.maxAttempts) {
        const waitMs = backoffDelay(attempt, policy.retryBaseDelayMs);
        log.info({ operation: label, waitMs }, "Retrying after backoff");
        await sleep(waitMs);
      }
    }
  }

  log.error({ operation: label, attempts: policy.maxAttempts }, "Retries exhausted");
  throw new RetryExhaustedError(label, policy.maxAttempts, lastError);
}

// ============================================================================
// Politeness
// ============================================================================

/**
 * Fixed pause between successful unit fetches, independent of retry state.
 */
export class PoliteScheduler {
  constructor(
    private readonly delayMs: number,
    private readonly sleep: Sleep,
    private readonly log: RunLogger
  ) {}

  async pause(): Promise<void> {
    if (this.delayMs <= 0) {
      return;
    }
    this.log.debug({ waitTime: this.delayMs }, "Politeness delay before next request");
    await this.sleep(this.delayMs);
  }
}
