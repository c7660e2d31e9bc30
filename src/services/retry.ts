/**
 * @fileoverview Retry with exponential backoff for the direct strategy.
 *
 * Only transient failures are retried: the statuses in
 * {@link RETRYABLE_STATUS_CODES}, timeouts and network-level errors. Anything
 * else (a 404, a PDF, an oversized body) fails on the first try.
 *
 * @module services/retry
 */

import { setTimeout as sleep } from "node:timers/promises";
import { FetchError, TimeoutError } from "../utils/errors.js";

/**
 * Statuses worth another try. Each retry goes out with a fresh identity; 999
 * is LinkedIn's "request denied".
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  403, 500, 502, 503, 504, 999,
]);

/** System error codes that mark a transient network failure. */
const TRANSIENT_CAUSE_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
]);

/**
 * Result of {@link classifyError}.
 */
export interface ErrorClassification {
  isRetryable: boolean;
  errorType: "transient" | "permanent";
  reason: string;
}

/**
 * Decide whether a failed attempt is worth repeating.
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof TimeoutError) {
    return { isRetryable: true, errorType: "transient", reason: "timeout" };
  }

  if (error instanceof FetchError) {
    if (error.statusCode !== undefined) {
      return RETRYABLE_STATUS_CODES.has(error.statusCode)
        ? {
            isRetryable: true,
            errorType: "transient",
            reason: `HTTP ${error.statusCode} is retryable`,
          }
        : {
            isRetryable: false,
            errorType: "permanent",
            reason: `HTTP ${error.statusCode} is not retryable`,
          };
    }

    // No status means no response arrived at all.
    if (error.causeCode === undefined || TRANSIENT_CAUSE_CODES.has(error.causeCode)) {
      return {
        isRetryable: true,
        errorType: "transient",
        reason: `network error${error.causeCode ? ` ${error.causeCode}` : ""}`,
      };
    }

    return {
      isRetryable: false,
      errorType: "permanent",
      reason: `network error ${error.causeCode}`,
    };
  }

  return {
    isRetryable: false,
    errorType: "permanent",
    reason: error instanceof Error ? error.name : "non-error rejection",
  };
}

/**
 * Backoff before retry `attempt` (0-based): `baseMs * 2^attempt`.
 */
export function calculateRetryDelay(attempt: number, baseMs: number): number {
  return Math.round(Math.max(0, baseMs) * Math.pow(2, attempt));
}

/**
 * Options for {@link withRetry}.
 */
export interface RetryOptions {
  /** Total tries, the first one included. At least 1. */
  attempts: number;
  /** Base backoff in milliseconds. */
  backoffMs: number;
  /** Label used in log lines. */
  operationName?: string;
  /** Suspends between tries. Tests pass a no-op. */
  sleep?: (ms: number) => Promise<unknown>;
  /** Called before each backoff wait. */
  onRetry?: (attempt: number, error: unknown, delay: number) => void;
}

/**
 * Run `operation` until it succeeds, fails permanently, or runs out of tries.
 *
 * @param operation - Receives the 0-based try number.
 * @returns The first successful result.
 * @throws The last error when every try failed, or the first permanent error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  const wait = options.sleep ?? ((ms: number) => sleep(ms));
  const name = options.operationName ?? "operation";

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classification = classifyError(error);
      if (!classification.isRetryable || attempt + 1 >= attempts) {
        throw error;
      }

      const delay = calculateRetryDelay(attempt, options.backoffMs);
      console.error(
        `[retry] ${name} try ${attempt + 1}/${attempts} failed ` +
          `(${classification.reason}), retrying in ${delay}ms`,
      );
      options.onRetry?.(attempt + 1, error, delay);
      await wait(delay);
    }
  }
}
