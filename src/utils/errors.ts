/**
 * @module utils/errors
 * @fileoverview Custom error class hierarchy for mcp-topic-crawler.
 *
 * Every error in this application extends {@link CrawlerError}, which carries
 * a machine-readable `code` string alongside the human-readable `message`.
 *
 * ## Error Hierarchy
 * ```
 * Error (built-in)
 *   └── CrawlerError (base)  ─── code: string
 *         ├── FetchError               ─── "FETCH_FAILED"   + optional statusCode
 *         ├── TimeoutError             ─── "TIMEOUT"
 *         ├── ContentTypeError         ─── "CONTENT_TYPE_REJECTED"
 *         ├── ResponseTooLargeError    ─── "RESPONSE_TOO_LARGE"
 *         ├── SecurityError            ─── "SSRF_BLOCKED"
 *         ├── ExtractionError          ─── "EXTRACTION_FAILED"
 *         ├── SnapshotNotFoundError    ─── "SNAPSHOT_NOT_FOUND"
 *         ├── BudgetExhaustedError     ─── "BUDGET_EXHAUSTED"
 *         └── NetworkUnavailableError  ─── "NETWORK_UNAVAILABLE"
 * ```
 *
 * Only {@link NetworkUnavailableError} ever escapes `crawl()`. Everything else
 * is absorbed per strategy or per URL by the fetch chain and the BFS loop.
 *
 * @example
 * ```ts
 * import { FetchError, formatError } from "./utils/errors.js";
 *
 * try {
 *   throw new FetchError("Server returned 503", 503);
 * } catch (err) {
 *   console.error(formatError(err));
 *   // => "[FETCH_FAILED] Server returned 503"
 * }
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Base Error Class
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Base error class for all mcp-topic-crawler errors.
 *
 * Subclasses carry a stable {@link code} and report their own class name in
 * `name`, so stack traces read "FetchError:" rather than "Error:".
 */
export class CrawlerError extends Error {
  /**
   * Machine-readable error code in SCREAMING_SNAKE_CASE. Codes are part of the
   * tool output and stay stable across versions.
   */
  public readonly code: string;

  /**
   * @param message - Human-readable description of what went wrong.
   * @param code    - Stable machine-readable error code.
   */
  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Concrete Error Subclasses
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Thrown when an HTTP fetch fails, at the network level (no `statusCode`) or
 * with a non-success response (`statusCode` set).
 *
 * @example
 * ```ts
 * throw new FetchError("HTTP 403 Forbidden for https://example.com/", 403);
 * ```
 */
export class FetchError extends CrawlerError {
  /**
   * HTTP status code from the server, `undefined` when no response arrived.
   */
  public readonly statusCode?: number;

  /**
   * Underlying system error code (`ECONNRESET`, `EAI_AGAIN`, ...) when the
   * failure came from the network stack.
   */
  public readonly causeCode?: string;

  constructor(message: string, statusCode?: number, causeCode?: string) {
    super(message, "FETCH_FAILED");
    this.statusCode = statusCode;
    this.causeCode = causeCode;
  }
}

/**
 * Thrown when a request or a render exceeds its time budget.
 */
export class TimeoutError extends CrawlerError {
  constructor(message: string) {
    super(message, "TIMEOUT");
  }
}

/**
 * Thrown when the response Content-Type is not an HTML-like type.
 *
 * @example
 * ```ts
 * throw new ContentTypeError(
 *   'Unacceptable Content-Type: "application/json" for https://api.example.com'
 * );
 * ```
 */
export class ContentTypeError extends CrawlerError {
  constructor(message: string) {
    super(message, "CONTENT_TYPE_REJECTED");
  }
}

/**
 * Thrown when a response body exceeds the configured size limit.
 */
export class ResponseTooLargeError extends CrawlerError {
  constructor(message: string) {
    super(message, "RESPONSE_TOO_LARGE");
  }
}

/**
 * Thrown when markup yields nothing usable (an empty render, for example).
 */
export class ExtractionError extends CrawlerError {
  constructor(message: string) {
    super(message, "EXTRACTION_FAILED");
  }
}

/**
 * Thrown when a host resolves to a private, loopback or link-local address,
 * or does not resolve at all. Never retried.
 */
export class SecurityError extends CrawlerError {
  constructor(message: string) {
    super(message, "SSRF_BLOCKED");
  }
}

/**
 * Thrown by the archive strategy when the archive index has no snapshot
 * for a URL.
 */
export class SnapshotNotFoundError extends CrawlerError {
  constructor(message: string) {
    super(message, "SNAPSHOT_NOT_FOUND");
  }
}

/**
 * Thrown when the budget tracker refuses a reservation in the middle of the
 * fetch chain.
 *
 * This is NOT a failure: the fetch chain catches it, stops trying further
 * strategies for the URL, and reports the budget as exhausted so the BFS loop
 * can stop with the corpus gathered so far.
 *
 * @example
 * ```ts
 * throw new BudgetExhaustedError(
 *   "Budget denied https://example.com/page (global 20/20, origin 3/5)"
 * );
 * ```
 */
export class BudgetExhaustedError extends CrawlerError {
  constructor(message: string) {
    super(message, "BUDGET_EXHAUSTED");
  }
}

/**
 * Thrown when the DNS resolver itself cannot be reached for any seed host.
 *
 * The only fatal condition of a crawl: no fetch strategy can route around a
 * machine with no working name resolution.
 */
export class NetworkUnavailableError extends CrawlerError {
  constructor(message: string) {
    super(message, "NETWORK_UNAVAILABLE");
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Error Formatting
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Convert any caught value to a single-line string for MCP responses and
 * log lines.
 *
 * - {@link CrawlerError} subclasses: `"[CODE] message"`.
 * - Standard `Error` instances: the `.message` property.
 * - Everything else: coerced via `String()`.
 *
 * @example
 * ```ts
 * formatError(new FetchError("Not Found", 404));
 * // => "[FETCH_FAILED] Not Found"
 *
 * formatError(new TypeError("Cannot read property 'x' of null"));
 * // => "Cannot read property 'x' of null"
 *
 * formatError(42);
 * // => "42"
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof CrawlerError) {
    return `[${error.code}] ${error.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
