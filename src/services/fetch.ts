/**
 * @fileoverview Bounded HTTP GET shared by every fetch strategy.
 *
 * Wraps the native `fetch()` with the controls each strategy needs:
 *
 * 1. **Timeout** - `AbortSignal.timeout()`, surfaced as {@link TimeoutError}.
 * 2. **Status check** - non-2xx responses become a {@link FetchError} carrying
 *    the status.
 * 3. **Content-Type filtering** - only HTML-like bodies pass, unless the
 *    caller expects something else (the archive index answers in JSON).
 * 4. **Response size limiting** - the body is streamed with a byte counter.
 * 5. **Private-address guard** - the host must resolve to public addresses
 *    only ({@link validateHostname}), before any request goes out.
 * 6. **Charset** - the body is decoded with the Content-Type charset.
 *
 * ## Architecture
 *
 * ```
 *   httpGet(url, options)
 *     |
 *     +--> validateHost(hostname)       -> SecurityError
 *     +--> fetchImpl(url, { headers, signal: AbortSignal.timeout, redirect })
 *     |     - AbortError / TimeoutError  -> TimeoutError
 *     |     - anything else              -> FetchError (+ causeCode)
 *     |
 *     +--> status check    -> FetchError(statusCode)
 *     +--> content type    -> ContentTypeError
 *     +--> streamed body   -> ResponseTooLargeError
 *     |
 *     +--> HttpResponse
 * ```
 *
 * Pacing, identity and budgeting are not done here; strategies do them
 * before calling in.
 *
 * @module services/fetch
 */

import { config } from "../config.js";
import {
  ContentTypeError,
  FetchError,
  ResponseTooLargeError,
  TimeoutError,
} from "../utils/errors.js";
import { errorCodeOf, validateHostname, type HostValidator } from "../utils/network.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** The `fetch` signature strategies accept, so tests can pass a fake. */
export type FetchImpl = (
  input: string,
  init: RequestInit,
) => Promise<Response>;

/**
 * Options for {@link httpGet}.
 */
export interface HttpGetOptions {
  /** Request headers, usually from the identity pool. */
  headers?: Record<string, string>;

  /** Request timeout in milliseconds. Defaults to `config.directTimeout`. */
  timeout?: number;

  /** Maximum body size in bytes. Defaults to `config.maxResponseSize`. */
  maxBytes?: number;

  /** `fetch` implementation. Defaults to the global `fetch`. */
  fetchImpl?: FetchImpl;

  /**
   * Host check run before the request. With the global `fetch` it defaults
   * to {@link validateHostname}; a caller supplying its own `fetchImpl`
   * supplies its own check, or none. `false` turns it off.
   */
  validateHost?: HostValidator | false;

  /**
   * Reject bodies whose Content-Type is not HTML-like.
   *
   * @default true
   */
  requireHtml?: boolean;
}

/**
 * A fully-read response.
 */
export interface HttpResponse {
  /** Decoded response body. */
  body: string;

  /** Final URL after redirects; the requested URL when the runtime reports none. */
  url: string;

  /** HTTP status of the final response. */
  status: number;

  /** Raw Content-Type header, empty when absent. */
  contentType: string;
}

// ---------------------------------------------------------------------------
// Content-Type Allowlist
// ---------------------------------------------------------------------------

/**
 * MIME types accepted as HTML-like.
 */
const ALLOWED_CONTENT_TYPES = new Set<string>([
  "text/html",
  "application/xhtml+xml",
  "text/xml",
  "application/xml",
]);

// ---------------------------------------------------------------------------
// Helper Functions
// ---------------------------------------------------------------------------

/**
 * Extract the lowercased media type from a Content-Type header value.
 *
 * @example
 * ```typescript
 * extractMimeType("text/html; charset=utf-8"); // => "text/html"
 * extractMimeType(null);                       // => ""
 * ```
 */
export function extractMimeType(contentType: string | null): string {
  if (!contentType) {
    return "";
  }
  const mimeType = contentType.split(";")[0];
  return mimeType.trim().toLowerCase();
}

/**
 * Whether a Content-Type header names an HTML-like type.
 *
 * A missing header counts as HTML.
 */
export function isHtmlContentType(contentType: string | null): boolean {
  const mimeType = extractMimeType(contentType);
  return mimeType === "" || ALLOWED_CONTENT_TYPES.has(mimeType);
}

/**
 * The charset named by a Content-Type header, lowercased; `"utf-8"` when
 * there is none.
 *
 * @example
 * ```typescript
 * extractCharset('text/html; charset="ISO-8859-1"'); // => "iso-8859-1"
 * extractCharset("text/html");                       // => "utf-8"
 * ```
 */
export function extractCharset(contentType: string | null): string {
  const match = /;\s*charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType ?? "");
  return match ? match[1].toLowerCase() : "utf-8";
}

/**
 * A decoder for `charset`, or UTF-8 when the label is unknown.
 */
function decoderFor(charset: string): TextDecoder {
  try {
    // Malformed sequences become U+FFFD instead of throwing.
    return new TextDecoder(charset, { fatal: false });
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    console.error(`[fetch] Unknown charset "${charset}"; decoding as utf-8`);
    return new TextDecoder("utf-8", { fatal: false });
  }
}

/**
 * Read a response body as text, enforcing a byte limit while streaming.
 *
 * Content-Length is checked first as a fast path but is not trusted: chunked
 * and compressed responses may omit it or state it wrongly.
 *
 * @throws {ResponseTooLargeError} If the body exceeds `maxBytes`.
 * @throws {FetchError} If the stream fails part-way.
 */
export async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
  charset = "utf-8",
): Promise<string> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      throw new ResponseTooLargeError(
        `Response Content-Length (${declaredSize} bytes) exceeds limit of ${maxBytes} bytes`,
      );
    }
  }

  if (!response.body) {
    return "";
  }

  const reader = response.body.getReader();
  const decoder = decoderFor(charset);

  const chunks: string[] = [];
  let totalBytes = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        break;
      }

      totalBytes += value.byteLength;

      if (totalBytes > maxBytes) {
        await reader.cancel();
        throw new ResponseTooLargeError(
          `Response body exceeds limit of ${maxBytes} bytes (read ${totalBytes} bytes so far)`,
        );
      }

      chunks.push(decoder.decode(value, { stream: true }));
    }

    chunks.push(decoder.decode());
  } catch (error) {
    if (error instanceof ResponseTooLargeError) {
      throw error;
    }
    throw new FetchError(
      `Error reading response body: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return chunks.join("");
}

/**
 * Translate a rejection from `fetch()` into the typed error hierarchy.
 */
function translateFetchFailure(
  error: unknown,
  url: string,
  timeout: number,
): Error {
  if (
    error instanceof DOMException &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  ) {
    return new TimeoutError(`Request to ${url} timed out after ${timeout}ms`);
  }

  // undici reports "fetch failed" and hides the system error in `cause`.
  const cause = error instanceof Error ? error.cause : undefined;
  const causeCode = errorCodeOf(cause) ?? errorCodeOf(error);
  const detail = error instanceof Error ? error.message : String(error);

  return new FetchError(
    `Failed to fetch ${url}: ${detail}${causeCode ? ` (${causeCode})` : ""}`,
    undefined,
    causeCode,
  );
}

// ---------------------------------------------------------------------------
// Main Export
// ---------------------------------------------------------------------------

/**
 * GET a URL and read its body.
 *
 * @param url     - Absolute http(s) URL.
 * @param options - Headers, limits and the `fetch` implementation.
 * @returns The decoded body with response metadata.
 *
 * @throws {SecurityError} If the host resolves to a private address.
 * @throws {TimeoutError} If the request exceeds `timeout`.
 * @throws {FetchError} On network failure or a non-2xx status.
 * @throws {ContentTypeError} If `requireHtml` and the response is not HTML-like.
 * @throws {ResponseTooLargeError} If the body exceeds `maxBytes`.
 *
 * @example
 * ```typescript
 * const res = await httpGet("https://example.com/", {
 *   headers: identity.nextHeaders(),
 *   timeout: 15_000,
 * });
 * console.log(res.status, res.body.length);
 * ```
 */
export async function httpGet(
  url: string,
  options: HttpGetOptions = {},
): Promise<HttpResponse> {
  const timeout = options.timeout ?? config.directTimeout;
  const maxBytes = options.maxBytes ?? config.maxResponseSize;
  const fetchImpl: FetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  const requireHtml = options.requireHtml ?? true;

  const validateHost =
    options.validateHost ??
    (options.fetchImpl ? false : (hostname: string) => validateHostname(hostname));
  if (validateHost) {
    await validateHost(new URL(url).hostname);
  }

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "GET",
      headers: options.headers ?? {},
      signal: AbortSignal.timeout(timeout),
      redirect: "follow",
    });
  } catch (error) {
    throw translateFetchFailure(error, url, timeout);
  }

  // A redirect may have landed somewhere else; its body is not kept unless
  // that host passes too.
  if (validateHost && response.url && new URL(response.url).hostname !== new URL(url).hostname) {
    try {
      await validateHost(new URL(response.url).hostname);
    } catch (error) {
      await response.body?.cancel();
      throw error;
    }
  }

  if (!response.ok) {
    // Release the connection; the body is not needed.
    await response.body?.cancel();
    throw new FetchError(
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""} for ${url}`,
      response.status,
    );
  }

  const contentType = response.headers.get("content-type");
  if (requireHtml && !isHtmlContentType(contentType)) {
    await response.body?.cancel();
    throw new ContentTypeError(
      `Unacceptable Content-Type: "${extractMimeType(contentType)}" for ${url}. ` +
        `Expected one of: ${Array.from(ALLOWED_CONTENT_TYPES).join(", ")}`,
    );
  }

  const body = await readBodyWithLimit(response, maxBytes, extractCharset(contentType));

  return {
    body,
    url: response.url || url,
    status: response.status,
    contentType: contentType ?? "",
  };
}
