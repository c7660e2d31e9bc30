/**
 * @module utils/url
 * @fileoverview URL utilities: normalization, origin extraction, resolution
 * and validation.
 *
 * The normalization logic backs the crawler's visited-set, where two
 * superficially different URLs (with/without trailing slash, with a tracking
 * parameter, with a fragment) must be recognized as the same resource.
 *
 * ## Normalization Rules (applied in order)
 * 1. Parse with the WHATWG URL constructor (rejects malformed URLs early).
 * 2. Lowercase the scheme and hostname.
 * 3. Remove the fragment (`#section`).
 * 4. Remove default ports (`:80` for HTTP, `:443` for HTTPS).
 * 5. Drop tracking parameters (`utm_*`, `ref`, `fbclid`, `gclid`, ...).
 * 6. Sort the remaining query parameters by key.
 * 7. Remove the trailing slash ONLY when the path is exactly "/".
 *
 * @example
 * ```ts
 * import { normalizeUrl, extractOrigin, isFetchableUrl } from "./utils/url.js";
 *
 * normalizeUrl("HTTPS://Example.COM:443/path?b=2&utm_source=x&a=1#frag");
 * // => "https://example.com/path?a=1&b=2"
 *
 * extractOrigin("https://sub.example.com/path");
 * // => "https://sub.example.com"
 *
 * isFetchableUrl("javascript:alert(1)");
 * // => false
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** Default ports for HTTP and HTTPS, stripped during normalization. */
const DEFAULT_PORTS: ReadonlyMap<string, string> = new Map([
  ["http:", "80"],
  ["https:", "443"],
]);

/** URL schemes this application can fetch. */
const FETCHABLE_SCHEMES: ReadonlySet<string> = new Set(["http:", "https:"]);

/**
 * Query parameters that only carry campaign or referral tracking. Pages that
 * differ only in these parameters are the same page.
 */
const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  "ref",
  "fbclid",
  "gclid",
  "mc_cid",
  "mc_eid",
]);

/** Prefix shared by all Google Analytics campaign parameters. */
const TRACKING_PREFIX = "utm_";

/* ────────────────────────────────────────────────────────────────────────────
 * URL Normalization
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether a query parameter name is a tracking parameter.
 */
function isTrackingParam(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.startsWith(TRACKING_PREFIX) || TRACKING_PARAMS.has(lower);
}

/**
 * Normalize a URL string into a canonical form for deduplication.
 *
 * @param url - The raw URL string to normalize. Must be a valid absolute URL.
 * @returns The normalized URL string.
 * @throws {TypeError} If the input is not a valid URL (from `new URL()`).
 *
 * @example
 * ```ts
 * normalizeUrl("HTTPS://Example.COM:443/path?b=2&a=1#section");
 * // => "https://example.com/path?a=1&b=2"
 *
 * normalizeUrl("http://example.com:80/");
 * // => "http://example.com"
 *
 * normalizeUrl("https://example.com/post?id=7&utm_medium=social&ref=home");
 * // => "https://example.com/post?id=7"
 * ```
 */
export function normalizeUrl(url: string): string {
  // The URL constructor lowercases scheme and host on its own.
  const parsed = new URL(url);

  parsed.hash = "";

  if (parsed.port === DEFAULT_PORTS.get(parsed.protocol)) {
    parsed.port = "";
  }

  // Rebuilt rather than edited in place: an emptied URLSearchParams can leave
  // a bare "?" behind on some URL implementations.
  const params = [...parsed.searchParams]
    .filter(([name]) => !isTrackingParam(name))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  parsed.search = params.length > 0 ? new URLSearchParams(params).toString() : "";

  let normalized = parsed.toString();

  // Only the bare root loses its slash; "/blog/" and "/blog" may differ.
  if (parsed.pathname === "/" && !parsed.search) {
    normalized = normalized.replace(/\/$/, "");
  }

  return normalized;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Origin Extraction
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract the origin (scheme + host, plus a non-default port) from a URL.
 *
 * The origin is the unit of per-site budgeting and of domain-restricted BFS.
 *
 * @param url - A valid absolute URL string.
 * @returns The serialized origin, e.g. `"https://sub.example.com"`.
 * @throws {TypeError} If the input is not a valid URL.
 *
 * @example
 * ```ts
 * extractOrigin("https://Sub.Example.COM/path?q=1");
 * // => "https://sub.example.com"
 *
 * extractOrigin("http://localhost:3000/api");
 * // => "http://localhost:3000"
 * ```
 */
export function extractOrigin(url: string): string {
  return new URL(url).origin;
}

/**
 * Extract the lowercased hostname from a URL string.
 *
 * @throws {TypeError} If the input is not a valid URL.
 */
export function extractDomain(url: string): string {
  return new URL(url).hostname;
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Resolution
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Resolve a potentially relative URL against a base URL.
 *
 * @param base     - The base URL (typically the page that contains the link).
 * @param relative - The URL to resolve (can be absolute or relative).
 * @returns The fully resolved absolute URL string.
 * @throws {TypeError} If the combination does not produce a valid URL.
 *
 * @example
 * ```ts
 * resolveUrl("https://example.com/docs/intro", "../blog");
 * // => "https://example.com/blog"
 * ```
 */
export function resolveUrl(base: string, relative: string): string {
  return new URL(relative, base).href;
}

/* ────────────────────────────────────────────────────────────────────────────
 * URL Scheme Validation
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Check whether a URL is absolute and uses `http:` or `https:`.
 *
 * @example
 * ```ts
 * isFetchableUrl("https://example.com/page"); // => true
 * isFetchableUrl("mailto:user@example.com");  // => false
 * isFetchableUrl("not-a-valid-url");          // => false
 * ```
 */
export function isFetchableUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return FETCHABLE_SCHEMES.has(parsed.protocol);
  } catch {
    // An unparseable URL is simply not fetchable.
    return false;
  }
}
