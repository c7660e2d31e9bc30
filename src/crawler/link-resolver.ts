/**
 * @module crawler/link-resolver
 * @fileoverview Same-origin link extraction for the BFS frontier.
 *
 * Every `<a href>` is resolved against the page URL and normalized. Links with
 * a non-http(s) scheme, hrefs that do not resolve, targets on another origin
 * and repeats are dropped. Order follows the document.
 *
 * Each link keeps its raw `href` and anchor text, which the relevance filter
 * matches the topic against.
 *
 * @example
 * ```ts
 * const links = extractLinks(
 *   '<a href="/widgets">Widgets</a><a href="https://other.example/">x</a>',
 *   "https://example.com/",
 * );
 * // => [{ url: "https://example.com/widgets", href: "/widgets", text: "Widgets" }]
 * ```
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import {
  extractOrigin,
  isFetchableUrl,
  normalizeUrl,
  resolveUrl,
} from "../utils/url.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * A same-origin link found on a page.
 */
export interface PageLink {
  /** Absolute, normalized target URL. */
  url: string;

  /** The `href` attribute as written in the markup (trimmed). */
  href: string;

  /** Visible anchor text, whitespace-collapsed. */
  text: string;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Scheme Filtering
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Schemes that can never be fetched. Checked before resolution because the
 * URL constructor accepts most of them.
 */
const NON_FETCHABLE_SCHEMES: readonly string[] = [
  "javascript:",
  "mailto:",
  "tel:",
  "data:",
  "blob:",
  "ftp:",
  "file:",
];

function hasNonFetchableScheme(href: string): boolean {
  const lower = href.toLowerCase();
  return NON_FETCHABLE_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/* ────────────────────────────────────────────────────────────────────────────
 * Main Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract same-origin links from markup.
 *
 * @param source  - Raw HTML, or an already-loaded cheerio document.
 * @param pageUrl - URL the markup was served from. Relative hrefs resolve
 *                  against it, and only its origin is kept.
 */
export function extractLinks(
  source: string | CheerioAPI,
  pageUrl: string,
): PageLink[] {
  const $ = typeof source === "string" ? cheerio.load(source) : source;

  let pageOrigin: string;
  try {
    pageOrigin = extractOrigin(pageUrl);
  } catch {
    // No usable base: nothing can be resolved.
    return [];
  }

  const seen = new Set<string>();
  const links: PageLink[] = [];

  $("a[href]").each((_index, element) => {
    const href = ($(element).attr("href") ?? "").trim();

    if (href === "" || href.startsWith("#") || hasNonFetchableScheme(href)) {
      return;
    }

    let normalized: string;
    try {
      normalized = normalizeUrl(resolveUrl(pageUrl, href));
    } catch {
      // Unresolvable href, e.g. "http://" or "https://exa mple.com".
      return;
    }

    if (!isFetchableUrl(normalized) || extractOrigin(normalized) !== pageOrigin) {
      return;
    }

    if (seen.has(normalized)) {
      return;
    }
    seen.add(normalized);

    links.push({
      url: normalized,
      href,
      text: $(element).text().replace(/\s+/g, " ").trim(),
    });
  });

  return links;
}
