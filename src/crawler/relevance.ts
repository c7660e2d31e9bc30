/**
 * @module crawler/relevance
 * @fileoverview Topic relevance: a plain case-insensitive substring match on
 * paragraphs and links, with explicit fallbacks.
 *
 * - {@link filterText} keeps the paragraphs that mention the topic. When none
 *   do, the whole input comes back unchanged, so non-empty input never yields
 *   an empty result.
 * - {@link filterLinks} keeps links whose anchor text or raw href mentions
 *   the topic.
 *
 * An empty (or all-whitespace) topic matches everything.
 */

import type { PageLink } from "./link-resolver.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** Paragraphs more similar than this to a kept one are dropped. */
export const DUPLICATE_THRESHOLD = 0.8;

/* ────────────────────────────────────────────────────────────────────────────
 * Helpers
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Whether `text` contains `topic`, ignoring case. An empty topic always matches.
 */
export function mentionsTopic(text: string, topic: string): boolean {
  const needle = topic.trim().toLowerCase();
  return needle === "" || text.toLowerCase().includes(needle);
}

/**
 * Split text into paragraphs on blank lines.
 */
export function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph !== "");
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((word) => word !== ""));
}

/**
 * Jaccard similarity of the lower-cased word sets of two texts. Two texts
 * without words have similarity 0.
 *
 * @example
 * ```ts
 * jaccardSimilarity("a b c", "a b d"); // => 0.5
 * ```
 */
export function jaccardSimilarity(a: string, b: string): number {
  const wordsA = wordSet(a);
  const wordsB = wordSet(b);
  if (wordsA.size === 0 || wordsB.size === 0) {
    return 0;
  }

  let intersection = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) {
      intersection++;
    }
  }
  const union = wordsA.size + wordsB.size - intersection;
  return intersection / union;
}

/**
 * Drop paragraphs that are near-duplicates (similarity above
 * {@link DUPLICATE_THRESHOLD}) of an earlier kept paragraph. Order is kept.
 */
export function dedupeParagraphs(paragraphs: readonly string[]): string[] {
  const kept: string[] = [];
  for (const paragraph of paragraphs) {
    const duplicate = kept.some(
      (existing) => jaccardSimilarity(existing, paragraph) > DUPLICATE_THRESHOLD,
    );
    if (!duplicate) {
      kept.push(paragraph);
    }
  }
  return kept;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Filters
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Keep the paragraphs of `text` that mention `topic`, de-duplicated and
 * joined by blank lines. Falls back to the full `text` when none match.
 *
 * @example
 * ```ts
 * filterText("Widgets rock.\n\nGadgets too.", "widgets"); // => "Widgets rock."
 * filterText("Nothing here.", "widgets");                 // => "Nothing here."
 * ```
 */
export function filterText(text: string, topic: string): string {
  const matching = splitParagraphs(text).filter((paragraph) =>
    mentionsTopic(paragraph, topic),
  );

  if (matching.length === 0) {
    return text;
  }

  return dedupeParagraphs(matching).join("\n\n");
}

/**
 * Keep links whose anchor text or raw href mentions `topic`.
 */
export function filterLinks<T extends Pick<PageLink, "href" | "text">>(
  links: readonly T[],
  topic: string,
): T[] {
  return links.filter(
    (link) => mentionsTopic(link.text, topic) || mentionsTopic(link.href, topic),
  );
}
