/**
 * @module extractor/content-extractor
 * @fileoverview Turns page markup into main-content text plus same-origin links.
 *
 * ## Pipeline
 * ```
 *   HTML
 *    │
 *    ▼
 *   [1] Strip noise (script, style, nav, header, footer, aside, ...) and comments
 *    │
 *    ▼
 *   [2] First content selector with text:
 *       article → main → [class*="content"] → [class*="post"] → [class*="article"] → body
 *    │  none
 *    ▼
 *   [3] Largest single element, if longer than minBlockChars
 *    │  none
 *    ▼
 *   [4] Whole-document text
 * ```
 *
 * Text keeps paragraph structure: each block-level element starts a new
 * paragraph, paragraphs are joined by a blank line, and whitespace inside a
 * paragraph collapses to single spaces.
 *
 * Links come from the same stripped document, so navigation chrome does not
 * feed the frontier.
 *
 * @example
 * ```ts
 * const page = extract(
 *   "<article><h1>Widgets</h1><p>Widgets are great.</p></article>",
 *   "https://example.com/",
 * );
 * // page.text  => "Widgets\n\nWidgets are great."
 * // page.links => []
 * ```
 */

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import { isComment, isTag, isText, type AnyNode, type Element } from "domhandler";
import { config } from "../config.js";
import { extractLinks, type PageLink } from "../crawler/link-resolver.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Result of {@link extract}.
 */
export interface ExtractedPage {
  /** Main-content text, paragraphs separated by `"\n\n"`. May be empty. */
  text: string;

  /** Same-origin links in document order. */
  links: PageLink[];

  /** `<title>` text, or the first `<h1>`, or `""`. */
  title: string;

  /** Which step produced `text`: a selector, `"largest-block"` or `"document"`. */
  source: string;
}

/**
 * Tuning for {@link extract}.
 */
export interface ExtractOptions {
  /** Content selectors, tried in order. */
  selectors?: readonly string[];

  /** Minimum length for the largest-block fallback. */
  minBlockChars?: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Constants
 * ──────────────────────────────────────────────────────────────────────────── */

/** Elements removed before anything is read. */
const NOISE_SELECTORS: readonly string[] = [
  "script",
  "style",
  "noscript",
  "nav",
  "header",
  "footer",
  "aside",
  "iframe",
  "template",
];

export const CONTENT_SELECTORS: readonly string[] = [
  "article",
  "main",
  '[class*="content"]',
  '[class*="post"]',
  '[class*="article"]',
  "body",
];

/** Elements that start and end a paragraph. */
const BLOCK_TAGS: ReadonlySet<string> = new Set([
  "address", "article", "blockquote", "body", "br", "dd", "details", "div",
  "dl", "dt", "fieldset", "figcaption", "figure", "form", "h1", "h2", "h3",
  "h4", "h5", "h6", "hr", "li", "main", "ol", "p", "pre", "section",
  "summary", "table", "td", "th", "tr", "ul",
]);

/* ────────────────────────────────────────────────────────────────────────────
 * Text Collection
 * ──────────────────────────────────────────────────────────────────────────── */

/** Marks the end of a block element on the walk stack. */
const BLOCK_END = Symbol("block-end");

/** Children of a node, or none for text and comments. */
function childrenOf(node: AnyNode): readonly AnyNode[] {
  return "children" in node ? node.children : [];
}

/**
 * Walk a set of nodes and collect their text as paragraphs.
 *
 * The walk keeps its own stack, so arbitrarily deep markup is fine.
 */
function collectParagraphs(nodes: readonly AnyNode[]): string[] {
  const paragraphs: string[] = [];
  let current = "";

  const flush = (): void => {
    const paragraph = current.replace(/\s+/g, " ").trim();
    if (paragraph !== "") {
      paragraphs.push(paragraph);
    }
    current = "";
  };

  const stack: Array<AnyNode | typeof BLOCK_END> = [...nodes].reverse();
  while (stack.length > 0) {
    const step = stack.pop();
    if (step === undefined) {
      break;
    }
    if (step === BLOCK_END) {
      flush();
      continue;
    }
    if (isText(step)) {
      current += step.data;
      continue;
    }

    if (isTag(step) && BLOCK_TAGS.has(step.name.toLowerCase())) {
      flush();
      stack.push(BLOCK_END);
    }
    const children = childrenOf(step);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  flush();
  return paragraphs;
}

function textOf<T extends AnyNode>(elements: Cheerio<T>): string {
  return collectParagraphs(elements.toArray()).join("\n\n");
}

/**
 * Matches of `selector` that are not nested inside another match, so nested
 * `[class*="content"]` wrappers are not read twice.
 */
function outermost($: CheerioAPI, selector: string): Cheerio<AnyNode> {
  return $(selector).filter((_index, element) => $(element).parents(selector).length === 0);
}

/**
 * The element with the most text, when it clears `minChars`.
 *
 * Elements are ranked by their non-whitespace character count, summed
 * bottom-up in one pass; only the winner's text is assembled. On a tie the
 * outer element wins.
 */
function largestBlock($: CheerioAPI, minChars: number): string {
  const body = $("body").get(0);
  if (!body) {
    return "";
  }

  // Pre-order list of the elements under <body>.
  const elements: Element[] = [];
  const stack: AnyNode[] = [...body.children].reverse();
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) {
      break;
    }
    if (!isTag(node)) {
      continue;
    }
    elements.push(node);
    for (let i = node.children.length - 1; i >= 0; i--) {
      stack.push(node.children[i]);
    }
  }

  // Children come after their parent in pre-order, so walking backwards
  // sizes every child before its parent.
  const sizes = new Map<Element, number>();
  for (let i = elements.length - 1; i >= 0; i--) {
    let size = 0;
    for (const child of elements[i].children) {
      if (isText(child)) {
        size += child.data.replace(/\s+/g, "").length;
      } else if (isTag(child)) {
        size += sizes.get(child) ?? 0;
      }
    }
    sizes.set(elements[i], size);
  }

  let best: Element | undefined;
  let bestSize = 0;
  for (const element of elements) {
    const size = sizes.get(element) ?? 0;
    if (size > bestSize) {
      best = element;
      bestSize = size;
    }
  }
  if (!best) {
    return "";
  }

  const text = collectParagraphs([best]).join("\n\n");
  return text.length > minChars ? text : "";
}

function extractTitle($: CheerioAPI): string {
  const title = $("title").first().text().replace(/\s+/g, " ").trim();
  if (title) {
    return title;
  }
  return $("h1").first().text().replace(/\s+/g, " ").trim();
}

/* ────────────────────────────────────────────────────────────────────────────
 * Main Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Extract main-content text and same-origin links from page markup.
 *
 * Never throws on malformed markup; cheerio parses whatever it gets.
 *
 * @param html - Page markup.
 * @param url  - URL the markup belongs to.
 */
export function extract(
  html: string,
  url: string,
  options: ExtractOptions = {},
): ExtractedPage {
  const $ = cheerio.load(html);

  // The title sits in <head>, which survives noise removal, but read it first
  // in case a page puts its heading inside <header>.
  const title = extractTitle($);

  $(NOISE_SELECTORS.join(", ")).remove();
  $("*")
    .contents()
    .filter((_index, node) => isComment(node))
    .remove();

  const links = extractLinks($, url);

  for (const selector of options.selectors ?? CONTENT_SELECTORS) {
    const text = textOf(outermost($, selector));
    if (text !== "") {
      return { text, links, title, source: selector };
    }
  }

  const block = largestBlock($, options.minBlockChars ?? config.minBlockChars);
  if (block !== "") {
    return { text: block, links, title, source: "largest-block" };
  }

  return {
    text: textOf($.root()),
    links,
    title,
    source: "document",
  };
}
