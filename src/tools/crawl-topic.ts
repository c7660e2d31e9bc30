/**
 * @fileoverview MCP tool: crawl_topic
 *
 * Crawls the given seed URLs breadth-first, site by site, keeping only text
 * about the topic, and returns the combined corpus with a per-site report.
 *
 * ## Output Format
 *
 * ```
 * # Topic Crawl: widgets
 * > State: completed (frontier_empty)
 * > Fetch attempts: 4 | Words: 812
 *
 * ## https://example.com
 * > completed | 3 attempt(s) | 812 word(s)
 * - [direct] https://example.com (depth 0, 420 words)
 * ...
 *
 * ---
 * # Corpus
 *
 * ...text...
 * ```
 *
 * @module tools/crawl-topic
 */

import { z } from "zod";
import {
  crawl,
  type CrawlOptions,
  type CrawlResult,
} from "../crawler/bfs-crawler.js";
import { formatError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Input Schema
// ---------------------------------------------------------------------------

/**
 * Zod schema for the crawl_topic tool's input parameters, as the plain shape
 * object `server.tool()` expects.
 */
export const CrawlTopicSchema = {
  topic: z
    .string()
    .min(1)
    .describe("Topic to collect text about (case-insensitive substring match)"),

  urls: z
    .array(z.string().url())
    .min(1)
    .describe("Seed URLs; each site is crawled separately"),

  max_depth: z
    .number()
    .int()
    .min(0)
    .max(5)
    .optional()
    .describe("Deepest link level to follow (default: 2)"),

  max_pages: z
    .number()
    .int()
    .min(1)
    .max(200)
    .optional()
    .describe("Fetch attempts allowed in total, fallbacks included (default: 20)"),

  per_origin_cap: z
    .number()
    .int()
    .min(1)
    .max(100)
    .optional()
    .describe("Fetch attempts allowed per site (default: 5)"),
};

interface CrawlTopicParams {
  topic: string;
  urls: string[];
  max_depth?: number;
  max_pages?: number;
  per_origin_cap?: number;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Render a crawl result as the tool's Markdown text.
 */
export function formatCrawlResult(topic: string, result: CrawlResult): string {
  const lines: string[] = [
    `# Topic Crawl: ${topic}`,
    `> State: ${result.state} (${result.stoppedReason})`,
    `> Fetch attempts: ${result.pagesCrawled} | Words: ${result.wordCount}`,
  ];

  for (const origin of result.origins) {
    lines.push(
      "",
      `## ${origin.origin}`,
      `> ${origin.state} | ${origin.pagesFetched} attempt(s) | ${origin.wordCount} word(s)`,
    );
    for (const page of origin.pages) {
      lines.push(
        `- [${page.strategyUsed ?? "failed"}] ${page.url} ` +
          `(depth ${page.depth}, ${page.wordCount} words)`,
      );
    }
  }

  lines.push("", "---", "# Corpus", "");
  lines.push(result.corpus === "" ? "_No text was collected._" : result.corpus);

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Handler
// ---------------------------------------------------------------------------

/**
 * Handle a crawl_topic call.
 *
 * @param params  - Validated tool input.
 * @param options - Crawl collaborators and defaults; the MCP server passes none.
 * @returns MCP response with the report and corpus, or `isError` when the
 *   crawl could not start (e.g. no working DNS).
 */
export async function handleCrawlTopic(
  params: CrawlTopicParams,
  options: CrawlOptions = {},
) {
  try {
    const result = await crawl(params.topic, params.urls, {
      ...options,
      maxDepth: params.max_depth ?? options.maxDepth,
      maxPages: params.max_pages ?? options.maxPages,
      perOriginCap: params.per_origin_cap ?? options.perOriginCap,
    });

    return {
      content: [
        { type: "text" as const, text: formatCrawlResult(params.topic, result) },
      ],
    };
  } catch (error) {
    return {
      content: [{ type: "text" as const, text: formatError(error) }],
      isError: true,
    };
  }
}
