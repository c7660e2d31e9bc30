/**
 * @fileoverview MCP tool: fetch_page
 *
 * Runs one URL through the fetch chain (direct → rendered → archived) and the
 * content extractor, optionally keeping only the paragraphs and links that
 * mention a topic. Useful for checking what a crawl would get from a page.
 *
 * The page gets its own session with room for one attempt per strategy.
 *
 * @module tools/fetch-page
 */

import { z } from "zod";
import { filterLinks, filterText } from "../crawler/relevance.js";
import { CrawlSession, type SessionOptions } from "../crawler/session.js";
import { countWords } from "../crawler/word-counter.js";
import { extract } from "../extractor/content-extractor.js";
import { formatError, FetchError } from "../utils/errors.js";
import { isFetchableUrl, normalizeUrl } from "../utils/url.js";

/** One budget unit per strategy in the default chain. */
const SINGLE_PAGE_BUDGET = 3;

/** Links listed in the output at most. */
const MAX_LISTED_LINKS = 50;

export const FetchPageSchema = {
  url: z.string().url().describe("The URL to fetch (http or https)"),

  topic: z
    .string()
    .optional()
    .describe("Keep only paragraphs and links mentioning this topic"),
};

interface FetchPageParams {
  url: string;
  topic?: string;
}

export async function handleFetchPage(
  params: FetchPageParams,
  options: SessionOptions = {},
) {
  try {
    if (!isFetchableUrl(params.url)) {
      throw new FetchError(`Only http and https URLs can be fetched: ${params.url}`);
    }

    const url = normalizeUrl(params.url);
    const session = new CrawlSession({
      ...options,
      maxPages: options.maxPages ?? SINGLE_PAGE_BUDGET,
      perOriginCap: options.perOriginCap ?? SINGLE_PAGE_BUDGET,
    });

    const result = await session.chain.fetch(url);
    const attempts = result.attempts
      .map((a) => `${a.strategy}: ${a.ok ? "ok" : a.error ?? "failed"}`)
      .join("; ");

    if (result.html === undefined) {
      return {
        content: [
          {
            type: "text" as const,
            text: `[FETCH_FAILED] Every strategy failed for ${url} (${attempts})`,
          },
        ],
        isError: true,
      };
    }

    const page = extract(result.html, result.finalUrl ?? url);
    const topic = params.topic?.trim() ?? "";
    const text = topic && page.text ? filterText(page.text, topic) : page.text;
    const links = topic ? filterLinks(page.links, topic) : page.links;

    const lines = [
      `# ${page.title || url}`,
      `> URL: ${url}`,
      `> Strategy: ${result.strategyUsed} | Words: ${countWords(text)}`,
      `> Attempts: ${attempts}`,
      "",
      text || "_No text found._",
    ];

    if (links.length > 0) {
      lines.push("", `## Links (${links.length})`);
      for (const link of links.slice(0, MAX_LISTED_LINKS)) {
        lines.push(`- [${link.text || link.url}](${link.url})`);
      }
    }

    return {
      content: [{ type: "text" as const, text: lines.join("\n") }],
    };
  } catch (error) {
    return {
      content: [{ type: "text" as const, text: formatError(error) }],
      isError: true,
    };
  }
}
