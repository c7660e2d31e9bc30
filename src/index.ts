#!/usr/bin/env node
/**
 * @fileoverview MCP stdio server entry point.
 *
 * Registers two tools:
 * - `crawl_topic` - topic-guided BFS crawl of one or more sites.
 * - `fetch_page`  - one URL through the fetch chain and extractor.
 *
 * stdout carries the MCP protocol, so every diagnostic goes to stderr.
 *
 * @module index
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { CrawlTopicSchema, handleCrawlTopic } from "./tools/crawl-topic.js";
import { FetchPageSchema, handleFetchPage } from "./tools/fetch-page.js";

// ---------------------------------------------------------------------------
// Server Initialization
// ---------------------------------------------------------------------------

const server = new McpServer(
  {
    name: "mcp-topic-crawler",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

// ---------------------------------------------------------------------------
// Tool Registration
// ---------------------------------------------------------------------------
// server.tool("tool-name", "description", SchemaShape, handler). The shape is
// a plain object of Zod fields; the SDK validates input against it.
// ---------------------------------------------------------------------------

server.tool(
  "crawl_topic",
  "Crawl seed URLs breadth-first (same site only) and collect the text that mentions a topic. Falls back from a direct request to a scripted render to a web-archive snapshot when a page is blocked. Bounded by depth, total fetch attempts and attempts per site.",
  CrawlTopicSchema,
  (params) => handleCrawlTopic(params),
);

server.tool(
  "fetch_page",
  "Fetch one URL through the same fallback chain as crawl_topic and return its main text and same-site links, optionally filtered by topic.",
  FetchPageSchema,
  (params) => handleFetchPage(params),
);

// ---------------------------------------------------------------------------
// Server Startup
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("[server] mcp-topic-crawler listening on stdio");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
