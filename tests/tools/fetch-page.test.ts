/**
 * @fileoverview Tests for the fetch_page tool handler.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { handleFetchPage } from "../../src/tools/fetch-page.js";
import type { FetchStrategy } from "../../src/strategies/strategy.js";
import { FetchError } from "../../src/utils/errors.js";
import { htmlResponse, instantIdentity, noSleep, routeFetch } from "../helpers/fakes.js";

const URL = "https://example.com/page";

const PAGE = `
  <html><head><title>Widget Page</title></head><body>
    <article><p>Widgets are neat.</p><p>Gadgets are not.</p></article>
    <div><a href="/widgets/more">more widgets</a> <a href="/contact">contact</a></div>
  </body></html>
`;

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("handleFetchPage", () => {
  it("returns the page text and links", async () => {
    const response = await handleFetchPage(
      { url: URL },
      {
        fetchImpl: routeFetch({ [URL]: () => htmlResponse(PAGE) }),
        identity: instantIdentity(),
        retrySleep: noSleep,
        archiveEnabled: false,
      },
    );

    expect(response.isError).toBeUndefined();
    expect(response.content[0].text).toBe(
      [
        "# Widget Page",
        `> URL: ${URL}`,
        "> Strategy: direct | Words: 6",
        "> Attempts: direct: ok",
        "",
        "Widgets are neat.\n\nGadgets are not.",
        "",
        "## Links (2)",
        "- [more widgets](https://example.com/widgets/more)",
        "- [contact](https://example.com/contact)",
      ].join("\n"),
    );
  });

  it("narrows text and links to a topic", async () => {
    const response = await handleFetchPage(
      { url: URL, topic: "widgets" },
      {
        fetchImpl: routeFetch({ [URL]: () => htmlResponse(PAGE) }),
        identity: instantIdentity(),
        retrySleep: noSleep,
        archiveEnabled: false,
      },
    );

    expect(response.content[0].text).toBe(
      [
        "# Widget Page",
        `> URL: ${URL}`,
        "> Strategy: direct | Words: 3",
        "> Attempts: direct: ok",
        "",
        "Widgets are neat.",
        "",
        "## Links (1)",
        "- [more widgets](https://example.com/widgets/more)",
      ].join("\n"),
    );
  });

  it("reports every failed strategy", async () => {
    const failing: FetchStrategy = {
      name: "direct",
      attempt: async (_url, ctx) => {
        await ctx.acquire();
        throw new FetchError("HTTP 404", 404);
      },
    };

    const response = await handleFetchPage(
      { url: URL },
      { strategies: [failing], identity: instantIdentity() },
    );

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe(
      `[FETCH_FAILED] Every strategy failed for ${URL} (direct: [FETCH_FAILED] HTTP 404)`,
    );
  });

  it("rejects URLs that are not http(s)", async () => {
    const response = await handleFetchPage({ url: "ftp://example.com/file" });

    expect(response.isError).toBe(true);
    expect(response.content[0].text).toBe(
      "[FETCH_FAILED] Only http and https URLs can be fetched: ftp://example.com/file",
    );
  });
});
