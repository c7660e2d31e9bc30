/**
 * @fileoverview Tests for same-origin link extraction.
 *
 * Relative hrefs resolve against the page URL the way `new URL(href, base)`
 * does, so "../blog" from "/docs/intro" lands on "/blog".
 */

import { describe, it, expect } from "vitest";
import * as cheerio from "cheerio";
import { extractLinks } from "../../src/crawler/link-resolver.js";

// ---------------------------------------------------------------------------
// Discovery and resolution
// ---------------------------------------------------------------------------

describe("extractLinks — discovery", () => {
  it("resolves relative hrefs against the page URL", () => {
    const html = `
      <html><body>
        <a href="/about">About  Us</a>
        <a href="../blog">Blog</a>
      </body></html>
    `;
    const links = extractLinks(html, "https://example.com/docs/intro");

    expect(links).toEqual([
      { url: "https://example.com/about", href: "/about", text: "About Us" },
      { url: "https://example.com/blog", href: "../blog", text: "Blog" },
    ]);
  });

  it("normalizes targets and drops repeats", () => {
    const html = `
      <a href="/page?b=2&a=1#top">one</a>
      <a href="https://EXAMPLE.com/page?a=1&b=2&utm_source=x">two</a>
    `;
    const links = extractLinks(html, "https://example.com/");

    expect(links.map((link) => link.url)).toEqual(["https://example.com/page?a=1&b=2"]);
    expect(links[0].text).toBe("one");
  });

  it("accepts an already-loaded document", () => {
    const $ = cheerio.load('<a href="/x">X</a>');

    expect(extractLinks($, "https://example.com/")[0].url).toBe("https://example.com/x");
  });
});

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

describe("extractLinks — filtering", () => {
  it("keeps only links on the page's origin", () => {
    const html = `
      <a href="https://example.com/in">in</a>
      <a href="https://other.example/out">out</a>
      <a href="https://sub.example.com/sub">sub</a>
      <a href="http://example.com/plain">plain</a>
    `;
    const links = extractLinks(html, "https://example.com/");

    expect(links.map((link) => link.url)).toEqual(["https://example.com/in"]);
  });

  it("skips fragments, empty hrefs and non-fetchable schemes", () => {
    const html = `
      <a href="#section">anchor</a>
      <a href="">empty</a>
      <a href="   ">blank</a>
      <a href="javascript:void(0)">js</a>
      <a href="mailto:someone@example.com">mail</a>
      <a href="tel:+100">call</a>
      <a href="/ok">ok</a>
    `;
    const links = extractLinks(html, "https://example.com/");

    expect(links.map((link) => link.href)).toEqual(["/ok"]);
  });

  it("drops hrefs that do not resolve", () => {
    const html = '<a href="http://">broken</a><a href="/fine">fine</a>';

    expect(extractLinks(html, "https://example.com/").map((link) => link.href)).toEqual([
      "/fine",
    ]);
  });

  it("returns nothing for an unusable page URL", () => {
    expect(extractLinks('<a href="/x">x</a>', "not a url")).toEqual([]);
  });

  it("returns nothing for markup without anchors", () => {
    expect(extractLinks("<p>no links</p>", "https://example.com/")).toEqual([]);
  });
});
