/**
 * @fileoverview Tests for URL utility functions.
 *
 * Covers: normalizeUrl, extractOrigin, extractDomain, resolveUrl,
 * isFetchableUrl.
 */

import { describe, it, expect } from "vitest";
import {
  normalizeUrl,
  extractOrigin,
  extractDomain,
  resolveUrl,
  isFetchableUrl,
} from "../../src/utils/url.js";

// ---------------------------------------------------------------------------
// normalizeUrl
// ---------------------------------------------------------------------------

describe("normalizeUrl", () => {
  it("removes fragment identifiers", () => {
    expect(normalizeUrl("https://example.com/page#section")).toBe(
      "https://example.com/page",
    );
  });

  it("removes fragment from root URL", () => {
    expect(normalizeUrl("https://example.com/#top")).toBe("https://example.com");
  });

  it("strips trailing slash on root path without query params", () => {
    expect(normalizeUrl("https://example.com/")).toBe("https://example.com");
  });

  it("preserves trailing slash on deeper paths", () => {
    expect(normalizeUrl("https://example.com/blog/")).toBe(
      "https://example.com/blog/",
    );
  });

  it("sorts query parameters alphabetically by key", () => {
    expect(normalizeUrl("https://example.com/path?z=3&a=1&m=2")).toBe(
      "https://example.com/path?a=1&m=2&z=3",
    );
  });

  it("removes default ports", () => {
    expect(normalizeUrl("http://example.com:80/page")).toBe("http://example.com/page");
    expect(normalizeUrl("https://example.com:443/page")).toBe(
      "https://example.com/page",
    );
  });

  it("preserves non-default ports", () => {
    expect(normalizeUrl("https://example.com:8080/page")).toBe(
      "https://example.com:8080/page",
    );
  });

  it("lowercases scheme and host but not the path", () => {
    expect(normalizeUrl("HTTPS://Example.COM/Path")).toBe("https://example.com/Path");
  });

  it("drops tracking parameters", () => {
    expect(
      normalizeUrl("https://example.com/post?id=7&utm_medium=social&ref=home&fbclid=abc"),
    ).toBe("https://example.com/post?id=7");
  });

  it("leaves no bare question mark when every parameter was tracking", () => {
    expect(normalizeUrl("https://example.com/post?utm_source=x&gclid=y")).toBe(
      "https://example.com/post",
    );
  });

  it("treats tracking-parameter names case-insensitively", () => {
    expect(normalizeUrl("https://example.com/a?UTM_Source=x&b=1")).toBe(
      "https://example.com/a?b=1",
    );
  });

  it("maps superficially different URLs to the same key", () => {
    expect(normalizeUrl("HTTPS://Example.com:443/?utm_campaign=x#hero")).toBe(
      normalizeUrl("https://example.com"),
    );
  });

  it("throws on invalid URLs", () => {
    expect(() => normalizeUrl("not a url")).toThrow();
  });
});

// ---------------------------------------------------------------------------
// extractOrigin / extractDomain
// ---------------------------------------------------------------------------

describe("extractOrigin", () => {
  it("returns scheme and lowercased host", () => {
    expect(extractOrigin("https://Sub.Example.COM/path?q=1")).toBe(
      "https://sub.example.com",
    );
  });

  it("keeps a non-default port", () => {
    expect(extractOrigin("http://localhost:3000/api")).toBe("http://localhost:3000");
  });

  it("distinguishes schemes", () => {
    expect(extractOrigin("http://example.com/")).not.toBe(
      extractOrigin("https://example.com/"),
    );
  });
});

describe("extractDomain", () => {
  it("returns the hostname without port", () => {
    expect(extractDomain("https://docs.example.com:8443/a")).toBe("docs.example.com");
  });
});

// ---------------------------------------------------------------------------
// resolveUrl
// ---------------------------------------------------------------------------

describe("resolveUrl", () => {
  it("resolves parent-relative paths", () => {
    expect(resolveUrl("https://example.com/docs/intro", "../blog")).toBe(
      "https://example.com/blog",
    );
  });

  it("resolves root-relative paths", () => {
    expect(resolveUrl("https://example.com/a/b", "/c")).toBe("https://example.com/c");
  });

  it("returns absolute URLs unchanged", () => {
    expect(resolveUrl("https://example.com/", "https://other.example/x")).toBe(
      "https://other.example/x",
    );
  });
});

// ---------------------------------------------------------------------------
// isFetchableUrl
// ---------------------------------------------------------------------------

describe("isFetchableUrl", () => {
  it("accepts http and https", () => {
    expect(isFetchableUrl("https://example.com/page")).toBe(true);
    expect(isFetchableUrl("http://example.com/page")).toBe(true);
  });

  it("rejects other schemes and garbage", () => {
    expect(isFetchableUrl("mailto:user@example.com")).toBe(false);
    expect(isFetchableUrl("ftp://example.com/file")).toBe(false);
    expect(isFetchableUrl("javascript:alert(1)")).toBe(false);
    expect(isFetchableUrl("not-a-valid-url")).toBe(false);
  });
});
