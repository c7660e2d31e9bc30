/**
 * @fileoverview Tests for topic filtering and paragraph de-duplication.
 */

import { describe, it, expect } from "vitest";
import {
  dedupeParagraphs,
  filterLinks,
  filterText,
  jaccardSimilarity,
  mentionsTopic,
  splitParagraphs,
} from "../../src/crawler/relevance.js";

describe("mentionsTopic", () => {
  it("matches case-insensitively as a substring", () => {
    expect(mentionsTopic("All about WIDGETS here", "widgets")).toBe(true);
    expect(mentionsTopic("Gadgets only", "widgets")).toBe(false);
  });

  it("treats an empty topic as matching everything", () => {
    expect(mentionsTopic("anything", "  ")).toBe(true);
  });
});

describe("splitParagraphs", () => {
  it("splits on blank lines and drops empty pieces", () => {
    expect(splitParagraphs("one\n\ntwo\n  \nthree\n\n\n")).toEqual(["one", "two", "three"]);
  });
});

describe("jaccardSimilarity", () => {
  it("compares word sets", () => {
    expect(jaccardSimilarity("a b c", "a b d")).toBe(0.5);
    expect(jaccardSimilarity("A B", "a b")).toBe(1);
  });

  it("is 0 when either side has no words", () => {
    expect(jaccardSimilarity("", "a")).toBe(0);
  });
});

describe("dedupeParagraphs", () => {
  it("drops near-duplicates of an earlier paragraph and keeps order", () => {
    const first = "widgets are small useful parts used in many machines today";
    const copy = "Widgets are small useful parts used in many machines today";
    const other = "gadgets are different";

    expect(dedupeParagraphs([first, other, copy])).toEqual([first, other]);
  });

  it("keeps paragraphs at or below the threshold", () => {
    // 4 shared words of 5 distinct: exactly 0.8.
    expect(dedupeParagraphs(["a b c d", "a b c d e"])).toEqual(["a b c d", "a b c d e"]);
  });
});

describe("filterText", () => {
  it("keeps only paragraphs that mention the topic", () => {
    const text = "Widgets rock.\n\nGadgets too.\n\nMore widgets.";

    expect(filterText(text, "widgets")).toBe("Widgets rock.\n\nMore widgets.");
  });

  it("returns the input unchanged when nothing matches", () => {
    const text = "Gadgets.\n\nSprockets.";

    expect(filterText(text, "widgets")).toBe(text);
  });

  it("returns an empty string for empty input", () => {
    expect(filterText("", "widgets")).toBe("");
  });
});

describe("filterLinks", () => {
  it("matches anchor text or raw href", () => {
    const links = [
      { href: "/widgets", text: "Read more" },
      { href: "/about", text: "About our Widgets" },
      { href: "/contact", text: "Contact" },
    ];

    expect(filterLinks(links, "widgets")).toEqual([links[0], links[1]]);
  });
});
