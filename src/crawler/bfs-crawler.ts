/**
 * @module crawler/bfs-crawler
 * @fileoverview Topic-guided breadth-first crawl over one or more sites.
 *
 * ## Algorithm
 *
 * Seeds are grouped by origin and each origin gets its own traversal; the
 * traversals run concurrently and share one {@link CrawlSession}. Within an
 * origin the frontier is processed one layer (one depth) at a time, the
 * entries of a layer fetched concurrently through the session's scheduler.
 * Layer `d + 1` is only built once layer `d` is done.
 *
 * ```
 *   for each entry of the layer:
 *     visited?           -> discard
 *     mark visited
 *     depth > maxDepth   -> discard
 *     budget peek fails  -> origin exhausted
 *     fetch chain        -> no html: drop (budget refused mid-chain: exhausted)
 *     redirected         -> mark the final URL visited too
 *     extract, filterText, append non-empty text (a throw drops the URL)
 *     depth < maxDepth   -> filterLinks, queue at depth + 1
 * ```
 *
 * ## Termination
 *
 * A traversal ends `completed` when its frontier runs dry and `exhausted` when
 * the budget refuses it. The crawl as a whole is `exhausted` when any
 * traversal was. Both return the corpus gathered; only a resolver that is
 * down for every seed host makes `crawl()` throw.
 *
 * @example
 * ```ts
 * const result = await crawl("widgets", ["https://example.com/"], { maxPages: 10 });
 * console.error(result.state, result.wordCount);
 * ```
 */

import { config } from "../config.js";
import {
  extract,
  type ExtractOptions,
} from "../extractor/content-extractor.js";
import type { StrategyName } from "../strategies/strategy.js";
import { formatError } from "../utils/errors.js";
import { assertResolverAvailable, type HostLookup } from "../utils/network.js";
import {
  extractDomain,
  extractOrigin,
  isFetchableUrl,
  normalizeUrl,
} from "../utils/url.js";
import { filterLinks, filterText } from "./relevance.js";
import { CrawlSession, type SessionOptions } from "./session.js";
import { countWords } from "./word-counter.js";

/* ────────────────────────────────────────────────────────────────────────────
 * Types
 * ──────────────────────────────────────────────────────────────────────────── */

export type CrawlState = "idle" | "running" | "completed" | "exhausted";

export type TerminalState = Extract<CrawlState, "completed" | "exhausted">;

export type StoppedReason = "frontier_empty" | "budget_exhausted" | "aborted";

/**
 * Receives each origin's text once its traversal ends. Origins that yielded
 * no text are not delivered.
 */
export interface CorpusSink {
  accept(entry: {
    origin: string;
    corpus: string;
    wordCount: number;
  }): void | Promise<void>;
}

/**
 * Options for {@link crawl}. Limits default to `config`.
 */
export interface CrawlOptions extends SessionOptions {
  maxDepth?: number;
  maxSeeds?: number;

  /** Stops the crawl from starting further fetches once aborted. */
  signal?: AbortSignal;

  sink?: CorpusSink;

  /** Resolver for the preflight check. Defaults to `dns.lookup`. */
  lookup?: HostLookup;

  extractOptions?: ExtractOptions;
}

/** One frontier entry. */
export interface FrontierEntry {
  readonly url: string;
  readonly depth: number;
}

/** A URL that went through the fetch chain. */
export interface PageReport {
  url: string;
  depth: number;
  strategyUsed: StrategyName | null;
  /** Words this page added to the corpus. */
  wordCount: number;
  /** Qualifying links queued from this page. */
  linksQueued: number;
}

export interface OriginReport {
  origin: string;
  state: TerminalState;
  stoppedReason: StoppedReason;
  corpus: string;
  wordCount: number;
  /** Budget units this origin consumed. */
  pagesFetched: number;
  pages: PageReport[];
}

/** What one frontier entry produced. */
type VisitOutcome =
  | { kind: "page"; page: PageReport; text: string; links: string[] }
  | { kind: "exhausted" }
  | { kind: "aborted" };

export interface CrawlResult {
  corpus: string;
  wordCount: number;
  state: TerminalState;
  stoppedReason: StoppedReason;
  /** Budget units consumed across all origins. */
  pagesCrawled: number;
  origins: OriginReport[];
}

/* ────────────────────────────────────────────────────────────────────────────
 * Seed Handling
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Validate, normalize and de-duplicate seeds, keeping at most `maxSeeds`.
 * Invalid seeds are logged and dropped.
 */
export function prepareSeeds(seedUrls: readonly string[], maxSeeds: number): string[] {
  const seen = new Set<string>();
  const seeds: string[] = [];

  for (const raw of seedUrls) {
    const candidate = raw.trim();
    if (!isFetchableUrl(candidate)) {
      console.error(`[bfs-crawler] Dropping invalid seed: ${raw}`);
      continue;
    }
    const normalized = normalizeUrl(candidate);
    if (!seen.has(normalized)) {
      seen.add(normalized);
      seeds.push(normalized);
    }
  }

  if (seeds.length > maxSeeds) {
    console.error(
      `[bfs-crawler] ${seeds.length} seeds given, keeping the first ${maxSeeds}`,
    );
  }
  return seeds.slice(0, Math.max(0, maxSeeds));
}

/** Group seeds by origin, in order of first appearance. */
function groupByOrigin(seeds: readonly string[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const seed of seeds) {
    const origin = extractOrigin(seed);
    const group = groups.get(origin);
    if (group) {
      group.push(seed);
    } else {
      groups.set(origin, [seed]);
    }
  }
  return groups;
}

/** A visited URL that added nothing. */
function dropped(entry: FrontierEntry, strategyUsed: StrategyName | null): VisitOutcome {
  return {
    kind: "page",
    page: {
      url: entry.url,
      depth: entry.depth,
      strategyUsed,
      wordCount: 0,
      linksQueued: 0,
    },
    text: "",
    links: [],
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Controller
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Runs one crawl. Starts `idle`, moves to `running` on {@link run}, and ends
 * `completed` or `exhausted`. A controller runs once.
 */
export class BfsController {
  private currentState: CrawlState = "idle";
  private readonly topic: string;
  private readonly session: CrawlSession;
  private readonly maxDepth: number;
  private readonly options: CrawlOptions;

  constructor(topic: string, options: CrawlOptions = {}) {
    this.topic = topic;
    this.options = options;
    this.maxDepth = Math.max(0, options.maxDepth ?? config.maxDepth);
    this.session = new CrawlSession(options);
  }

  get state(): CrawlState {
    return this.currentState;
  }

  /**
   * Crawl from the given seeds.
   *
   * @throws {NetworkUnavailableError} If the resolver is down for every seed host.
   * @throws {Error} If the controller has already run.
   */
  async run(seedUrls: readonly string[]): Promise<CrawlResult> {
    if (this.currentState !== "idle") {
      throw new Error(`Crawl already ${this.currentState}`);
    }

    const seeds = prepareSeeds(seedUrls, this.options.maxSeeds ?? config.maxSeeds);
    this.currentState = "running";

    if (seeds.length > 0) {
      await assertResolverAvailable(
        seeds.map((seed) => extractDomain(seed)),
        this.options.lookup,
      );
    }

    const limits = this.session.budget.snapshot();
    console.error(
      `[bfs-crawler] Crawling "${this.topic}" from ${seeds.length} seed(s), ` +
        `maxDepth=${this.maxDepth}, maxPages=${limits.maxPages}, ` +
        `perOriginCap=${limits.perOriginCap}`,
    );

    const groups = groupByOrigin(seeds);
    const origins = await Promise.all(
      [...groups].map(([origin, originSeeds]) => this.traverse(origin, originSeeds)),
    );

    const corpus = origins
      .map((report) => report.corpus)
      .filter((text) => text !== "")
      .join("\n\n");

    const exhausted = origins.some((report) => report.state === "exhausted");
    const state: TerminalState = exhausted ? "exhausted" : "completed";
    this.currentState = state;

    const stoppedReason: StoppedReason = origins.some(
      (report) => report.stoppedReason === "aborted",
    )
      ? "aborted"
      : exhausted
        ? "budget_exhausted"
        : "frontier_empty";

    const result: CrawlResult = {
      corpus,
      wordCount: countWords(corpus),
      state,
      stoppedReason,
      pagesCrawled: this.session.budget.total,
      origins,
    };

    console.error(
      `[bfs-crawler] Done: ${state} (${stoppedReason}), ` +
        `${result.pagesCrawled} fetch attempt(s) over ${this.session.scheduler.getOriginCount()} ` +
        `origin(s), ${result.wordCount} word(s)`,
    );
    return result;
  }

  /* ── Per-origin traversal ─────────────────────────────────────────────── */

  private async traverse(origin: string, seeds: readonly string[]): Promise<OriginReport> {
    const texts: string[] = [];
    const pages: PageReport[] = [];
    let exhausted = false;
    let aborted = false;

    let layer: FrontierEntry[] = seeds.map((url) => ({ url, depth: 0 }));

    while (layer.length > 0 && !exhausted && !aborted) {
      const toVisit: FrontierEntry[] = [];
      for (const entry of layer) {
        if (!this.session.markVisited(entry.url)) {
          continue;
        }
        if (entry.depth > this.maxDepth) {
          continue;
        }
        toVisit.push(entry);
      }

      const outcomes = await Promise.all(
        toVisit.map((entry) =>
          this.session.scheduler.enqueue(origin, () => this.visit(origin, entry)),
        ),
      );

      const next: FrontierEntry[] = [];
      for (const outcome of outcomes) {
        if (outcome.kind === "exhausted") {
          exhausted = true;
          continue;
        }
        if (outcome.kind === "aborted") {
          aborted = true;
          continue;
        }
        pages.push(outcome.page);
        if (outcome.text !== "") {
          texts.push(outcome.text);
        }
        for (const url of outcome.links) {
          if (!this.session.hasVisited(url)) {
            next.push({ url, depth: outcome.page.depth + 1 });
          }
        }
      }

      layer = next;
    }

    const corpus = texts.join("\n\n");
    const stoppedReason: StoppedReason = aborted
      ? "aborted"
      : exhausted
        ? "budget_exhausted"
        : "frontier_empty";
    const report: OriginReport = {
      origin,
      state: exhausted || aborted ? "exhausted" : "completed",
      stoppedReason,
      corpus,
      wordCount: countWords(corpus),
      pagesFetched: this.session.budget.countFor(origin),
      pages,
    };

    if (exhausted) {
      console.error(
        `[bfs-crawler] Budget exhausted for ${origin} (${this.session.budget.describe(origin)})`,
      );
    }

    await this.deliver(report);
    return report;
  }

  private async visit(origin: string, entry: FrontierEntry): Promise<VisitOutcome> {
    if (this.options.signal?.aborted) {
      return { kind: "aborted" };
    }
    if (!this.session.budget.canReserve(origin)) {
      return { kind: "exhausted" };
    }

    const result = await this.session.chain.fetch(entry.url);

    if (result.html === undefined) {
      if (result.budgetExhausted) {
        return { kind: "exhausted" };
      }
      console.error(`[bfs-crawler] Dropped ${entry.url}: no strategy succeeded`);
      return dropped(entry, null);
    }

    const finalUrl = result.finalUrl ?? entry.url;
    if (finalUrl !== entry.url && isFetchableUrl(finalUrl)) {
      this.session.markVisited(normalizeUrl(finalUrl));
    }

    let text: string;
    let links: string[];
    try {
      const page = extract(result.html, finalUrl, this.options.extractOptions);
      text = page.text.trim() === "" ? "" : filterText(page.text, this.topic);
      links =
        entry.depth < this.maxDepth
          ? filterLinks(page.links, this.topic).map((link) => link.url)
          : [];
    } catch (error) {
      console.error(`[bfs-crawler] Dropped ${entry.url}: ${formatError(error)}`);
      return dropped(entry, result.strategyUsed);
    }

    return {
      kind: "page",
      page: {
        url: entry.url,
        depth: entry.depth,
        strategyUsed: result.strategyUsed,
        wordCount: countWords(text),
        linksQueued: links.length,
      },
      text,
      links,
    };
  }

  private async deliver(report: OriginReport): Promise<void> {
    const sink = this.options.sink;
    if (!sink || report.corpus === "") {
      return;
    }
    try {
      await sink.accept({
        origin: report.origin,
        corpus: report.corpus,
        wordCount: report.wordCount,
      });
    } catch (error) {
      console.error(
        `[bfs-crawler] Corpus sink rejected ${report.origin}: ${formatError(error)}`,
      );
    }
  }
}

/* ────────────────────────────────────────────────────────────────────────────
 * Entry Point
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Crawl `seedUrls` for text about `topic`.
 *
 * @throws {NetworkUnavailableError} If the resolver is down for every seed host.
 */
export async function crawl(
  topic: string,
  seedUrls: readonly string[],
  options: CrawlOptions = {},
): Promise<CrawlResult> {
  return new BfsController(topic, options).run(seedUrls);
}
