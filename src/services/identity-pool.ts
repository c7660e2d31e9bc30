/**
 * @fileoverview Browser-plausible request identity and human-like pacing.
 *
 * Every fetch attempt, whichever strategy makes it, draws its headers from
 * {@link IdentityPool.nextHeaders} and waits on {@link IdentityPool.pace}
 * first. Both the delay range and the random source are injectable so tests
 * run with zero delay and a fixed pick.
 *
 * ## Adaptive pacing
 *
 * Each origin carries a delay multiplier, starting at 1. The fetch chain
 * reports every strategy outcome through {@link IdentityPool.recordOutcome}:
 * a failure multiplies it by 1.5 (capped at `paceBackoffMax`), a success by
 * 0.8 (floored at 1). `pace(origin)` scales the uniform draw by it, so a site
 * that starts refusing requests is approached more slowly.
 *
 * @module services/identity-pool
 */

import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../config.js";

// ---------------------------------------------------------------------------
// User-Agent Pool
// ---------------------------------------------------------------------------

/**
 * Current desktop browser User-Agent strings. One is picked uniformly at
 * random per request.
 */
export const USER_AGENTS: readonly string[] = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36 Edg/123.0.0.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4.1 Safari/605.1.15",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14.4; rv:125.0) Gecko/20100101 Firefox/125.0",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0",
];

/** Referer sent with every request, as if arriving from a search result. */
export const SEARCH_REFERER = "https://www.google.com/";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Header set sent with one request. */
export interface RequestHeaders {
  "User-Agent": string;
  Accept: string;
  "Accept-Language": string;
  Referer: string;
  [name: string]: string;
}

/** Options for {@link IdentityPool}. */
export interface IdentityPoolOptions {
  /** User-Agent strings to choose from. Defaults to {@link USER_AGENTS}. */
  userAgents?: readonly string[];
  /** Lower bound of the pacing delay in milliseconds. */
  paceMin?: number;
  /** Upper bound of the pacing delay in milliseconds. */
  paceMax?: number;
  /** Source of uniform numbers in `[0, 1)`. Defaults to `Math.random`. */
  random?: () => number;
  /** Suspends for the given milliseconds. Defaults to a timers/promises sleep. */
  sleep?: (ms: number) => Promise<unknown>;
  /** Ceiling of the per-origin delay multiplier. */
  paceBackoffMax?: number;
}

/** Multiplier growth after a failed attempt. */
export const PACE_BACKOFF_FACTOR = 1.5;

/** Multiplier decay after a successful attempt. */
export const PACE_RECOVERY_FACTOR = 0.8;

// ---------------------------------------------------------------------------
// IdentityPool Class
// ---------------------------------------------------------------------------

/**
 * Produces request headers and pacing delays.
 *
 * @example
 * ```typescript
 * const pool = new IdentityPool({ paceMin: 0, paceMax: 0 });
 * await pool.pace();
 * const headers = pool.nextHeaders();
 * ```
 */
export class IdentityPool {
  private readonly userAgents: readonly string[];
  private readonly paceMin: number;
  private readonly paceMax: number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private readonly paceBackoffMax: number;
  private readonly multipliers = new Map<string, number>();

  constructor(options: IdentityPoolOptions = {}) {
    this.userAgents =
      options.userAgents && options.userAgents.length > 0
        ? options.userAgents
        : USER_AGENTS;
    const min = Math.max(0, options.paceMin ?? config.paceMin);
    const max = Math.max(0, options.paceMax ?? config.paceMax);
    // A reversed range is taken as written the other way round.
    this.paceMin = Math.min(min, max);
    this.paceMax = Math.max(min, max);
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? ((ms) => sleep(ms));
    this.paceBackoffMax = Math.max(1, options.paceBackoffMax ?? config.paceBackoffMax);
  }

  /**
   * Pick a User-Agent uniformly from the pool.
   */
  nextUserAgent(): string {
    const index = Math.min(
      this.userAgents.length - 1,
      Math.floor(this.random() * this.userAgents.length),
    );
    return this.userAgents[index];
  }

  /**
   * Headers for one request: a pooled User-Agent plus generic browser
   * Accept headers and a search-engine Referer.
   */
  nextHeaders(): RequestHeaders {
    return {
      "User-Agent": this.nextUserAgent(),
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      Referer: SEARCH_REFERER,
    };
  }

  /** Current delay multiplier for `origin`; 1 until an outcome is recorded. */
  paceMultiplier(origin: string): number {
    return this.multipliers.get(origin) ?? 1;
  }

  /**
   * Adjust `origin`'s multiplier after one attempt: up on failure, down on
   * success, kept within `[1, paceBackoffMax]`.
   */
  recordOutcome(origin: string, ok: boolean): void {
    const current = this.paceMultiplier(origin);
    const next = ok
      ? Math.max(1, current * PACE_RECOVERY_FACTOR)
      : Math.min(this.paceBackoffMax, current * PACE_BACKOFF_FACTOR);
    this.multipliers.set(origin, next);
  }

  /**
   * The delay the next {@link pace} call would use: a uniform draw from
   * `[paceMin, paceMax]`, scaled by the origin's multiplier when one is given.
   */
  nextDelay(origin?: string): number {
    const base = this.paceMin + this.random() * (this.paceMax - this.paceMin);
    const multiplier = origin === undefined ? 1 : this.paceMultiplier(origin);
    return Math.round(base * multiplier);
  }

  /**
   * Suspend for a random interval. Called once per fetch attempt, right
   * before the network call.
   */
  async pace(origin?: string): Promise<void> {
    const delay = this.nextDelay(origin);
    if (delay > 0) {
      await this.sleep(delay);
    }
  }
}
