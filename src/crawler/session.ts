/**
 * @module crawler/session
 * @fileoverview Everything one crawl invocation shares between its concurrent
 * tasks: the visited set, the budget, the scheduler and the fetch chain.
 *
 * A session is created per `crawl()` call and dropped with it, so nothing
 * leaks from one run into the next.
 */

import { config } from "../config.js";
import type { FetchImpl } from "../services/fetch.js";
import { IdentityPool } from "../services/identity-pool.js";
import { FetchScheduler } from "../services/queue.js";
import { createDefaultStrategies, FetchChain } from "../strategies/fetch-chain.js";
import type { BrowserLauncher } from "../strategies/render-strategy.js";
import type { FetchStrategy } from "../strategies/strategy.js";
import type { HostValidator } from "../utils/network.js";
import { BudgetTracker } from "./budget-tracker.js";

/**
 * Construction options. Limits default to `config`; the collaborators
 * default to the standard implementations.
 */
export interface SessionOptions {
  maxPages?: number;
  perOriginCap?: number;
  maxConcurrent?: number;
  perOriginConcurrency?: number;

  /** Headers and pacing. */
  identity?: IdentityPool;

  /** Replaces the default direct → rendered → archived list. */
  strategies?: readonly FetchStrategy[];

  /** `fetch` used by the default strategies. */
  fetchImpl?: FetchImpl;

  /** Browser for the default render strategy. */
  launchBrowser?: BrowserLauncher;

  /** Host check for the default strategies' requests. */
  validateHost?: HostValidator | false;

  /** Whether the default list ends with the archive strategy. */
  archiveEnabled?: boolean;

  /** Pause between direct retries. */
  retrySleep?: (ms: number) => Promise<unknown>;
}

export class CrawlSession {
  readonly budget: BudgetTracker;
  readonly identity: IdentityPool;
  readonly scheduler: FetchScheduler;
  readonly chain: FetchChain;

  private readonly visited = new Set<string>();

  constructor(options: SessionOptions = {}) {
    this.budget = new BudgetTracker({
      maxPages: options.maxPages ?? config.maxPages,
      perOriginCap: options.perOriginCap ?? config.perOriginCap,
    });
    this.identity = options.identity ?? new IdentityPool();
    this.scheduler = new FetchScheduler({
      maxConcurrent: options.maxConcurrent,
      perOriginConcurrency: options.perOriginConcurrency,
    });

    const strategies =
      options.strategies ??
      createDefaultStrategies({
        identity: this.identity,
        fetchImpl: options.fetchImpl,
        launchBrowser: options.launchBrowser,
        validateHost: options.validateHost,
        archiveEnabled: options.archiveEnabled,
        sleep: options.retrySleep,
      });

    this.chain = new FetchChain({
      strategies,
      budget: this.budget,
      identity: this.identity,
    });
  }

  /**
   * Record `url` as dequeued.
   *
   * @returns `false` when it had been dequeued before.
   */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) {
      return false;
    }
    this.visited.add(url);
    return true;
  }

  hasVisited(url: string): boolean {
    return this.visited.has(url);
  }
}
