/**
 * @fileoverview The ordered fallback chain: direct, then rendered, then
 * archived, first success wins.
 *
 * ## Budget
 *
 * Each strategy reserves its own budget unit through `ctx.acquire()` right
 * before its network fetch. A refused reservation ends the chain for this URL
 * at once and sets `budgetExhausted`; no further strategy is tried.
 *
 * ## Pacing
 *
 * `acquire()` and `pace()` wait on the identity pool's per-origin delay.
 * Every strategy outcome (budget refusals aside) is reported back to the
 * pool, so an origin that keeps failing is paced more slowly.
 *
 * ## Failures
 *
 * Any other error is that strategy's failure. It is logged, recorded in the
 * attempt log, and the next strategy runs. When all of them fail the result
 * has no `html` and the URL contributes nothing.
 *
 * @module strategies/fetch-chain
 */

import { config } from "../config.js";
import type { BudgetTracker } from "../crawler/budget-tracker.js";
import type { FetchImpl } from "../services/fetch.js";
import type { IdentityPool } from "../services/identity-pool.js";
import { BudgetExhaustedError, formatError } from "../utils/errors.js";
import type { HostValidator } from "../utils/network.js";
import { extractOrigin } from "../utils/url.js";
import { ArchiveStrategy } from "./archive-strategy.js";
import { DirectStrategy } from "./direct-strategy.js";
import { RenderStrategy, type BrowserLauncher } from "./render-strategy.js";
import type { AttemptContext, FetchStrategy, StrategyName } from "./strategy.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/** One strategy's try at a URL. */
export interface AttemptRecord {
  strategy: StrategyName;
  ok: boolean;
  /** Formatted error, when the strategy failed. */
  error?: string;
  durationMs: number;
}

export interface FetchResult {
  /** Markup of the page; absent when every strategy failed or budget ran out. */
  html?: string;
  strategyUsed: StrategyName | null;
  origin: string;
  /** URL that was requested. */
  url: string;
  /** URL the markup belongs to, for resolving its links. */
  finalUrl?: string;
  attempts: AttemptRecord[];
  /** A reservation was refused part-way through the chain. */
  budgetExhausted: boolean;
}

export interface FetchChainOptions {
  strategies: readonly FetchStrategy[];
  budget: BudgetTracker;
  identity: IdentityPool;
}

// ---------------------------------------------------------------------------
// FetchChain Class
// ---------------------------------------------------------------------------

export class FetchChain {
  private readonly strategies: readonly FetchStrategy[];
  private readonly budget: BudgetTracker;
  private readonly identity: IdentityPool;

  constructor(options: FetchChainOptions) {
    this.strategies = options.strategies;
    this.budget = options.budget;
    this.identity = options.identity;
  }

  /** Strategy names in the order they run. */
  get order(): StrategyName[] {
    return this.strategies.map((strategy) => strategy.name);
  }

  /**
   * Run the strategies in order until one returns markup.
   *
   * Never throws: failures end up in `attempts`, budget refusal in
   * `budgetExhausted`.
   */
  async fetch(url: string): Promise<FetchResult> {
    const origin = extractOrigin(url);
    const result: FetchResult = {
      strategyUsed: null,
      origin,
      url,
      attempts: [],
      budgetExhausted: false,
    };

    const ctx: AttemptContext = {
      origin,
      acquire: async () => {
        if (!this.budget.tryReserve(origin)) {
          throw new BudgetExhaustedError(
            `Budget denied ${url} (${this.budget.describe(origin)})`,
          );
        }
        await this.identity.pace(origin);
      },
      canAcquire: () => this.budget.canReserve(origin),
      pace: () => this.identity.pace(origin),
      nextHeaders: () => this.identity.nextHeaders(),
    };

    for (const strategy of this.strategies) {
      const started = Date.now();
      try {
        const outcome = await strategy.attempt(url, ctx);
        this.identity.recordOutcome(origin, true);
        result.attempts.push({
          strategy: strategy.name,
          ok: true,
          durationMs: Date.now() - started,
        });
        result.html = outcome.html;
        result.finalUrl = outcome.finalUrl;
        result.strategyUsed = strategy.name;
        return result;
      } catch (error) {
        result.attempts.push({
          strategy: strategy.name,
          ok: false,
          error: formatError(error),
          durationMs: Date.now() - started,
        });

        if (error instanceof BudgetExhaustedError) {
          console.error(`[fetch-chain] ${error.message}; stopping chain`);
          result.budgetExhausted = true;
          return result;
        }

        this.identity.recordOutcome(origin, false);

        console.error(
          `[fetch-chain] ${strategy.name} failed for ${url}: ${formatError(error)}`,
        );
      }
    }

    console.error(`[fetch-chain] All strategies failed for ${url}; dropping it`);
    return result;
  }
}

// ---------------------------------------------------------------------------
// Default Strategy List
// ---------------------------------------------------------------------------

/**
 * Settings for {@link createDefaultStrategies}. Anything left out comes from
 * `config`.
 */
export interface DefaultStrategyOptions {
  identity: IdentityPool;
  fetchImpl?: FetchImpl;
  launchBrowser?: BrowserLauncher;
  /** Host check for every strategy's requests; see `httpGet`. */
  validateHost?: HostValidator | false;
  archiveEnabled?: boolean;
  archiveBaseUrl?: string;
  directTimeout?: number;
  renderTimeout?: number;
  renderIdle?: number;
  retryAttempts?: number;
  retryBackoff?: number;
  maxResponseSize?: number;
  /** Pause between direct retries. */
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * The standard chain: direct, rendered, and (unless disabled) archived.
 */
export function createDefaultStrategies(
  options: DefaultStrategyOptions,
): FetchStrategy[] {
  const strategies: FetchStrategy[] = [
    new DirectStrategy({
      timeout: options.directTimeout,
      maxBytes: options.maxResponseSize,
      retryAttempts: options.retryAttempts,
      retryBackoff: options.retryBackoff,
      fetchImpl: options.fetchImpl,
      validateHost: options.validateHost,
      sleep: options.sleep,
    }),
    new RenderStrategy({
      timeout: options.renderTimeout,
      idleMs: options.renderIdle,
      launchBrowser: options.launchBrowser,
      validateHost: options.validateHost,
    }),
  ];

  if (options.archiveEnabled ?? config.archiveEnabled) {
    strategies.push(
      new ArchiveStrategy({
        baseUrl: options.archiveBaseUrl,
        timeout: options.directTimeout,
        maxBytes: options.maxResponseSize,
        fetchImpl: options.fetchImpl,
        validateHost: options.validateHost,
      }),
    );
  }

  return strategies;
}
