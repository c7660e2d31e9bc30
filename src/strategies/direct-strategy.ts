/**
 * @fileoverview Strategy 1: a plain GET with pooled browser headers.
 *
 * Retries on 403/5xx/999 and transient network errors with exponential
 * backoff. All tries of one attempt share the single budget unit reserved
 * before the first; each try waits on pacing and takes a fresh identity.
 *
 * Success is HTTP 200 with a non-empty HTML-like body.
 *
 * @module strategies/direct-strategy
 */

import { config } from "../config.js";
import { httpGet, type FetchImpl } from "../services/fetch.js";
import { withRetry } from "../services/retry.js";
import { ExtractionError, FetchError } from "../utils/errors.js";
import type { HostValidator } from "../utils/network.js";
import type {
  AttemptContext,
  FetchStrategy,
  StrategyOutcome,
} from "./strategy.js";

export interface DirectStrategyOptions {
  timeout?: number;
  maxBytes?: number;
  /** Total tries per attempt. */
  retryAttempts?: number;
  retryBackoff?: number;
  fetchImpl?: FetchImpl;
  validateHost?: HostValidator | false;
  /** Pause between tries. Tests pass a no-op. */
  sleep?: (ms: number) => Promise<unknown>;
}

export class DirectStrategy implements FetchStrategy {
  readonly name = "direct" as const;

  private readonly options: DirectStrategyOptions;

  constructor(options: DirectStrategyOptions = {}) {
    this.options = options;
  }

  async attempt(url: string, ctx: AttemptContext): Promise<StrategyOutcome> {
    // One unit for the whole attempt, retries included.
    await ctx.acquire();

    return withRetry(
      async (attempt) => {
        if (attempt > 0) {
          await ctx.pace();
        }

        const response = await httpGet(url, {
          headers: ctx.nextHeaders(),
          timeout: this.options.timeout ?? config.directTimeout,
          maxBytes: this.options.maxBytes,
          fetchImpl: this.options.fetchImpl,
          validateHost: this.options.validateHost,
        });

        // A 2xx other than 200 (204, 206, ...) is not a page.
        if (response.status !== 200) {
          throw new FetchError(
            `HTTP ${response.status} for ${url}; expected 200`,
            response.status,
          );
        }
        if (response.body.trim() === "") {
          throw new ExtractionError(`Empty body from ${url}`);
        }

        return { html: response.body, finalUrl: response.url };
      },
      {
        attempts: this.options.retryAttempts ?? config.retryAttempts,
        backoffMs: this.options.retryBackoff ?? config.retryBackoff,
        operationName: `direct GET ${url}`,
        sleep: this.options.sleep,
      },
    );
  }
}
