/**
 * @fileoverview The one capability every fetch strategy implements.
 *
 * A strategy turns a URL into markup or throws. The fetch chain iterates a
 * list of them in order and stops at the first success, so adding a strategy
 * means adding an object to that list and nothing else.
 *
 * @module strategies/strategy
 */

/** Which strategy produced a page. */
export type StrategyName = "direct" | "rendered" | "archived";

/**
 * What the chain hands to each attempt.
 */
export interface AttemptContext {
  /** Origin of the URL, the unit of the per-origin budget. */
  origin: string;

  /**
   * Reserve one budget unit and wait out the pacing delay. Call it exactly
   * once, immediately before the network fetch that the unit pays for.
   *
   * @throws {BudgetExhaustedError} When the budget refuses the reservation.
   */
  acquire(): Promise<void>;

  /**
   * Whether `acquire()` would succeed right now. Reserves nothing; lets a
   * strategy skip preparatory requests when the budget is already spent.
   */
  canAcquire(): boolean;

  /**
   * Wait out the origin's pacing delay without reserving anything. For
   * requests a unit already paid for (retries) or that are not budgeted.
   */
  pace(): Promise<void>;

  /** Headers for the next request, drawn from the identity pool. */
  nextHeaders(): Record<string, string>;
}

/**
 * Markup produced by a successful attempt.
 */
export interface StrategyOutcome {
  html: string;
  /** URL the markup was served from, after redirects. */
  finalUrl: string;
}

export interface FetchStrategy {
  readonly name: StrategyName;

  /**
   * Fetch `url`.
   *
   * @throws Any error: the chain records it and moves to the next strategy.
   */
  attempt(url: string, ctx: AttemptContext): Promise<StrategyOutcome>;
}
