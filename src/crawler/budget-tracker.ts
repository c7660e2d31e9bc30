/**
 * @fileoverview Page-count ceilings for one crawl: a global cap and a cap
 * per origin.
 *
 * Every fetch attempt reserves one unit before it touches the network,
 * fallback attempts included. A reservation either increments both the global
 * and the origin counter or changes nothing.
 *
 * `tryReserve` is synchronous. JavaScript runs it to completion on the one
 * event-loop thread, so the check and the increment cannot interleave with
 * another task's and two tasks can never both take the last unit.
 *
 * @module crawler/budget-tracker
 */

/**
 * Limits for a {@link BudgetTracker}.
 */
export interface BudgetLimits {
  /** Ceiling on attempts across all origins. */
  maxPages: number;
  /** Ceiling on attempts for any one origin. */
  perOriginCap: number;
}

/**
 * Point-in-time counters, for reporting.
 */
export interface BudgetSnapshot {
  pagesCrawled: number;
  maxPages: number;
  perOriginCap: number;
  /** Attempts per origin, in first-reservation order. */
  perOrigin: Record<string, number>;
}

export class BudgetTracker {
  private readonly limits: BudgetLimits;
  private pagesCrawled = 0;
  private readonly pagesByOrigin = new Map<string, number>();

  constructor(limits: BudgetLimits) {
    this.limits = {
      maxPages: Math.max(0, limits.maxPages),
      perOriginCap: Math.max(0, limits.perOriginCap),
    };
  }

  /**
   * Whether a reservation for `origin` would currently succeed. Does not
   * change any counter.
   */
  canReserve(origin: string): boolean {
    return (
      this.pagesCrawled < this.limits.maxPages &&
      this.countFor(origin) < this.limits.perOriginCap
    );
  }

  /**
   * Reserve one attempt for `origin`.
   *
   * @returns `false`, with nothing changed, when either ceiling is reached.
   */
  tryReserve(origin: string): boolean {
    if (!this.canReserve(origin)) {
      return false;
    }
    this.pagesCrawled++;
    this.pagesByOrigin.set(origin, this.countFor(origin) + 1);
    return true;
  }

  /** Whether the global ceiling has been reached. */
  isGloballyExhausted(): boolean {
    return this.pagesCrawled >= this.limits.maxPages;
  }

  countFor(origin: string): number {
    return this.pagesByOrigin.get(origin) ?? 0;
  }

  get total(): number {
    return this.pagesCrawled;
  }

  snapshot(): BudgetSnapshot {
    return {
      pagesCrawled: this.pagesCrawled,
      maxPages: this.limits.maxPages,
      perOriginCap: this.limits.perOriginCap,
      perOrigin: Object.fromEntries(this.pagesByOrigin),
    };
  }

  /** Human-readable counters for log lines and error messages. */
  describe(origin: string): string {
    return (
      `global ${this.pagesCrawled}/${this.limits.maxPages}, ` +
      `origin ${this.countFor(origin)}/${this.limits.perOriginCap}`
    );
  }
}
