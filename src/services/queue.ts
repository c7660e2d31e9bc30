/**
 * @fileoverview Concurrency control for page fetches within one crawl.
 *
 * ## Architecture: Two-Level Queue Design
 *
 * ```
 *   Page fetch tasks (one per frontier entry)
 *         |
 *         v
 *   [ Per-Origin Queue ]  <-- perOriginConcurrency (default 2)
 *         |
 *         v
 *   [ Global Queue ]      <-- maxConcurrent (default 3)
 *         |
 *         v
 *   Fetch chain + extraction
 * ```
 *
 * **Level 1 - Per-Origin Queues:** each origin gets its own queue, so one
 * site's frontier layer never occupies every global slot.
 *
 * **Level 2 - Global Queue:** caps the total number of in-flight page fetches
 * across all concurrently crawled origins.
 *
 * Pacing between requests is NOT done here: the identity pool's `pace()` runs
 * inside every fetch attempt instead.
 *
 * Unlike a process-wide singleton, a scheduler belongs to one crawl session
 * and is discarded with it.
 *
 * @module services/queue
 */

import PQueue from "p-queue";
import { config } from "../config.js";

// ---------------------------------------------------------------------------
// FetchScheduler Class
// ---------------------------------------------------------------------------

/**
 * Options for {@link FetchScheduler}.
 */
export interface SchedulerOptions {
  /** Maximum concurrent tasks across all origins. */
  maxConcurrent?: number;
  /** Maximum concurrent tasks for a single origin. */
  perOriginConcurrency?: number;
}

/**
 * Runs page-fetch tasks through a per-origin queue and then a global queue.
 *
 * ## Usage
 *
 * ```typescript
 * const scheduler = new FetchScheduler({ maxConcurrent: 3 });
 *
 * const text = await scheduler.enqueue("https://example.com", async () => {
 *   const res = await fetch("https://example.com/page");
 *   return res.text();
 * });
 * ```
 *
 * Tasks start in the order they were enqueued whenever both queues have a
 * free slot; when they do, the task begins executing synchronously inside
 * `enqueue`.
 */
export class FetchScheduler {
  /** Global concurrency queue that limits total in-flight tasks. */
  private readonly globalQueue: PQueue;

  /** Lazily created per-origin queues, keyed by origin. */
  private readonly originQueues = new Map<string, PQueue>();

  /** Concurrency used for every per-origin queue. */
  private readonly perOriginConcurrency: number;

  constructor(options: SchedulerOptions = {}) {
    this.globalQueue = new PQueue({
      concurrency: Math.max(1, options.maxConcurrent ?? config.maxConcurrent),
    });
    this.perOriginConcurrency = Math.max(
      1,
      options.perOriginConcurrency ?? config.perOriginConcurrency,
    );
  }

  // -------------------------------------------------------------------------
  // Origin Queue Management
  // -------------------------------------------------------------------------

  /**
   * Retrieve or create the queue for an origin.
   */
  private getOriginQueue(origin: string): PQueue {
    let queue = this.originQueues.get(origin);

    if (!queue) {
      queue = new PQueue({ concurrency: this.perOriginConcurrency });
      this.originQueues.set(origin, queue);
    }

    return queue;
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /**
   * Enqueue a task for execution under both concurrency limits.
   *
   * ```
   * enqueue(origin, fn)
   *   |
   *   +---> originQueue(origin).add(() =>
   *   |       globalQueue.add(() => fn())
   *   |     )
   *   |
   *   +---> resolves when fn() completes
   * ```
   *
   * @typeParam T - The return type of the task function.
   * @param origin - Origin the task fetches from.
   * @param fn     - The task to run.
   * @returns The task's return value.
   * @throws Re-throws any error from `fn`.
   */
  async enqueue<T>(origin: string, fn: () => Promise<T>): Promise<T> {
    const originQueue = this.getOriginQueue(origin);

    // throwOnTimeout narrows add() to Promise<T>; no timeout is configured
    // on these queues, fetch-level timeouts live in the strategies.
    return originQueue.add<T>(
      () => this.globalQueue.add<T>(fn, { throwOnTimeout: true }),
      { throwOnTimeout: true },
    );
  }

  /**
   * Number of origins that have a queue.
   */
  getOriginCount(): number {
    return this.originQueues.size;
  }
}
