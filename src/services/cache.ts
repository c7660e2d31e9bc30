/**
 * @fileoverview In-memory TTL cache for web-archive index lookups.
 *
 * The archive strategy asks the archive index for the latest snapshot of a
 * URL before fetching it. That answer changes slowly, so it is kept in a
 * `node-cache` store keyed by a SHA-256 of the URL. A "no snapshot" answer
 * is cached as well, as `null`.
 *
 * Unlike the crawl state, this cache is process-wide: it holds no per-crawl
 * data and carries no budget.
 *
 * @module services/cache
 */

import crypto from "node:crypto";
import NodeCache from "node-cache";
import { config } from "../config.js";

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

/**
 * A cached archive index answer.
 */
export interface SnapshotLookup {
  /**
   * 14-digit archive timestamp (`YYYYMMDDhhmmss`) of the most recent
   * snapshot, or `null` when the archive has none.
   */
  timestamp: string | null;

  /** When the lookup was made (milliseconds since epoch). */
  fetchedAt: number;
}

/**
 * Cache hit/miss statistics.
 */
export interface CacheStats {
  totalRequests: number;
  hits: number;
  misses: number;
  /** Hit rate as a percentage (0-100); 0 before any request. */
  hitRate: number;
  entries: number;
}

// ---------------------------------------------------------------------------
// Cache Key Prefix
// ---------------------------------------------------------------------------

const SNAPSHOT_PREFIX = "snapshot:" as const;

// ---------------------------------------------------------------------------
// SnapshotCache Class
// ---------------------------------------------------------------------------

/**
 * TTL cache of archive index lookups.
 *
 * ```typescript
 * const cache = new SnapshotCache(60);
 * cache.set("https://example.com/a", { timestamp: "20240101000000", fetchedAt: Date.now() });
 * cache.get("https://example.com/a")?.timestamp; // "20240101000000"
 * ```
 */
export class SnapshotCache {
  private readonly cache: NodeCache;
  private hitCount = 0;
  private missCount = 0;

  /**
   * @param ttlSeconds - Entry lifetime. Defaults to `config.archiveCacheTtl`.
   * @param maxKeys    - Hard key limit; -1 means unlimited.
   */
  constructor(ttlSeconds?: number, maxKeys = 1000) {
    const ttl = ttlSeconds ?? config.archiveCacheTtl;

    this.cache = new NodeCache({
      stdTTL: ttl,
      checkperiod: Math.max(60, Math.floor(ttl * 0.2)),
      maxKeys,
      // Entries are never mutated after set().
      useClones: false,
    });
  }

  private hashUrl(url: string): string {
    return crypto.createHash("sha256").update(url).digest("hex");
  }

  /**
   * Look up a URL. `undefined` means "not asked yet"; a value with a `null`
   * timestamp means "asked, no snapshot".
   */
  get(url: string): SnapshotLookup | undefined {
    const result = this.cache.get<SnapshotLookup>(
      `${SNAPSHOT_PREFIX}${this.hashUrl(url)}`,
    );

    if (result !== undefined) {
      this.hitCount++;
    } else {
      this.missCount++;
    }

    return result;
  }

  /**
   * Store a lookup.
   *
   * @returns `false` when node-cache refused the entry (key limit reached).
   */
  set(url: string, lookup: SnapshotLookup): boolean {
    try {
      return this.cache.set<SnapshotLookup>(
        `${SNAPSHOT_PREFIX}${this.hashUrl(url)}`,
        lookup,
      );
    } catch (error) {
      // node-cache throws ECACHEFULL at maxKeys; the lookup result stays valid.
      console.error(
        `[cache] Could not store snapshot lookup for ${url}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return false;
    }
  }

  getStats(): CacheStats {
    const totalRequests = this.hitCount + this.missCount;
    return {
      totalRequests,
      hits: this.hitCount,
      misses: this.missCount,
      hitRate: totalRequests > 0 ? (this.hitCount / totalRequests) * 100 : 0,
      entries: this.cache.keys().length,
    };
  }

  /**
   * Drop every entry and reset the statistics.
   */
  flush(): void {
    this.cache.flushAll();
    this.hitCount = 0;
    this.missCount = 0;
  }

  /**
   * Stop node-cache's expiry timer so the process can exit.
   */
  close(): void {
    this.cache.close();
  }
}

/**
 * Process-wide snapshot cache used by the archive strategy by default.
 */
export const snapshotCache = new SnapshotCache();
