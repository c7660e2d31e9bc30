/**
 * @module config
 * @fileoverview Centralized application configuration loaded from environment variables.
 *
 * All settings have defaults for zero-config startup. Crawl limits, fetch
 * timeouts, pacing and the archive fallback are all tuned from here.
 *
 * ## Architecture Position
 * This module sits at the bottom of the dependency graph: it is imported by
 * crawler, strategies, services and tools, and imports nothing from the
 * application itself.
 *
 * ```
 *  +-----------+   +-----------+   +------------+   +-----------+
 *  |   tools   |   |  crawler  |   | strategies |   | services  |
 *  +-----+-----+   +-----+-----+   +-----+------+   +-----+-----+
 *        |               |               |                |
 *        +-------+-------+-------+-------+--------+-------+
 *                |                                |
 *          +-----v-----+                    +-----v-----+
 *          |   config  |                    |   utils   |
 *          +-----------+                    +-----------+
 * ```
 *
 * ## Environment Variable Naming Convention
 * - All uppercase with underscores (SCREAMING_SNAKE_CASE).
 * - Numeric values are parsed with `parseInt(..., 10)`; the one ratio with
 *   `parseFloat`.
 * - Boolean values use `"true"` / `"false"` strings.
 *
 * @example
 * ```ts
 * import { config } from "./config.js";
 * console.log(config.maxPages); // 20 (or whatever env says)
 *
 * process.env.CRAWL_MAX_PAGES = "5";
 * const testConfig = loadConfig();
 * console.log(testConfig.maxPages); // 5
 * ```
 */

/* ────────────────────────────────────────────────────────────────────────────
 * Type Definitions
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Complete application configuration.
 *
 * Every field is required and has a default.
 */
export interface AppConfig {
  /**
   * Deepest BFS level that is fetched. Seeds are depth 0.
   *
   * @default 2
   */
  maxDepth: number;

  /**
   * Total fetch attempts allowed for one crawl, fallback attempts included.
   *
   * @default 20
   */
  maxPages: number;

  /**
   * Fetch attempts allowed per origin (scheme + host) for one crawl.
   *
   * @default 5
   */
  perOriginCap: number;

  /**
   * Seed URLs beyond this count are ignored.
   *
   * @default 12
   */
  maxSeeds: number;

  /**
   * Timeout for one direct HTTP request, in milliseconds.
   *
   * @default 15000
   */
  directTimeout: number;

  /**
   * Upper bound on a headless render (navigation, scripts and settling), in milliseconds.
   *
   * @default 30000
   */
  renderTimeout: number;

  /**
   * Quiet period the renderer waits after the load event so that
   * script-scheduled DOM updates land before serialization, in milliseconds.
   *
   * @default 500
   */
  renderIdle: number;

  /**
   * Total tries of the direct strategy for one URL (first try included).
   *
   * @default 3
   */
  retryAttempts: number;

  /**
   * Base delay for exponential backoff between direct retries, in milliseconds.
   * Try `n` (0-based) waits `retryBackoff * 2^n`.
   *
   * @default 500
   */
  retryBackoff: number;

  /**
   * Lower bound of the randomized pre-request delay, in milliseconds.
   *
   * @default 1000
   */
  paceMin: number;

  /**
   * Upper bound of the randomized pre-request delay, in milliseconds.
   *
   * @default 3000
   */
  paceMax: number;

  /**
   * Ceiling of the per-origin pacing multiplier. Failures grow it by 1.5x,
   * successes shrink it by 0.8x, never below 1.
   *
   * @default 5
   */
  paceBackoffMax: number;

  /**
   * Maximum number of page fetches in flight across all origins.
   *
   * @default 3
   */
  maxConcurrent: number;

  /**
   * Maximum number of page fetches in flight for a single origin.
   *
   * @default 2
   */
  perOriginConcurrency: number;

  /**
   * Maximum allowed response body size in bytes.
   *
   * @default 10485760
   */
  maxResponseSize: number;

  /**
   * Whether the archived-snapshot strategy runs after direct and rendered
   * strategies have failed.
   *
   * @default true
   */
  archiveEnabled: boolean;

  /**
   * Base URL of the public web archive used for snapshot lookups.
   *
   * @default "https://web.archive.org"
   */
  archiveBaseUrl: string;

  /**
   * Time-to-live for cached snapshot lookups, in seconds.
   *
   * @default 3600
   */
  archiveCacheTtl: number;

  /**
   * Path of the Chromium or Chrome binary the render strategy launches.
   * Empty means playwright-core's own lookup.
   *
   * @default ""
   */
  browserExecutablePath: string;

  /**
   * Browser channel for the render strategy (`chrome`, `msedge`, ...), used
   * when no executable path is set. Empty means none.
   *
   * @default ""
   */
  browserChannel: string;

  /**
   * Minimum character count for the largest-text-block extraction fallback.
   *
   * @default 200
   */
  minBlockChars: number;
}

/* ────────────────────────────────────────────────────────────────────────────
 * Config Loader
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Parse a `"true"` / `"false"` environment value, falling back to a default
 * for anything else (including unset).
 */
function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const lower = value.trim().toLowerCase();
  if (lower === "true") return true;
  if (lower === "false") return false;
  return fallback;
}

/**
 * Read environment variables and build a complete {@link AppConfig}.
 *
 * Pure with respect to its input: reads `process.env` at call time and returns
 * a plain object, so tests can set variables and call it again.
 *
 * @returns A fully-populated {@link AppConfig} with all defaults applied.
 */
export function loadConfig(): AppConfig {
  return {
    maxDepth: parseInt(process.env.CRAWL_MAX_DEPTH ?? "2", 10),
    maxPages: parseInt(process.env.CRAWL_MAX_PAGES ?? "20", 10),
    perOriginCap: parseInt(process.env.CRAWL_PER_ORIGIN_CAP ?? "5", 10),
    maxSeeds: parseInt(process.env.CRAWL_MAX_SEEDS ?? "12", 10),

    directTimeout: parseInt(process.env.DIRECT_TIMEOUT ?? "15000", 10),
    renderTimeout: parseInt(process.env.RENDER_TIMEOUT ?? "30000", 10),
    renderIdle: parseInt(process.env.RENDER_IDLE_MS ?? "500", 10),

    retryAttempts: parseInt(process.env.RETRY_ATTEMPTS ?? "3", 10),
    retryBackoff: parseInt(process.env.RETRY_BACKOFF_MS ?? "500", 10),

    paceMin: parseInt(process.env.PACE_MIN_MS ?? "1000", 10),
    paceMax: parseInt(process.env.PACE_MAX_MS ?? "3000", 10),
    paceBackoffMax: parseFloat(process.env.PACE_BACKOFF_MAX ?? "5"),

    maxConcurrent: parseInt(process.env.MAX_CONCURRENT ?? "3", 10),
    perOriginConcurrency: parseInt(process.env.PER_ORIGIN_CONCURRENCY ?? "2", 10),
    maxResponseSize: parseInt(process.env.MAX_RESPONSE_SIZE ?? "10485760", 10),

    archiveEnabled: parseBoolean(process.env.ARCHIVE_ENABLED, true),
    archiveBaseUrl: process.env.ARCHIVE_BASE_URL ?? "https://web.archive.org",
    archiveCacheTtl: parseInt(process.env.ARCHIVE_CACHE_TTL ?? "3600", 10),

    browserExecutablePath: process.env.BROWSER_EXECUTABLE_PATH ?? "",
    browserChannel: process.env.BROWSER_CHANNEL ?? "",

    minBlockChars: parseInt(process.env.MIN_BLOCK_CHARS ?? "200", 10),
  };
}

/* ────────────────────────────────────────────────────────────────────────────
 * Singleton Export
 * ──────────────────────────────────────────────────────────────────────────── */

/**
 * Pre-loaded configuration singleton, evaluated once at module load time.
 *
 * If you need a fresh config (e.g., in tests), call {@link loadConfig} directly.
 */
export const config: AppConfig = loadConfig();
