/**
 * @fileoverview Tests for environment-driven configuration.
 */

import { describe, it, expect, afterEach } from "vitest";
import { loadConfig } from "../src/config.js";

const TOUCHED = [
  "CRAWL_MAX_PAGES",
  "CRAWL_PER_ORIGIN_CAP",
  "ARCHIVE_ENABLED",
  "ARCHIVE_BASE_URL",
  "PACE_MIN_MS",
  "PACE_BACKOFF_MAX",
  "BROWSER_EXECUTABLE_PATH",
  "BROWSER_CHANNEL",
] as const;

describe("loadConfig", () => {
  const saved = new Map<string, string | undefined>(
    TOUCHED.map((name) => [name, process.env[name]]),
  );

  afterEach(() => {
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("applies defaults when nothing is set", () => {
    for (const name of TOUCHED) {
      delete process.env[name];
    }

    const config = loadConfig();

    expect(config.maxPages).toBe(20);
    expect(config.perOriginCap).toBe(5);
    expect(config.archiveEnabled).toBe(true);
    expect(config.archiveBaseUrl).toBe("https://web.archive.org");
    expect(config.paceMin).toBe(1000);
    expect(config.paceBackoffMax).toBe(5);
    expect(config.browserExecutablePath).toBe("");
    expect(config.browserChannel).toBe("");
  });

  it("reads a fractional pace ceiling and the browser location", () => {
    process.env.PACE_BACKOFF_MAX = "2.5";
    process.env.BROWSER_EXECUTABLE_PATH = "/opt/chromium/chrome";
    process.env.BROWSER_CHANNEL = "chrome";

    const config = loadConfig();

    expect(config.paceBackoffMax).toBe(2.5);
    expect(config.browserExecutablePath).toBe("/opt/chromium/chrome");
    expect(config.browserChannel).toBe("chrome");
  });

  it("reads numeric overrides", () => {
    process.env.CRAWL_MAX_PAGES = "7";
    process.env.CRAWL_PER_ORIGIN_CAP = "2";

    const config = loadConfig();

    expect(config.maxPages).toBe(7);
    expect(config.perOriginCap).toBe(2);
  });

  it("reads boolean flags and ignores anything but true/false", () => {
    process.env.ARCHIVE_ENABLED = "FALSE";
    expect(loadConfig().archiveEnabled).toBe(false);

    process.env.ARCHIVE_ENABLED = "nope";
    expect(loadConfig().archiveEnabled).toBe(true);
  });
});
