/**
 * @fileoverview Strategy 2: render the page in a headless browser.
 *
 * Each attempt launches Chromium through playwright-core, opens a fresh
 * context carrying the pooled User-Agent, hides `navigator.webdriver` before
 * any page script runs, and navigates with `waitUntil: "networkidle"`. A
 * short quiet period follows so late timers can land, then the DOM is
 * serialized with `page.content()`.
 *
 * Page scripts run inside the browser process, never in Node.
 *
 * Every request the page makes (the document, its sub-resources, its
 * XHRs) passes a route that resolves the host and aborts anything pointing
 * at a private or loopback address.
 *
 * The whole render shares one deadline. Context and browser are closed in
 * `finally`, whatever happened.
 *
 * playwright-core downloads no browser. Point `BROWSER_EXECUTABLE_PATH` at an
 * installed Chromium or Chrome, or set `BROWSER_CHANNEL` (e.g. `chrome`).
 *
 * @module strategies/render-strategy
 */

import { chromium, errors } from "playwright-core";
import { config } from "../config.js";
import { ExtractionError, TimeoutError, formatError } from "../utils/errors.js";
import { validateHostname, type HostValidator } from "../utils/network.js";
import type {
  AttemptContext,
  FetchStrategy,
  StrategyOutcome,
} from "./strategy.js";

// ---------------------------------------------------------------------------
// Browser Surface
// ---------------------------------------------------------------------------

/*
 * The slice of Playwright's API the renderer touches. Playwright's own
 * `Browser`, `BrowserContext`, `Page` and `Route` satisfy these, and tests
 * hand in small in-process fakes.
 */

export interface RenderedResponse {
  status(): number;
}

export interface BrowserPage {
  goto(
    url: string,
    options: {
      waitUntil: "networkidle";
      timeout: number;
      referer?: string;
    },
  ): Promise<RenderedResponse | null>;
  waitForTimeout(timeout: number): Promise<void>;
  innerText(selector: string, options?: { timeout?: number }): Promise<string>;
  content(): Promise<string>;
  url(): string;
}

export interface InterceptedRoute {
  request(): { url(): string; resourceType(): string };
  abort(errorCode?: string): Promise<void>;
  continue(): Promise<void>;
}

export interface BrowserContextLike {
  addInitScript(script: string): Promise<void>;
  route(
    url: string,
    handler: (route: InterceptedRoute) => Promise<void>,
  ): Promise<void>;
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserLike {
  newContext(options: {
    userAgent?: string;
    extraHTTPHeaders?: Record<string, string>;
    javaScriptEnabled?: boolean;
  }): Promise<BrowserContextLike>;
  close(): Promise<void>;
}

/** Starts a browser for one render. */
export type BrowserLauncher = () => Promise<BrowserLike>;

/**
 * Launch headless Chromium from `config.browserExecutablePath` or
 * `config.browserChannel`.
 */
export const launchChromium: BrowserLauncher = () =>
  chromium.launch({
    headless: true,
    executablePath: config.browserExecutablePath || undefined,
    channel: config.browserChannel || undefined,
  });

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderStrategyOptions {
  /** Deadline for the whole render in milliseconds. */
  timeout?: number;
  /** Quiet period after network idle in milliseconds. */
  idleMs?: number;
  /** Defaults to {@link launchChromium}. */
  launchBrowser?: BrowserLauncher;
  /**
   * Checks every host the page contacts. Defaults to the DNS-based
   * private-address check when the browser is the default one; pass
   * `false` to let every request through.
   */
  validateHost?: HostValidator | false;
}

/** Runs before any page script; automation tells itself apart by this flag. */
const HIDE_WEBDRIVER = `Object.defineProperty(Navigator.prototype, "webdriver", {
  get: () => false,
  configurable: true,
});`;

// ---------------------------------------------------------------------------
// RenderStrategy Class
// ---------------------------------------------------------------------------

export class RenderStrategy implements FetchStrategy {
  readonly name = "rendered" as const;

  private readonly timeout: number;
  private readonly idleMs: number;
  private readonly launchBrowser: BrowserLauncher;
  private readonly validateHost: HostValidator | undefined;

  constructor(options: RenderStrategyOptions = {}) {
    this.timeout = options.timeout ?? config.renderTimeout;
    this.idleMs = options.idleMs ?? config.renderIdle;
    this.launchBrowser = options.launchBrowser ?? launchChromium;

    if (options.validateHost === false) {
      this.validateHost = undefined;
    } else {
      this.validateHost =
        options.validateHost ??
        (options.launchBrowser ? undefined : (hostname) => validateHostname(hostname));
    }
  }

  async attempt(url: string, ctx: AttemptContext): Promise<StrategyOutcome> {
    await ctx.acquire();

    const deadline = Date.now() + this.timeout;
    if (this.validateHost) {
      await this.validateHost(new URL(url).hostname);
    }

    const headers = ctx.nextHeaders();
    const browser = await this.launchBrowser();
    try {
      const context = await browser.newContext({
        userAgent: headers["User-Agent"],
        extraHTTPHeaders: { "Accept-Language": headers["Accept-Language"] },
        javaScriptEnabled: true,
      });
      try {
        await context.addInitScript(HIDE_WEBDRIVER);
        const validateHost = this.validateHost;
        if (validateHost) {
          const verdicts = new Map<string, Promise<boolean>>();
          await context.route("**/*", (route) => guardRequest(route, validateHost, verdicts));
        }

        const page = await context.newPage();
        await page.goto(url, {
          waitUntil: "networkidle",
          timeout: this.timeout,
          referer: headers.Referer,
        });

        const quiet = Math.min(this.idleMs, deadline - Date.now());
        if (quiet > 0) {
          await page.waitForTimeout(quiet);
        }

        const text = await page.innerText("body", {
          timeout: Math.max(1, deadline - Date.now()),
        });
        if (text.trim() === "") {
          throw new ExtractionError(`Rendered page ${url} has no text`);
        }

        return { html: await page.content(), finalUrl: page.url() || url };
      } finally {
        await context.close();
      }
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new TimeoutError(`Render of ${url} did not settle within ${this.timeout}ms`);
      }
      throw error;
    } finally {
      await browser.close();
    }
  }
}

// ---------------------------------------------------------------------------
// Request Guard
// ---------------------------------------------------------------------------

/**
 * Let a browser request through only when its host passes `validateHost`.
 * Verdicts are kept per host for the life of one render.
 */
export async function guardRequest(
  route: InterceptedRoute,
  validateHost: HostValidator,
  verdicts: Map<string, Promise<boolean>>,
): Promise<void> {
  const target = new URL(route.request().url());
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    await route.continue();
    return;
  }

  let verdict = verdicts.get(target.hostname);
  if (!verdict) {
    verdict = validateHost(target.hostname).then(
      () => true,
      (error: unknown) => {
        console.error(`[render] Blocked ${target.href}: ${formatError(error)}`);
        return false;
      },
    );
    verdicts.set(target.hostname, verdict);
  }

  if (await verdict) {
    await route.continue();
  } else {
    await route.abort("blockedbyclient");
  }
}
