/**
 * @fileoverview Tests for the headless-browser render strategy.
 *
 * A scripted fake browser stands in for Chromium. The last suite drives a
 * real one and only runs when BROWSER_EXECUTABLE_PATH names a binary.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { errors } from "playwright-core";
import { USER_AGENTS } from "../../src/services/identity-pool.js";
import { guardRequest, RenderStrategy } from "../../src/strategies/render-strategy.js";
import { ExtractionError, SecurityError, TimeoutError } from "../../src/utils/errors.js";
import type { HostValidator } from "../../src/utils/network.js";
import { fakeBrowser, freeContext, interceptedRequest } from "../helpers/fakes.js";

const URL = "https://example.com/app";

/** Refuses `internal.test` and any `10.` literal. */
const rejectInternal: HostValidator = async (hostname) => {
  if (hostname === "internal.test" || hostname.startsWith("10.")) {
    throw new SecurityError(`Hostname '${hostname}' resolves to private IP 10.0.0.5`);
  }
};

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("RenderStrategy", () => {
  it("returns the rendered DOM and the page's final URL", async () => {
    const browser = fakeBrowser({ [URL]: "<html><body><p>Widgets rendered.</p></body></html>" });
    const strategy = new RenderStrategy({ launchBrowser: browser.launch, idleMs: 0 });
    const ctx = freeContext();

    const outcome = await strategy.attempt(URL, ctx);

    expect(outcome).toEqual({
      html: "<html><body><p>Widgets rendered.</p></body></html>",
      finalUrl: URL,
    });
    expect(ctx.acquire).toHaveBeenCalledTimes(1);
  });

  it("navigates with network idle, the deadline and the pooled identity", async () => {
    const browser = fakeBrowser({ [URL]: "<body><p>text</p></body>" });
    const strategy = new RenderStrategy({
      launchBrowser: browser.launch,
      idleMs: 0,
      timeout: 1234,
    });

    await strategy.attempt(URL, freeContext());

    expect(browser.gotoCalls).toEqual([
      {
        url: URL,
        options: { waitUntil: "networkidle", timeout: 1234, referer: "https://www.google.com/" },
      },
    ]);
    expect(browser.contextOptions).toEqual([
      {
        userAgent: USER_AGENTS[0],
        extraHTTPHeaders: { "Accept-Language": "en-US,en;q=0.9" },
        javaScriptEnabled: true,
      },
    ]);
  });

  it("hides navigator.webdriver before page scripts run", async () => {
    const browser = fakeBrowser({ [URL]: "<body><p>text</p></body>" });
    const strategy = new RenderStrategy({ launchBrowser: browser.launch, idleMs: 0 });

    await strategy.attempt(URL, freeContext());

    expect(browser.initScripts).toHaveLength(1);
    expect(browser.initScripts[0]).toContain('Object.defineProperty(Navigator.prototype, "webdriver"');
    expect(browser.initScripts[0]).toContain("get: () => false");
  });

  it("never evaluates page scripts in this process", async () => {
    const html =
      "<body><p>Widgets.</p><script>globalThis.renderLeak = typeof process;</script></body>";
    const browser = fakeBrowser({ [URL]: html });
    const strategy = new RenderStrategy({ launchBrowser: browser.launch, idleMs: 0 });

    const outcome = await strategy.attempt(URL, freeContext());

    expect(outcome.html).toBe(html);
    expect(Reflect.has(globalThis, "renderLeak")).toBe(false);
  });

  it("fails when the rendered page has no visible text", async () => {
    const browser = fakeBrowser({ [URL]: "<body><script>var x = 'only script';</script></body>" });
    const strategy = new RenderStrategy({ launchBrowser: browser.launch, idleMs: 0 });

    await expect(strategy.attempt(URL, freeContext())).rejects.toBeInstanceOf(ExtractionError);
  });

  it("closes the context and the browser after a failed navigation", async () => {
    const browser = fakeBrowser({});
    const strategy = new RenderStrategy({ launchBrowser: browser.launch, idleMs: 0 });

    await expect(strategy.attempt(URL, freeContext())).rejects.toThrow(
      "net::ERR_NAME_NOT_RESOLVED",
    );
    expect(browser.events).toEqual(["launch", "context.close", "browser.close"]);
  });

  it("reports a navigation timeout as TimeoutError", async () => {
    const browser = fakeBrowser({ [URL]: "<body><p>text</p></body>" });
    const strategy = new RenderStrategy({
      idleMs: 0,
      timeout: 50,
      launchBrowser: async () => {
        const real = await browser.launch();
        return {
          newContext: async (options) => {
            const context = await real.newContext(options);
            return {
              ...context,
              newPage: async () => ({
                ...(await context.newPage()),
                goto: async () => {
                  throw new errors.TimeoutError("page.goto: Timeout 50ms exceeded.");
                },
              }),
            };
          },
          close: () => real.close(),
        };
      },
    });

    await expect(strategy.attempt(URL, freeContext())).rejects.toBeInstanceOf(TimeoutError);
    expect(browser.events).toEqual(["launch", "context.close", "browser.close"]);
  });
});

describe("RenderStrategy — private addresses", () => {
  it("refuses a private target before launching the browser", async () => {
    const browser = fakeBrowser({});
    const strategy = new RenderStrategy({
      launchBrowser: browser.launch,
      validateHost: rejectInternal,
      idleMs: 0,
    });

    await expect(
      strategy.attempt("http://internal.test/admin", freeContext()),
    ).rejects.toBeInstanceOf(SecurityError);
    expect(browser.launch).not.toHaveBeenCalled();
  });

  it("routes every page request through the host check", async () => {
    const browser = fakeBrowser({ [URL]: "<body><p>Widgets.</p></body>" });
    const strategy = new RenderStrategy({
      launchBrowser: browser.launch,
      validateHost: rejectInternal,
      idleMs: 0,
    });

    await strategy.attempt(URL, freeContext());
    expect(browser.routeHandlers).toHaveLength(1);
    const [handler] = browser.routeHandlers;

    const blocked = interceptedRequest("http://10.0.0.5/latest/meta-data/");
    await handler(blocked);
    const allowed = interceptedRequest("https://cdn.example/app.js");
    await handler(allowed);

    expect(blocked.abort).toHaveBeenCalledWith("blockedbyclient");
    expect(blocked.continue).not.toHaveBeenCalled();
    expect(allowed.continue).toHaveBeenCalledTimes(1);
    expect(allowed.abort).not.toHaveBeenCalled();
  });

  it("installs no route when the host check is off", async () => {
    const browser = fakeBrowser({ [URL]: "<body><p>Widgets.</p></body>" });
    const strategy = new RenderStrategy({
      launchBrowser: browser.launch,
      validateHost: false,
      idleMs: 0,
    });

    await strategy.attempt(URL, freeContext());

    expect(browser.routeHandlers).toEqual([]);
  });
});

describe("guardRequest", () => {
  it("checks each host once per render", async () => {
    const validate = vi.fn<HostValidator>(async () => {});
    const verdicts = new Map<string, Promise<boolean>>();

    await guardRequest(interceptedRequest("https://cdn.example/a.js"), validate, verdicts);
    await guardRequest(interceptedRequest("https://cdn.example/b.css"), validate, verdicts);

    expect(validate.mock.calls).toEqual([["cdn.example"]]);
  });

  it("lets non-http requests through unchecked", async () => {
    const validate = vi.fn<HostValidator>(async () => {});
    const route = interceptedRequest("data:image/png;base64,AAAA");

    await guardRequest(route, validate, new Map());

    expect(route.continue).toHaveBeenCalledTimes(1);
    expect(validate).not.toHaveBeenCalled();
  });
});

describe.skipIf(!process.env.BROWSER_EXECUTABLE_PATH)("RenderStrategy — real browser", () => {
  it("runs page scripts without access to Node", async () => {
    const html =
      '<html><body><p id="out">pending</p>' +
      '<script>document.getElementById("out").textContent = "process is " + typeof process;</script>' +
      "</body></html>";
    const strategy = new RenderStrategy({ validateHost: false, idleMs: 0, timeout: 10_000 });

    const outcome = await strategy.attempt(
      `data:text/html,${encodeURIComponent(html)}`,
      freeContext(),
    );

    expect(outcome.html).toContain('<p id="out">process is undefined</p>');
  });
});
