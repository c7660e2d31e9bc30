/**
 * @fileoverview Tests for the direct GET strategy.
 */

import { describe, it, expect, vi } from "vitest";
import { DirectStrategy } from "../../src/strategies/direct-strategy.js";
import type { FetchImpl } from "../../src/services/fetch.js";
import { ExtractionError, FetchError } from "../../src/utils/errors.js";
import { freeContext, htmlResponse, noSleep, routeFetch } from "../helpers/fakes.js";

const URL = "https://example.com/widgets";

describe("DirectStrategy", () => {
  it("returns the body of a 200 response", async () => {
    const fetchImpl = routeFetch({ [URL]: () => htmlResponse("<p>Widgets</p>") });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep });
    const ctx = freeContext();

    const outcome = await strategy.attempt(URL, ctx);

    expect(outcome).toEqual({ html: "<p>Widgets</p>", finalUrl: URL });
    expect(ctx.acquire).toHaveBeenCalledTimes(1);
  });

  it("sends the identity pool's headers", async () => {
    const fetchImpl = routeFetch({ [URL]: () => htmlResponse("<p>x</p>") });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep });

    await strategy.attempt(URL, freeContext());

    const headers = fetchImpl.mock.calls[0][1].headers;
    expect(headers).toMatchObject({ Referer: "https://www.google.com/" });
  });

  it("retries a 503 under a single budget unit, pacing before each retry", async () => {
    const fetchImpl = vi
      .fn<FetchImpl>()
      .mockResolvedValueOnce(htmlResponse("busy", 503))
      .mockResolvedValueOnce(htmlResponse("<p>Widgets</p>"));
    const strategy = new DirectStrategy({
      fetchImpl,
      sleep: noSleep,
      retryAttempts: 3,
      retryBackoff: 1,
    });
    const ctx = freeContext();

    const outcome = await strategy.attempt(URL, ctx);

    expect(outcome.html).toBe("<p>Widgets</p>");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(ctx.acquire).toHaveBeenCalledTimes(1);
    expect(ctx.pace).toHaveBeenCalledTimes(1);
  });

  it("gives up on a 403 after the configured tries", async () => {
    const fetchImpl = routeFetch({ [URL]: () => htmlResponse("denied", 403) });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep, retryAttempts: 3 });

    await expect(strategy.attempt(URL, freeContext())).rejects.toBeInstanceOf(FetchError);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("does not retry a 404", async () => {
    const fetchImpl = routeFetch({});
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep, retryAttempts: 3 });

    await expect(strategy.attempt(URL, freeContext())).rejects.toThrow("HTTP 404");
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("treats a 2xx other than 200 as a failure", async () => {
    const fetchImpl = routeFetch({
      [URL]: () =>
        new Response(null, { status: 204, headers: { "content-type": "text/html" } }),
    });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep });

    const error = await strategy.attempt(URL, freeContext()).catch((e: unknown) => e);

    expect(error instanceof FetchError ? error.statusCode : undefined).toBe(204);
  });

  it("treats a blank body as a failure", async () => {
    const fetchImpl = routeFetch({ [URL]: () => htmlResponse("   \n ") });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep });

    await expect(strategy.attempt(URL, freeContext())).rejects.toBeInstanceOf(
      ExtractionError,
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("makes no request when the budget refuses", async () => {
    const fetchImpl = routeFetch({ [URL]: () => htmlResponse("<p>x</p>") });
    const strategy = new DirectStrategy({ fetchImpl, sleep: noSleep });
    const ctx = freeContext();
    ctx.acquire.mockRejectedValueOnce(new Error("denied"));

    await expect(strategy.attempt(URL, ctx)).rejects.toThrow("denied");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
