/**
 * @fileoverview Tests for retry classification and backoff.
 */

import { describe, it, expect, vi } from "vitest";
import {
  calculateRetryDelay,
  classifyError,
  withRetry,
} from "../../src/services/retry.js";
import {
  ContentTypeError,
  FetchError,
  TimeoutError,
} from "../../src/utils/errors.js";

describe("classifyError", () => {
  it.each([403, 500, 502, 503, 504, 999])("retries HTTP %i", (status) => {
    expect(classifyError(new FetchError(`HTTP ${status}`, status)).isRetryable).toBe(true);
  });

  it.each([400, 401, 404, 410])("does not retry HTTP %i", (status) => {
    expect(classifyError(new FetchError(`HTTP ${status}`, status)).isRetryable).toBe(false);
  });

  it("retries timeouts and transient network errors", () => {
    expect(classifyError(new TimeoutError("slow")).isRetryable).toBe(true);
    expect(
      classifyError(new FetchError("reset", undefined, "ECONNRESET")).isRetryable,
    ).toBe(true);
    expect(classifyError(new FetchError("no response")).isRetryable).toBe(true);
  });

  it("does not retry a host that does not exist", () => {
    expect(
      classifyError(new FetchError("nx", undefined, "ENOTFOUND")).isRetryable,
    ).toBe(false);
  });

  it("does not retry content or programming errors", () => {
    expect(classifyError(new ContentTypeError("pdf")).isRetryable).toBe(false);
    expect(classifyError(new TypeError("bug")).isRetryable).toBe(false);
  });
});

describe("calculateRetryDelay", () => {
  it("doubles per retry", () => {
    expect(calculateRetryDelay(0, 500)).toBe(500);
    expect(calculateRetryDelay(1, 500)).toBe(1000);
    expect(calculateRetryDelay(2, 500)).toBe(2000);
  });
});

describe("withRetry", () => {
  it("returns the first success", async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new FetchError("HTTP 503", 503))
      .mockResolvedValueOnce("ok");
    const sleep = vi.fn(async () => {});

    const result = await withRetry(operation, { attempts: 3, backoffMs: 100, sleep });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(2, 1);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it("gives up after the configured number of tries with backoff between them", async () => {
    const operation = vi.fn(async () => {
      throw new FetchError("HTTP 403", 403);
    });
    const sleep = vi.fn(async () => {});

    await expect(
      withRetry(operation, { attempts: 3, backoffMs: 100, sleep }),
    ).rejects.toBeInstanceOf(FetchError);

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("stops at the first permanent failure", async () => {
    const operation = vi.fn(async () => {
      throw new FetchError("HTTP 404", 404);
    });

    await expect(
      withRetry(operation, { attempts: 3, backoffMs: 100, sleep: async () => {} }),
    ).rejects.toThrow("HTTP 404");

    expect(operation).toHaveBeenCalledTimes(1);
  });
});
