import { describe, it, expect, vi, beforeEach } from "vitest";
import { withRetry } from "./retry.js";
import { AppError } from "./app-error.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    // Suppress console.warn from retry logic
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Bad request", statusCode: 400, code: "BAD_REQUEST" }),
      );

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow("Bad request");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries 5xx AppErrors", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(
        new AppError({ message: "Server error", statusCode: 502, code: "EXTERNAL_SERVICE_ERROR" }),
      )
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }),
      );

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, retryableErrors: ["TIMEOUT"] }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("matches plain error codes against retryableErrors", async () => {
    const refused = Object.assign(new Error("refused"), { code: "ECONNREFUSED" });
    const fn = vi.fn().mockRejectedValueOnce(refused).mockResolvedValue("ok");

    const result = await withRetry(fn, {
      baseDelayMs: 1,
      maxDelayMs: 1,
      retryableErrors: ["ECONNREFUSED"],
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("reports each retry through onRetry", async () => {
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(new Error("fail"));

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry }),
    ).rejects.toThrow("fail");

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    expect(onRetry.mock.calls[1]?.[0]).toBe(2);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error("aborted mid-flight");
    });

    await expect(
      withRetry(fn, { maxRetries: 5, baseDelayMs: 1, signal: controller.signal }),
    ).rejects.toThrow("aborted mid-flight");

    expect(fn).toHaveBeenCalledOnce();
  });
});
