import { afterEach, describe, expect, it, vi } from "vitest";

import { GenerationError } from "./errors.js";
import { callWithRetry, toGenerationError, withGenerationTimeout } from "./resilience.js";

describe("callWithRetry", () => {
  it("retries retryable failures and returns the eventual result", async () => {
    const operation = vi
      .fn<[number], Promise<string>>()
      .mockRejectedValueOnce(new GenerationError("busy", { status: 503, retryable: true }))
      .mockResolvedValueOnce("ok");

    await expect(callWithRetry(operation, { attempts: 2, delayMs: 1 })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenLastCalledWith(1);
  });

  it("stops on the first non-retryable failure", async () => {
    const operation = vi.fn<[number], Promise<string>>().mockRejectedValue(new GenerationError("bad request", { status: 400 }));

    await expect(callWithRetry(operation, { attempts: 3, delayMs: 1 })).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("wraps unknown failures", async () => {
    await expect(
      callWithRetry(async () => {
        throw new Error("socket hang up");
      }),
    ).rejects.toMatchObject({ name: "GenerationError", message: "code generation request failed", status: 502 });
  });
});

describe("withGenerationTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns the result before the deadline", async () => {
    await expect(
      withGenerationTimeout(() => Promise.resolve("done"), { timeoutMs: 100, action: "call" }),
    ).resolves.toBe("done");
  });

  it("aborts and rejects when the deadline passes", async () => {
    vi.useFakeTimers();
    const onAbort = vi.fn();
    const pending = withGenerationTimeout(
      ({ signal }) => {
        signal.addEventListener("abort", onAbort);
        return new Promise<never>(() => undefined);
      },
      { timeoutMs: 25, action: "chat.completions.create" },
    );
    const expectation = expect(pending).rejects.toMatchObject({
      code: "timeout",
      status: 504,
      retryable: true,
      message: "chat.completions.create timed out after 25ms",
    });
    await vi.advanceTimersByTimeAsync(30);
    await expectation;
    expect(onAbort).toHaveBeenCalledTimes(1);
  });
});

describe("toGenerationError", () => {
  it("marks rate limits and server errors as retryable", () => {
    expect(toGenerationError({ status: 429, message: "slow down" }, "fallback")).toMatchObject({
      status: 429,
      retryable: true,
      message: "slow down",
    });
    expect(toGenerationError({ status: 500 }, "fallback")).toMatchObject({ retryable: true, message: "fallback" });
    expect(toGenerationError({ status: 401, code: "invalid_api_key" }, "fallback")).toMatchObject({
      status: 401,
      code: "invalid_api_key",
      retryable: false,
    });
  });
});
