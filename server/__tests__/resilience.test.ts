import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { withResilience } from "../llm/resilience";
import { CancelledError, TimeoutError } from "../utils/errorHandler";

const policy = { label: "Test", timeoutMs: 1000, maxRetries: 1 };

describe("withResilience", () => {
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("returns the first successful result", async () => {
    const operation = vi.fn(async () => "ok");

    expect(await withResilience(operation, policy)).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("retries a failed attempt within the budget", async () => {
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockResolvedValueOnce("second");

    expect(await withResilience(operation, policy)).toBe("second");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(warnSpy).toHaveBeenCalledWith("[Test] Attempt 1/2 failed: first");
  });

  it("rethrows the last error once the budget is spent", async () => {
    const operation = vi.fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(withResilience(operation, policy)).rejects.toThrow("second");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("times out an attempt and aborts its signal", async () => {
    const seen: { signal?: AbortSignal } = {};
    const operation = (signal: AbortSignal) => {
      seen.signal = signal;
      return new Promise<string>(() => {});
    };

    await expect(withResilience(operation, { label: "Slow", timeoutMs: 10, maxRetries: 0 }))
      .rejects.toBeInstanceOf(TimeoutError);
    expect(seen.signal?.aborted).toBe(true);
  });

  it("does not start when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(async () => "ok");

    await expect(withResilience(operation, policy, controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(operation).not.toHaveBeenCalled();
  });

  it("never retries after caller cancellation", async () => {
    const controller = new AbortController();
    const operation = vi.fn((_signal: AbortSignal) => new Promise<string>(() => {}));

    const pending = withResilience(operation, { ...policy, maxRetries: 3 }, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
