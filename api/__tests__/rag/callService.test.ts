import { describe, expect, it, vi } from "vitest";

import { RagError } from "../../../src/server/rag/errors.ts";
import { callService } from "../../../src/server/rag/service/callService.ts";

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted by signal")), { once: true });
  });
}

async function kindOf(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (error: unknown) {
    return error instanceof RagError ? error.kind : "not-a-rag-error";
  }
  return "resolved";
}

describe("callService", () => {
  it("returns the result of a successful call", async () => {
    const fn = vi.fn(async (_signal: AbortSignal) => 42);
    await expect(callService(fn, { timeoutMs: 1000 })).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries a transient failure once", async () => {
    const fn = vi
      .fn(async (_signal: AbortSignal) => "ok")
      .mockRejectedValueOnce(new RagError("service_unavailable", "down"));

    await expect(callService(fn, { timeoutMs: 1000 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("gives up after the retry", async () => {
    const fn = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw new RagError("rate_limited", "slow down");
    });

    expect(await kindOf(callService(fn, { timeoutMs: 1000 }))).toBe("rate_limited");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry non-transient failures", async () => {
    const fn = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw new RagError("auth", "bad key");
    });

    expect(await kindOf(callService(fn, { timeoutMs: 1000 }))).toBe("auth");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("normalizes plain errors to unknown without retrying", async () => {
    const fn = vi.fn(async (_signal: AbortSignal): Promise<string> => {
      throw new Error("boom");
    });

    expect(await kindOf(callService(fn, { timeoutMs: 1000 }))).toBe("unknown");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("aborts the attempt and reports timeout", async () => {
    const seen: AbortSignal[] = [];
    const fn = vi.fn((signal: AbortSignal) => {
      seen.push(signal);
      return waitForAbort(signal);
    });

    expect(await kindOf(callService(fn, { timeoutMs: 20, retries: 0 }))).toBe("timeout");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(seen[0]?.aborted).toBe(true);
  });

  it("treats a timeout as transient", async () => {
    const fn = vi.fn((signal: AbortSignal) => waitForAbort(signal));

    expect(await kindOf(callService(fn, { timeoutMs: 20 }))).toBe("timeout");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("times out a call that ignores its signal and never settles", async () => {
    const fn = vi.fn((_signal: AbortSignal) => new Promise<string>(() => {}));

    const started = Date.now();
    expect(await kindOf(callService(fn, { timeoutMs: 30, retries: 1 }))).toBe("timeout");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("settles on caller cancellation even when the call ignores its signal", async () => {
    const controller = new AbortController();
    const fn = vi.fn((_signal: AbortSignal) => new Promise<string>(() => {}));

    setTimeout(() => controller.abort(), 10);
    expect(await kindOf(callService(fn, { timeoutMs: 5000, signal: controller.signal }))).toBe("aborted");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("propagates caller cancellation without retrying", async () => {
    const controller = new AbortController();
    const fn = vi.fn((signal: AbortSignal) => waitForAbort(signal));

    setTimeout(() => controller.abort(), 10);
    expect(await kindOf(callService(fn, { timeoutMs: 5000, signal: controller.signal }))).toBe("aborted");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not call the service when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async (_signal: AbortSignal) => "never");

    expect(await kindOf(callService(fn, { timeoutMs: 1000, signal: controller.signal }))).toBe("aborted");
    expect(fn).not.toHaveBeenCalled();
  });
});
