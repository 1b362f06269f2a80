/**
 * Storage Guard — Test Suite
 *
 * Timeouts, bounded retries of conflicts, and how failures are reported.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { silentLogger } from "../observability/logger.js";
import { StorageGuard } from "./storage-guard.js";
import {
  ConcurrentModificationError,
  InsufficientCreditsError,
  StorageUnavailableError,
} from "./errors.js";

function guard(overrides: { timeoutMs?: number; maxRetries?: number } = {}) {
  return new StorageGuard({
    timeoutMs: overrides.timeoutMs ?? 1000,
    maxRetries: overrides.maxRetries ?? 2,
    logger: silentLogger,
  });
}

afterEach(() => {
  vi.useRealTimers();
});

describe("StorageGuard", () => {
  it("returns the result of a successful call", async () => {
    await expect(guard().run("read", async () => 42)).resolves.toBe(42);
  });

  it("passes domain errors through unchanged", async () => {
    const error = new InsufficientCreditsError("u1", 500, 200);
    await expect(
      guard().run("debit", async () => {
        throw error;
      })
    ).rejects.toBe(error);
  });

  it("retries conflicts and succeeds within the budget", async () => {
    const work = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ConcurrentModificationError("debit"))
      .mockRejectedValueOnce(new ConcurrentModificationError("debit"))
      .mockResolvedValue("ok");

    await expect(guard({ maxRetries: 2 }).run("debit", work)).resolves.toBe("ok");
    expect(work).toHaveBeenCalledTimes(3);
  });

  it("escalates to StorageUnavailable once retries run out", async () => {
    const work = vi.fn(async () => {
      throw new ConcurrentModificationError("assign");
    });

    const result = guard({ maxRetries: 1 }).run("assign", work);

    await expect(result).rejects.toBeInstanceOf(StorageUnavailableError);
    expect(work).toHaveBeenCalledTimes(2);
  });

  it("hides unexpected failures behind a generic retryable error", async () => {
    const failure = guard().run("listTiers", async () => {
      throw new Error("connect ECONNREFUSED 10.0.0.5:5432");
    });

    await expect(failure).rejects.toMatchObject({
      code: "storage_unavailable",
      retryable: true,
      message: "Entitlement storage is temporarily unavailable",
    });
  });

  it("logs the underlying cause", async () => {
    const logger = { ...silentLogger, error: vi.fn() };
    const g = new StorageGuard({ timeoutMs: 1000, maxRetries: 0, logger });

    await expect(
      g.run("getLicense", async () => {
        throw new Error("relation \"users\" does not exist");
      })
    ).rejects.toBeInstanceOf(StorageUnavailableError);

    expect(logger.error).toHaveBeenCalledWith("Storage call failed", {
      operation: "getLicense",
      error: "relation \"users\" does not exist",
    });
  });

  it("times out slow calls", async () => {
    vi.useFakeTimers();
    const slow = guard({ timeoutMs: 50 }).run("listFeatures", () => new Promise<never>(() => {}));
    const assertion = expect(slow).rejects.toBeInstanceOf(StorageUnavailableError);

    await vi.advanceTimersByTimeAsync(50);
    await assertion;
  });

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------

  describe("mutate", () => {
    it("aborts the signal at the timeout and waits for the store to finish", async () => {
      const events: string[] = [];
      const result = guard({ timeoutMs: 10 }).mutate("debit", async (signal) => {
        await new Promise((resolve) => setTimeout(resolve, 40));
        events.push(signal.aborted ? "aborted" : "live");
        signal.throwIfAborted();
        return "committed";
      });

      await expect(result).rejects.toBeInstanceOf(StorageUnavailableError);
      expect(events).toEqual(["aborted"]);
    });

    it("reports a write that committed despite the timeout", async () => {
      const result = guard({ timeoutMs: 10 }).mutate("assign", async () => {
        await new Promise((resolve) => setTimeout(resolve, 40));
        return "committed";
      });

      await expect(result).resolves.toBe("committed");
    });

    it("leaves the signal untouched when the store answers in time", async () => {
      let seen: AbortSignal | undefined;
      const result = await guard({ timeoutMs: 1000 }).mutate("unassign", async (signal) => {
        seen = signal;
        return 1;
      });

      expect(result).toBe(1);
      expect(seen?.aborted).toBe(false);
    });

    it("retries conflicts with a fresh signal", async () => {
      const signals: AbortSignal[] = [];
      let calls = 0;
      const result = await guard({ maxRetries: 1 }).mutate("upgrade", async (signal) => {
        signals.push(signal);
        calls += 1;
        if (calls === 1) throw new ConcurrentModificationError("upgrade");
        return "ok";
      });

      expect(result).toBe("ok");
      expect(signals).toHaveLength(2);
      expect(signals[0]).not.toBe(signals[1]);
    });
  });
});
