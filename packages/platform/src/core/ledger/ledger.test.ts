/**
 * License Ledger — Test Suite
 *
 * Seat assignment, tier changes and credit accounting against the
 * in-process store. Concurrency cases use a store with a simulated
 * round trip so calls genuinely interleave.
 */

import { describe, it, expect, vi } from "vitest";
import {
  buildTestServices,
  seedTestCatalog,
  addUsers,
  TENANT_A,
  TENANT_B,
} from "../../testing/fixtures.js";
import {
  AlreadyLicensedError,
  ConcurrentModificationError,
  InsufficientCreditsError,
  InvalidRequestError,
  NotFoundError,
  NotLicensedError,
  PoolExhaustedError,
  StorageUnavailableError,
} from "../entitlements/errors.js";

async function setup(latencyMs = 0) {
  const { services, store } = buildTestServices({ latencyMs });
  await seedTestCatalog(services);
  await addUsers(services, TENANT_A, "u1", "u2", "u3", "u4", "u5");
  return { services, store, ledger: services.ledger };
}

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

describe("registerUser", () => {
  it("creates an unlicensed record once and keeps it afterwards", async () => {
    const { ledger } = await setup();

    const created = await ledger.registerUser("newcomer", TENANT_B);
    expect(created).toMatchObject({
      userId: "newcomer",
      tenantId: TENANT_B,
      licenseTierId: null,
      creditsAllocated: 0,
      creditsUsed: 0,
    });

    await ledger.assign("u1", "basic", null);
    const again = await ledger.registerUser("u1", TENANT_B);
    expect(again.tenantId).toBe(TENANT_A);
    expect(again.licenseTierId).toBe("basic");
  });
});

// ---------------------------------------------------------------------------
// Assignment
// ---------------------------------------------------------------------------

describe("assign", () => {
  it("grants the tier's default credits and takes a seat", async () => {
    const { ledger } = await setup();

    const { state, transaction } = await ledger.assign("u1", "basic", "admin-1");

    expect(state.licenseTierId).toBe("basic");
    expect(state.licenseIsActive).toBe(true);
    expect(state.creditsAllocated).toBe(1000);
    expect(state.creditsUsed).toBe(0);
    expect(transaction.type).toBe("assign");
    expect(transaction.amount).toBe(1000);
    expect(transaction.balanceAfter).toBe(1000);
    expect(transaction.createdBy).toBe("admin-1");

    const [basic] = await ledger.listPools(TENANT_A);
    expect(basic).toMatchObject({ tierId: "basic", assignedCount: 1, availableCount: 2 });
  });

  it("rejects a second license for the same user", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await expect(ledger.assign("u1", "pro", null)).rejects.toBeInstanceOf(AlreadyLicensedError);
  });

  it("reports an exhausted pool when the tenant has no pool for the tier", async () => {
    const { services, ledger } = await setup();
    await addUsers(services, TENANT_B, "b1");

    await expect(ledger.assign("b1", "basic", null)).rejects.toBeInstanceOf(PoolExhaustedError);
  });

  it("rejects unknown users and tiers", async () => {
    const { ledger } = await setup();

    await expect(ledger.assign("ghost", "basic", null)).rejects.toBeInstanceOf(NotFoundError);
    await expect(ledger.assign("u1", "platinum", null)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("never hands out more seats than the pool holds under concurrency", async () => {
    const { ledger } = await setup(1);

    const results = await Promise.allSettled(
      ["u1", "u2", "u3", "u4", "u5"].map((userId) => ledger.assign(userId, "basic", null))
    );

    const succeeded = results.filter((r) => r.status === "fulfilled");
    const failed = results.filter((r) => r.status === "rejected");
    expect(succeeded).toHaveLength(3);
    expect(failed).toHaveLength(2);
    for (const result of failed) {
      if (result.status === "rejected") expect(result.reason).toBeInstanceOf(PoolExhaustedError);
    }

    const pools = await ledger.listPools(TENANT_A);
    expect(pools.find((p) => p.tierId === "basic")).toMatchObject({
      totalCount: 3,
      assignedCount: 3,
      availableCount: 0,
    });
  });
});

describe("unassign", () => {
  it("forfeits the remaining credits and frees the seat", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.debit("u1", 100, "run-1", null);

    const { state, transaction } = await ledger.unassign("u1", "admin-1");

    expect(state.licenseTierId).toBeNull();
    expect(state.licenseIsActive).toBe(false);
    expect(state.creditsAllocated).toBe(0);
    expect(transaction.type).toBe("unassign");
    expect(transaction.amount).toBe(900);
    expect(transaction.balanceAfter).toBe(0);

    const pools = await ledger.listPools(TENANT_A);
    expect(pools.find((p) => p.tierId === "basic")?.assignedCount).toBe(0);
  });

  it("rejects a user without a license", async () => {
    const { ledger } = await setup();

    await expect(ledger.unassign("u1", null)).rejects.toBeInstanceOf(NotLicensedError);
  });
});

// ---------------------------------------------------------------------------
// Tier changes
// ---------------------------------------------------------------------------

describe("upgrade", () => {
  it("adds the new grant to the remaining balance when credits are preserved", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.debit("u1", 300, "run-1", null);

    const { state, transaction } = await ledger.upgrade("u1", "pro", true, "admin-1");

    expect(state.licenseTierId).toBe("pro");
    expect(state.creditsAllocated).toBe(5700);
    expect(state.creditsUsed).toBe(0);
    expect(transaction.type).toBe("upgrade");
    expect(transaction.amount).toBe(5000);
    expect(transaction.balanceAfter).toBe(5700);
    expect(transaction.metadata).toEqual({
      fromTierId: "basic",
      toTierId: "pro",
      creditsAllocatedBefore: 1000,
      creditsAllocatedAfter: 5700,
      creditsUsedBefore: 300,
      preserveCredits: true,
    });

    const pools = await ledger.listPools(TENANT_A);
    expect(pools.find((p) => p.tierId === "basic")).toMatchObject({ assignedCount: 0, availableCount: 3 });
    expect(pools.find((p) => p.tierId === "pro")).toMatchObject({ assignedCount: 1, availableCount: 0 });
  });

  it("resets to the new grant when credits are not preserved", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.debit("u1", 300, "run-1", null);

    const { state } = await ledger.upgrade("u1", "pro", false, null);

    expect(state.creditsAllocated).toBe(5000);
    expect(state.creditsUsed).toBe(0);
  });

  it("records a move to a lower tier as a downgrade", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "pro", null);

    const { transaction } = await ledger.upgrade("u1", "basic", false, null);

    expect(transaction.type).toBe("downgrade");
    expect(transaction.amount).toBe(1000);
  });

  it("rejects a change to the tier already held", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await expect(ledger.upgrade("u1", "basic", false, null)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
  });

  it("leaves everything untouched when the target pool is full", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "pro", null);
    await ledger.assign("u2", "basic", null);

    await expect(ledger.upgrade("u2", "pro", false, null)).rejects.toBeInstanceOf(PoolExhaustedError);

    const license = await ledger.getLicense("u2");
    expect(license.licenseTierId).toBe("basic");
    const pools = await ledger.listPools(TENANT_A);
    expect(pools.find((p) => p.tierId === "basic")?.assignedCount).toBe(1);
    expect(pools.find((p) => p.tierId === "pro")?.assignedCount).toBe(1);
  });

  it("rejects an unlicensed user", async () => {
    const { ledger } = await setup();

    await expect(ledger.upgrade("u1", "pro", false, null)).rejects.toBeInstanceOf(NotLicensedError);
  });

  it("makes the new tier's features visible immediately", async () => {
    const { services, ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    expect(await services.resolver.isEnabled("u1", "models.openai")).toBe(false);

    await ledger.upgrade("u1", "pro", false, null);

    expect(await services.resolver.isEnabled("u1", "models.openai")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Pools
// ---------------------------------------------------------------------------

describe("setPoolCapacity", () => {
  it("rejects more seats than the tier allows per tenant", async () => {
    const { ledger } = await setup();

    await expect(ledger.setPoolCapacity(TENANT_A, "basic", 6, null)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
  });

  it("refuses to shrink below the assigned seats", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.assign("u2", "basic", null);

    await expect(ledger.setPoolCapacity(TENANT_A, "basic", 1, null)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
  });

  it("keeps assigned seats when growing", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    const pool = await ledger.setPoolCapacity(TENANT_A, "basic", 5, null);

    expect(pool).toMatchObject({ totalCount: 5, assignedCount: 1, availableCount: 4 });
  });
});

// ---------------------------------------------------------------------------
// Credits
// ---------------------------------------------------------------------------

describe("debit", () => {
  it("spends credits until the balance runs out", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    expect((await ledger.debit("u1", 400, "run-1", null)).balance).toBe(600);
    expect((await ledger.debit("u1", 400, "run-2", null)).balance).toBe(200);
    await expect(ledger.debit("u1", 500, "run-3", null)).rejects.toBeInstanceOf(
      InsufficientCreditsError
    );

    const license = await ledger.getLicense("u1");
    expect(license.creditsUsed).toBe(800);
  });

  it("reports the shortfall in the error", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await expect(ledger.debit("u1", 1500, "run-1", null)).rejects.toThrow(
      "Insufficient credits: requested 1500, remaining 1000"
    );
  });

  it("records the reference on the ledger row", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    const { transaction } = await ledger.debit("u1", 25, "flow-42", "u1");

    expect(transaction).toMatchObject({
      type: "debit",
      amount: 25,
      balanceAfter: 975,
      reference: "flow-42",
      createdBy: "u1",
    });
  });

  it("rejects non-positive and fractional amounts", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await expect(ledger.debit("u1", 0, "run-1", null)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(ledger.debit("u1", 1.5, "run-1", null)).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("rejects an unlicensed user", async () => {
    const { ledger } = await setup();

    await expect(ledger.debit("u1", 10, "run-1", null)).rejects.toBeInstanceOf(NotLicensedError);
  });

  it("never overspends under concurrent debits", async () => {
    const { ledger } = await setup(1);
    await ledger.assign("u1", "basic", null);

    const results = await Promise.allSettled(
      Array.from({ length: 10 }, (_, i) => ledger.debit("u1", 150, `run-${i}`, null))
    );

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(6);
    const license = await ledger.getLicense("u1");
    expect(license.creditsUsed).toBe(900);
    const debits = await ledger.listTransactions({ userId: "u1", type: "debit" });
    expect(debits).toHaveLength(6);
  });

  it("retries a conflicting write and then succeeds", async () => {
    const { store, ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    const spy = vi
      .spyOn(store, "debitCredits")
      .mockRejectedValueOnce(new ConcurrentModificationError("debit"));

    const { balance } = await ledger.debit("u1", 100, "run-1", null);

    expect(balance).toBe(900);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("gives up after the retry budget with a retryable error", async () => {
    const { store, ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    const spy = vi
      .spyOn(store, "debitCredits")
      .mockRejectedValue(new ConcurrentModificationError("debit"));

    const error = await ledger.debit("u1", 100, "run-1", null).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageUnavailableError);
    expect(spy).toHaveBeenCalledTimes(4);
    expect((await ledger.getLicense("u1")).creditsUsed).toBe(0);
  });

  it("does not commit a debit that outlived the storage timeout", async () => {
    const { services, store } = buildTestServices({ settings: { storageTimeoutMs: 10 } });
    await seedTestCatalog(services);
    await addUsers(services, TENANT_A, "u1");
    const { ledger } = services;
    await ledger.assign("u1", "basic", null);

    store.setLatency(30);
    await expect(ledger.debit("u1", 100, "run-1", null)).rejects.toBeInstanceOf(
      StorageUnavailableError
    );
    await new Promise((resolve) => setTimeout(resolve, 60));
    store.setLatency(0);

    expect((await ledger.getLicense("u1")).creditsUsed).toBe(0);
    expect(await ledger.listTransactions({ userId: "u1", type: "debit" })).toEqual([]);
  });
});

describe("replenish", () => {
  it("applies a billing period once", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    expect(await ledger.replenish("u1", 500, "2026-10", null)).toEqual({ applied: true, balance: 1500 });
    expect(await ledger.replenish("u1", 500, "2026-10", null)).toEqual({ applied: false, balance: 1500 });
    expect(await ledger.replenish("u1", 500, "2026-11", null)).toEqual({ applied: true, balance: 2000 });

    const rows = await ledger.listTransactions({ userId: "u1", type: "replenish" });
    expect(rows.map((row) => row.billingPeriod)).toEqual(["2026-11", "2026-10"]);
  });

  it("applies a period once under concurrent replays", async () => {
    const { ledger } = await setup(1);
    await ledger.assign("u1", "basic", null);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => ledger.replenish("u1", 500, "2026-10", null))
    );

    expect(results.filter((r) => r.applied)).toHaveLength(1);
    expect((await ledger.getLicense("u1")).creditsAllocated).toBe(1500);
  });

  it("treats a replayed period as a no-op after the license is gone", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.replenish("u1", 500, "2026-10", null);
    await ledger.unassign("u1", null);

    expect(await ledger.replenish("u1", 500, "2026-10", null)).toEqual({ applied: false, balance: 0 });
    await expect(ledger.replenish("u1", 500, "2026-11", null)).rejects.toBeInstanceOf(NotLicensedError);
  });

  it("requires a billing period", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await expect(ledger.replenish("u1", 500, "  ", null)).rejects.toBeInstanceOf(InvalidRequestError);
  });
});

describe("checkCanExecute", () => {
  it("denies an unlicensed user", async () => {
    const { ledger } = await setup();

    expect(await ledger.checkCanExecute("u1")).toEqual({
      allowed: false,
      reason: "not_licensed",
      remaining: 0,
    });
  });

  it("compares the estimate with the remaining balance", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.debit("u1", 600, "run-1", null);

    expect(await ledger.checkCanExecute("u1", 400)).toEqual({ allowed: true, remaining: 400 });
    expect(await ledger.checkCanExecute("u1", 401)).toEqual({
      allowed: false,
      reason: "insufficient_credits",
      remaining: 400,
    });
  });

  it("reserves nothing", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);

    await ledger.checkCanExecute("u1", 800);

    expect((await ledger.getLicense("u1")).creditsUsed).toBe(0);
  });

  it("rejects unknown users", async () => {
    const { ledger } = await setup();

    await expect(ledger.checkCanExecute("ghost")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("listTransactions", () => {
  it("returns the newest rows first, filtered and limited", async () => {
    const { ledger } = await setup();
    await ledger.assign("u1", "basic", null);
    await ledger.assign("u2", "basic", null);
    await ledger.debit("u1", 10, "run-1", null);
    await ledger.debit("u1", 20, "run-2", null);

    const rows = await ledger.listTransactions({ userId: "u1" });
    expect(rows.map((row) => [row.type, row.amount])).toEqual([
      ["debit", 20],
      ["debit", 10],
      ["assign", 1000],
    ]);

    const limited = await ledger.listTransactions({ tenantId: TENANT_A, limit: 2 });
    expect(limited).toHaveLength(2);
    expect(limited.every((row) => row.tenantId === TENANT_A)).toBe(true);
  });
});
