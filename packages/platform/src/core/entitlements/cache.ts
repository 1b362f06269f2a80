/**
 * Feature Cache
 *
 * Holds each user's ResolvedFeatureSet for a fixed TTL. An explicit
 * instance injected into the Resolver; the Registry, the Tier Store and
 * the Ledger invalidate it after every write that changes a resolution.
 *
 * A resolution takes a ticket before reading the store and hands it back
 * when storing its result. If any invalidation happened in between, the
 * result may already be stale, so it is returned to its caller but not
 * cached.
 *
 * Every entry lives for the same TTL, so insertion order is expiry
 * order: each write drops the expired entries at the front, and the
 * oldest entry makes room once maxEntries is reached.
 */

import type { ResolvedFeatureSet } from "@tierline/contracts";

export interface FeatureCacheOptions {
  /** 0 disables caching */
  ttlMs: number;
  /** Milliseconds since epoch */
  clock?: () => number;
  /** Defaults to 10 000 */
  maxEntries?: number;
}

interface Entry {
  value: ResolvedFeatureSet;
  expiresAt: number;
}

export class FeatureCache {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly maxEntries: number;
  private generation = 0;

  constructor(options: FeatureCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
    this.maxEntries = Math.max(1, options.maxEntries ?? 10_000);
  }

  get size(): number {
    return this.entries.size;
  }

  get(userId: string): ResolvedFeatureSet | undefined {
    const entry = this.entries.get(userId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(userId);
      return undefined;
    }
    return entry.value;
  }

  /** Taken before a resolution reads the store. */
  ticket(): number {
    return this.generation;
  }

  /** @returns false when the result was discarded as possibly stale */
  set(userId: string, value: ResolvedFeatureSet, ticket: number): boolean {
    if (this.ttlMs <= 0 || ticket !== this.generation) return false;
    const now = this.clock();
    this.evictExpired(now);

    // Re-inserting moves the user to the back of the expiry order.
    this.entries.delete(userId);
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(userId, { value, expiresAt: now + this.ttlMs });
    return true;
  }

  private evictExpired(now: number): void {
    for (const [userId, entry] of this.entries) {
      if (entry.expiresAt > now) return;
      this.entries.delete(userId);
    }
  }

  invalidateUser(userId: string): void {
    this.generation++;
    this.entries.delete(userId);
  }

  /** Drops every entry resolved against the tier. */
  invalidateTier(tierId: string): void {
    this.generation++;
    for (const [userId, entry] of this.entries) {
      if (entry.value.tierId === tierId) this.entries.delete(userId);
    }
  }

  invalidateAll(): void {
    this.generation++;
    this.entries.clear();
  }
}
