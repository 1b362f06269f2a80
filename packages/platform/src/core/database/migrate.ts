/**
 * Migration Runner
 *
 * Creates the entitlement tables if they are missing. Idempotent: safe
 * to run at every startup and from the migrate script.
 *
 * The CHECK constraints restate the ledger invariants so that a bug in
 * application code cannot persist an overdrawn balance or a pool whose
 * counts disagree. The partial unique index on replenish rows makes a
 * replayed billing-period event a no-op even across processes.
 */

import type { Logger } from "@tierline/contracts";
import { createLogger } from "../observability/logger.js";
import { getDatabase } from "./connection.js";

/** The slice of postgres.js the runner needs */
export interface MigrationClient {
  unsafe(query: string, parameters?: string[]): PromiseLike<ArrayLike<unknown>>;
}

export interface PlatformTable {
  name: string;
  /** CREATE TABLE first, then its indexes */
  statements: string[];
}

/** In dependency order: referenced tables come first. */
export const PLATFORM_TABLES: PlatformTable[] = [
  {
    name: "feature_registry",
    statements: [
      `CREATE TABLE feature_registry (
        key TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        category TEXT NOT NULL,
        kind TEXT NOT NULL CHECK (kind IN ('boolean', 'limit')),
        default_value JSONB NOT NULL,
        is_premium BOOLEAN NOT NULL DEFAULT FALSE,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        depends_on JSONB NOT NULL DEFAULT '[]'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ],
  },
  {
    name: "license_tiers",
    statements: [
      `CREATE TABLE license_tiers (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        description TEXT,
        price_cents INTEGER NOT NULL DEFAULT 0 CHECK (price_cents >= 0),
        seat_price_cents INTEGER NOT NULL DEFAULT 0 CHECK (seat_price_cents >= 0),
        currency TEXT NOT NULL DEFAULT 'usd',
        default_credits INTEGER NOT NULL DEFAULT 0 CHECK (default_credits >= 0),
        credits_per_month INTEGER CHECK (credits_per_month >= 0),
        max_users INTEGER CHECK (max_users > 0),
        sort_order INTEGER NOT NULL DEFAULT 0,
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
    ],
  },
  {
    name: "tier_feature_overrides",
    statements: [
      `CREATE TABLE tier_feature_overrides (
        tier_id TEXT NOT NULL REFERENCES license_tiers(id) ON DELETE CASCADE,
        feature_key TEXT NOT NULL REFERENCES feature_registry(key) ON DELETE CASCADE,
        value JSONB NOT NULL,
        expires_at TIMESTAMPTZ,
        updated_by TEXT,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (tier_id, feature_key)
      )`,
    ],
  },
  {
    name: "tenant_license_pools",
    statements: [
      `CREATE TABLE tenant_license_pools (
        tenant_id TEXT NOT NULL,
        tier_id TEXT NOT NULL REFERENCES license_tiers(id),
        total_count INTEGER NOT NULL DEFAULT 0 CHECK (total_count >= 0),
        assigned_count INTEGER NOT NULL DEFAULT 0 CHECK (assigned_count >= 0),
        available_count INTEGER NOT NULL DEFAULT 0 CHECK (available_count >= 0),
        created_by TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        PRIMARY KEY (tenant_id, tier_id),
        CONSTRAINT pool_counts_consistent CHECK (available_count = total_count - assigned_count)
      )`,
    ],
  },
  {
    name: "users",
    statements: [
      `CREATE TABLE users (
        id TEXT PRIMARY KEY,
        tenant_id TEXT NOT NULL,
        license_tier_id TEXT REFERENCES license_tiers(id),
        license_is_active BOOLEAN NOT NULL DEFAULT FALSE,
        credits_allocated INTEGER NOT NULL DEFAULT 0,
        credits_used INTEGER NOT NULL DEFAULT 0,
        credits_per_month INTEGER,
        license_assigned_at TIMESTAMPTZ,
        license_assigned_by TEXT,
        license_expires_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CONSTRAINT credits_within_allocation CHECK (credits_used >= 0 AND credits_used <= credits_allocated)
      )`,
      `CREATE INDEX idx_users_tenant ON users(tenant_id)`,
    ],
  },
  {
    name: "ledger_transactions",
    statements: [
      `CREATE TABLE ledger_transactions (
        id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        user_id TEXT NOT NULL,
        tenant_id TEXT NOT NULL,
        type TEXT NOT NULL CHECK (type IN ('assign', 'unassign', 'upgrade', 'downgrade', 'debit', 'replenish')),
        amount INTEGER NOT NULL,
        balance_after INTEGER NOT NULL,
        reference TEXT,
        billing_period TEXT,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        created_by TEXT,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE INDEX idx_ledger_user ON ledger_transactions(user_id, created_at DESC)`,
      `CREATE INDEX idx_ledger_tenant ON ledger_transactions(tenant_id, created_at DESC)`,
      `CREATE UNIQUE INDEX idx_ledger_replenish_period ON ledger_transactions(user_id, billing_period) WHERE type = 'replenish'`,
    ],
  },
];

/**
 * Checks if a table exists in the database.
 */
async function tableExists(pgSql: MigrationClient, tableName: string): Promise<boolean> {
  const rows = await pgSql.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Creates every entitlement table that does not exist yet.
 * Existing tables are left untouched.
 *
 * @returns The names of the tables created by this run
 */
export async function runPlatformMigrations(
  pgSql: MigrationClient = getDatabase().sql,
  logger: Logger = createLogger("migrate")
): Promise<string[]> {
  const created: string[] = [];

  for (const table of PLATFORM_TABLES) {
    if (await tableExists(pgSql, table.name)) continue;

    for (const statement of table.statements) {
      await pgSql.unsafe(statement);
    }
    created.push(table.name);
    logger.info("Created platform table", { table: table.name });
  }

  return created;
}
