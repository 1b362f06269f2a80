/**
 * Entitlement Tables
 *
 * Drizzle declarations of the tables the entitlement core owns. The DDL
 * that creates them (with CHECK constraints and the replenish idempotence
 * index) lives in migrate.ts; these declarations drive typed queries.
 */

import {
  pgTable,
  text,
  integer,
  boolean,
  timestamp,
  jsonb,
  uuid,
  primaryKey,
  index,
} from "drizzle-orm/pg-core";
import type { FeatureValue } from "@tierline/contracts";

export const featureRegistry = pgTable("feature_registry", {
  key: text("key").primaryKey(),
  name: text("name").notNull(),
  description: text("description"),
  category: text("category").notNull(),
  kind: text("kind").notNull(),
  defaultValue: jsonb("default_value").$type<FeatureValue>().notNull(),
  isPremium: boolean("is_premium").notNull().default(false),
  isActive: boolean("is_active").notNull().default(true),
  dependsOn: jsonb("depends_on").$type<string[]>().notNull().default([]),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const licenseTiers = pgTable("license_tiers", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  description: text("description"),
  priceCents: integer("price_cents").notNull().default(0),
  seatPriceCents: integer("seat_price_cents").notNull().default(0),
  currency: text("currency").notNull().default("usd"),
  defaultCredits: integer("default_credits").notNull().default(0),
  creditsPerMonth: integer("credits_per_month"),
  maxUsers: integer("max_users"),
  sortOrder: integer("sort_order").notNull().default(0),
  isActive: boolean("is_active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const tierFeatureOverrides = pgTable(
  "tier_feature_overrides",
  {
    tierId: text("tier_id")
      .notNull()
      .references(() => licenseTiers.id, { onDelete: "cascade" }),
    featureKey: text("feature_key")
      .notNull()
      .references(() => featureRegistry.key, { onDelete: "cascade" }),
    value: jsonb("value").$type<FeatureValue>().notNull(),
    expiresAt: timestamp("expires_at", { withTimezone: true }),
    updatedBy: text("updated_by"),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tierId, table.featureKey] }),
  })
);

export const tenantLicensePools = pgTable(
  "tenant_license_pools",
  {
    tenantId: text("tenant_id").notNull(),
    tierId: text("tier_id")
      .notNull()
      .references(() => licenseTiers.id),
    totalCount: integer("total_count").notNull().default(0),
    assignedCount: integer("assigned_count").notNull().default(0),
    availableCount: integer("available_count").notNull().default(0),
    createdBy: text("created_by"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenantId, table.tierId] }),
  })
);

export const users = pgTable(
  "users",
  {
    id: text("id").primaryKey(),
    tenantId: text("tenant_id").notNull(),
    licenseTierId: text("license_tier_id").references(() => licenseTiers.id),
    licenseIsActive: boolean("license_is_active").notNull().default(false),
    creditsAllocated: integer("credits_allocated").notNull().default(0),
    creditsUsed: integer("credits_used").notNull().default(0),
    creditsPerMonth: integer("credits_per_month"),
    licenseAssignedAt: timestamp("license_assigned_at", { withTimezone: true }),
    licenseAssignedBy: text("license_assigned_by"),
    licenseExpiresAt: timestamp("license_expires_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    tenantIdx: index("idx_users_tenant").on(table.tenantId),
  })
);

export const ledgerTransactions = pgTable(
  "ledger_transactions",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    userId: text("user_id").notNull(),
    tenantId: text("tenant_id").notNull(),
    type: text("type").notNull(),
    amount: integer("amount").notNull(),
    balanceAfter: integer("balance_after").notNull(),
    reference: text("reference"),
    billingPeriod: text("billing_period"),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
    createdBy: text("created_by"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    userIdx: index("idx_ledger_user").on(table.userId, table.createdAt),
    tenantIdx: index("idx_ledger_tenant").on(table.tenantId, table.createdAt),
  })
);

export type FeatureRow = typeof featureRegistry.$inferSelect;
export type TierRow = typeof licenseTiers.$inferSelect;
export type TierOverrideRow = typeof tierFeatureOverrides.$inferSelect;
export type PoolRow = typeof tenantLicensePools.$inferSelect;
export type UserRow = typeof users.$inferSelect;
export type TransactionRow = typeof ledgerTransactions.$inferSelect;
