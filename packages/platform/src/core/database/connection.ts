/**
 * Database Connection
 *
 * Establishes and manages the PostgreSQL connection via Drizzle ORM.
 * Provides the raw postgres.js client for DDL and the Drizzle instance
 * for typed queries.
 */

import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type SqlClient = ReturnType<typeof postgres>;
export type Database = ReturnType<typeof drizzle>;

/** The raw postgres.js client instance */
let sqlClient: SqlClient | null = null;

/** The Drizzle ORM instance */
let drizzleInstance: Database | null = null;

/**
 * Initializes the database connection.
 * Call once at application startup.
 */
export function initDatabase(url: string): { sql: SqlClient; db: Database } {
  sqlClient = postgres(url, { onnotice: () => {} });
  drizzleInstance = drizzle(sqlClient);

  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Returns the active connection.
 * Throws if initDatabase() hasn't been called.
 */
export function getDatabase(): { sql: SqlClient; db: Database } {
  if (!drizzleInstance || !sqlClient) {
    throw new Error(
      "Database not initialized. Call initDatabase() at startup."
    );
  }
  return { sql: sqlClient, db: drizzleInstance };
}

/**
 * Closes the database connection gracefully.
 * Call on application shutdown.
 */
export async function closeDatabase(): Promise<void> {
  if (sqlClient) {
    await sqlClient.end();
    sqlClient = null;
    drizzleInstance = null;
  }
}
