/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup — fail fast if misconfigured.
 */

export interface AppConfig {
  database: {
    /** Null outside production means "use the in-process store" */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
  };
  entitlements: {
    /** Resolver cache lifetime */
    cacheTtlSeconds: number;
    /** Upper bound on every authoritative-store call */
    storageTimeoutMs: number;
    /** Retries of a conflicting ledger mutation before giving up */
    ledgerMaxRetries: number;
    /** Override of the bundled route-to-feature map */
    routeFeaturesPath: string | null;
  };
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `${name} must be an integer >= ${min}, got "${raw}". See .env.example.`
    );
  }
  return value;
}

/**
 * Loads configuration from process.env (or the given map).
 * Throws immediately if a variable is missing or malformed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = env.DATABASE_URL?.trim() || null;
  if (!databaseUrl && env.NODE_ENV === "production") {
    throw new Error(
      "DATABASE_URL environment variable is required in production. See .env.example."
    );
  }

  return {
    database: {
      url: databaseUrl,
    },
    api: {
      port: readInteger(env, "API_PORT", 4000, 1),
      host: env.API_HOST ?? "0.0.0.0",
    },
    entitlements: {
      cacheTtlSeconds: readInteger(env, "ENTITLEMENT_CACHE_TTL_SECONDS", 300, 0),
      storageTimeoutMs: readInteger(env, "STORAGE_TIMEOUT_MS", 5000, 1),
      ledgerMaxRetries: readInteger(env, "LEDGER_MAX_RETRIES", 3, 0),
      routeFeaturesPath: env.ROUTE_FEATURES_PATH?.trim() || null,
    },
  };
}
