/**
 * Error Reporting
 *
 * Where failures go besides the log line: Sentry when SENTRY_DSN is set,
 * stderr otherwise. The REST error handler reports unhandled route
 * errors through captureException; the logger forwards its warnings and
 * errors through captureMessage.
 *
 * Report fields are the logger's data. Three of them are lifted out for
 * triage in Sentry:
 *   userId     → the event's user
 *   tenantId   → tag
 *   operation  → tag (the storage or ledger operation, e.g. "debit")
 * Everything else is attached as extra data.
 */

import * as Sentry from "@sentry/node";

export type ReportLevel = "error" | "warning";

export type ReportFields = Record<string, unknown>;

export interface ErrorReporter {
  readonly name: string;
  captureException(error: unknown, fields?: ReportFields): void;
  captureMessage(message: string, level: ReportLevel, fields?: ReportFields): void;
  flush(timeoutMs: number): Promise<void>;
}

const TAGS = new Set(["tenantId", "operation"]);

function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) return { message: error.message, stack: error.stack };
  return { message: String(error) };
}

// ---------------------------------------------------------------------------
// Reporters
// ---------------------------------------------------------------------------

/**
 * Exceptions go to stderr in the logger's line format. Messages already
 * have their log line and are not repeated.
 */
export class ConsoleReporter implements ErrorReporter {
  readonly name = "console";

  captureException(error: unknown, fields: ReportFields = {}): void {
    const { message, stack } = describeError(error);
    console.error(JSON.stringify({ level: "error", context: "report", message, stack, ...fields }));
  }

  captureMessage(): void {}

  async flush(): Promise<void> {}
}

export interface SentryReporterOptions {
  dsn: string;
  environment: string;
}

export class SentryReporter implements ErrorReporter {
  readonly name = "sentry";

  constructor(options: SentryReporterOptions) {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      tracesSampleRate: options.environment === "production" ? 0.1 : 1.0,
    });
  }

  captureException(error: unknown, fields: ReportFields = {}): void {
    Sentry.withScope((scope) => {
      applyFields(scope, fields);
      Sentry.captureException(error);
    });
  }

  captureMessage(message: string, level: ReportLevel, fields: ReportFields = {}): void {
    Sentry.withScope((scope) => {
      applyFields(scope, fields);
      Sentry.captureMessage(message, level);
    });
  }

  async flush(timeoutMs: number): Promise<void> {
    await Sentry.flush(timeoutMs);
  }
}

function applyFields(scope: Sentry.Scope, fields: ReportFields): void {
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (key === "userId") scope.setUser({ id: String(value) });
    else if (TAGS.has(key)) scope.setTag(key, String(value));
    else scope.setExtra(key, value);
  }
}

// ---------------------------------------------------------------------------
// Module state
// ---------------------------------------------------------------------------

let reporter: ErrorReporter = new ConsoleReporter();

/** Chooses the reporter from the environment; returns its name. */
export function initObservability(env: NodeJS.ProcessEnv = process.env): string {
  const dsn = env.SENTRY_DSN;
  reporter = dsn
    ? new SentryReporter({
        dsn,
        environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV ?? "development",
      })
    : new ConsoleReporter();
  return reporter.name;
}

export function captureException(error: unknown, fields?: ReportFields): void {
  reporter.captureException(error, fields);
}

export function captureMessage(message: string, level: ReportLevel, fields?: ReportFields): void {
  reporter.captureMessage(message, level, fields);
}

/** Call during shutdown so queued events are sent. */
export async function flushObservability(timeoutMs = 2000): Promise<void> {
  await reporter.flush(timeoutMs);
}

/** Swaps the reporter; null restores the console one. */
export function setErrorReporter(next: ErrorReporter | null): void {
  reporter = next ?? new ConsoleReporter();
}
