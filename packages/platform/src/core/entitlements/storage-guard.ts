/**
 * Storage Guard
 *
 * Wraps every call into the authoritative store:
 *   - bounds it with a timeout (reads are abandoned, mutations are
 *     told to roll back and awaited)
 *   - retries ConcurrentModificationError a limited number of times
 *   - turns anything that is not a domain error into StorageUnavailableError
 *
 * The underlying cause is logged (and forwarded to observability by the
 * logger); callers only ever see the generic retryable error.
 */

import type { Logger } from "@tierline/contracts";
import {
  ConcurrentModificationError,
  EntitlementError,
  StorageUnavailableError,
} from "./errors.js";

export interface StorageGuardOptions {
  timeoutMs: number;
  /** Extra attempts after the first conflict */
  maxRetries: number;
  logger: Logger;
}

class StorageTimeoutError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "StorageTimeoutError";
  }
}

export class StorageGuard {
  constructor(private readonly options: StorageGuardOptions) {}

  /** Reads: the caller stops waiting at the timeout. */
  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return this.withRetries(operation, () => this.withTimeout(operation, work));
  }

  /**
   * Mutations are never abandoned mid-flight. At the timeout the signal is
   * aborted and the store refuses to commit; the result returned is always
   * what the store actually did.
   */
  async mutate<T>(operation: string, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.withRetries(operation, () => this.withAbort(operation, work));
  }

  private async withRetries<T>(operation: string, attemptOnce: () => Promise<T>): Promise<T> {
    const { maxRetries, logger } = this.options;

    for (let attempt = 0; ; attempt++) {
      try {
        return await attemptOnce();
      } catch (error) {
        if (error instanceof ConcurrentModificationError) {
          if (attempt < maxRetries) {
            logger.debug("Retrying after concurrent modification", { operation, attempt: attempt + 1 });
            continue;
          }
          logger.error("Retry budget exhausted", { operation, attempts: attempt + 1 });
          throw new StorageUnavailableError({ cause: error });
        }
        if (error instanceof EntitlementError) throw error;

        logger.error("Storage call failed", {
          operation,
          error: error instanceof Error ? error.message : String(error),
        });
        throw new StorageUnavailableError({ cause: error });
      }
    }
  }

  private async withTimeout<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new StorageTimeoutError(operation, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([work(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async withAbort<T>(
    operation: string,
    work: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new StorageTimeoutError(operation, timeoutMs)),
      timeoutMs
    );

    try {
      return await work(controller.signal);
    } finally {
      clearTimeout(timer);
    }
  }
}
