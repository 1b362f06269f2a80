/**
 * User Registration Hook
 *
 * Makes sure every authenticated caller has a user record before the
 * routes run. Registration is idempotent; the hook remembers the most
 * recent callers so repeat requests skip the store.
 */

import type { FastifyRequest, preHandlerAsyncHookHandler } from "fastify";
import type { LicenseLedger } from "../../core/ledger/ledger.js";

const DEFAULT_REMEMBERED_USERS = 10_000;

export interface UserRegistrationOptions {
  /** Oldest callers are forgotten past this many */
  maxRemembered?: number;
}

export function createUserRegistration(
  ledger: Pick<LicenseLedger, "registerUser">,
  options: UserRegistrationOptions = {}
): preHandlerAsyncHookHandler {
  const maxRemembered = options.maxRemembered ?? DEFAULT_REMEMBERED_USERS;
  const remembered = new Set<string>();

  return async function userRegistration(request: FastifyRequest): Promise<void> {
    const caller = request.caller;
    if (!caller || remembered.has(caller.userId)) return;

    await ledger.registerUser(caller.userId, caller.tenantId);

    if (remembered.size >= maxRemembered) {
      const oldest = remembered.values().next();
      if (!oldest.done) remembered.delete(oldest.value);
    }
    remembered.add(caller.userId);
  };
}
