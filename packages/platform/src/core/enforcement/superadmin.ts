/**
 * Super-administrator pre-check.
 *
 * The single place that decides whether a caller bypasses feature and
 * credit checks. Every entry point (Resolver, Enforcement Layer, REST
 * guards) asks this first, and nothing else special-cases the role.
 */

import { SUPERADMIN_ROLE, type Caller } from "@tierline/contracts";

export function isSuperAdmin(caller: Pick<Caller, "roles">): boolean {
  return caller.roles.includes(SUPERADMIN_ROLE);
}
