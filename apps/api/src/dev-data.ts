/**
 * Development Data
 *
 * Seat pools for the development tenant and a licensed dev user, so the
 * API is usable right after `npm run dev` with the DevAuthProvider.
 */

import {
  DEV_TENANT_ID,
  DEV_USER_ID,
  type EntitlementServices,
} from "@tierline/platform";
import type { Logger } from "@tierline/contracts";

/** Seats per tier for the development tenant */
export const DEV_POOLS: Record<string, number> = {
  basic: 5,
  pro: 5,
  enterprise: 1,
};

export const DEV_USER_TIER = "pro";

export async function seedDevTenant(services: EntitlementServices, logger: Logger): Promise<void> {
  const { ledger } = services;

  for (const [tierId, totalCount] of Object.entries(DEV_POOLS)) {
    await ledger.setPoolCapacity(DEV_TENANT_ID, tierId, totalCount, "seed");
  }

  const user = await ledger.registerUser(DEV_USER_ID, DEV_TENANT_ID);
  if (user.licenseTierId === null) {
    await ledger.assign(DEV_USER_ID, DEV_USER_TIER, "seed");
  }

  logger.info("Seeded development tenant", {
    tenantId: DEV_TENANT_ID,
    pools: DEV_POOLS,
    userId: DEV_USER_ID,
  });
}
