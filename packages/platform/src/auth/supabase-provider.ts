/**
 * Supabase Auth Provider
 *
 * Implements the AuthProvider contract using Supabase Auth.
 * Verifies JWTs issued by Supabase and extracts user identity
 * into a Caller object that the entitlement core understands.
 *
 * Tenant and roles come from the user's app_metadata, which only the
 * service role can write:
 *   app_metadata.tenant_id — required; users without one are rejected
 *   app_metadata.roles     — optional, defaults to ["member"]
 *
 * Required environment variables:
 *   SUPABASE_URL         — Your Supabase project URL
 *   SUPABASE_SERVICE_KEY — The service role key (server-side only, never expose)
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { AuthProvider, AuthResult, Logger } from "@tierline/contracts";
import { createLogger } from "../core/observability/logger.js";

const DEFAULT_ROLES = ["member"];

const appMetadataSchema = z.object({
  tenant_id: z.string().min(1).optional(),
  roles: z.array(z.string()).optional(),
});

export class SupabaseAuthProvider implements AuthProvider {
  private readonly client: SupabaseClient;
  private readonly projectUrl: string;
  private readonly logger: Logger;

  constructor(config: {
    url: string;
    serviceKey: string;
    logger?: Logger;
  }) {
    this.projectUrl = config.url;
    this.logger = config.logger ?? createLogger("auth");
    // Use the service role key for server-side token verification
    this.client = createClient(config.url, config.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  /**
   * Verify a Supabase JWT and extract the authenticated user.
   *
   * @param token - The JWT from the Authorization: Bearer header
   * @returns Caller object if valid, null if invalid/expired or without a tenant
   */
  async verifyToken(token: string): Promise<AuthResult> {
    const { data, error } = await this.client.auth.getUser(token);

    if (error || !data.user) {
      return null;
    }

    const user = data.user;
    const metadata = appMetadataSchema.safeParse(user.app_metadata ?? {});
    if (!metadata.success || !metadata.data.tenant_id) {
      this.logger.warn("Rejecting user without a valid tenant in app_metadata", { userId: user.id });
      return null;
    }

    return {
      userId: user.id,
      tenantId: metadata.data.tenant_id,
      roles: metadata.data.roles ?? [...DEFAULT_ROLES],
      type: "human",
    };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "supabase",
      projectUrl: this.projectUrl,
    };
  }
}

/**
 * Factory function to create a SupabaseAuthProvider from environment variables.
 * Throws if required variables are missing.
 */
export function createSupabaseAuthProvider(env: NodeJS.ProcessEnv = process.env): SupabaseAuthProvider {
  const url = env.SUPABASE_URL;
  const serviceKey = env.SUPABASE_SERVICE_KEY;

  if (!url) {
    throw new Error(
      "SUPABASE_URL environment variable is required for Supabase auth."
    );
  }
  if (!serviceKey) {
    throw new Error(
      "SUPABASE_SERVICE_KEY environment variable is required for Supabase auth."
    );
  }

  return new SupabaseAuthProvider({ url, serviceKey });
}
