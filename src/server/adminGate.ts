import type { NextRequest } from "next/server";
import { getAppConfig, type AppConfig } from "@/server/config";
import { debugOnce } from "@/server/db/schemaErrors";
import { UnauthorizedError } from "@/server/errors";
import { secretsMatch } from "@/server/rfqs/tokens";

export const ADMIN_TOKEN_HEADER = "x-eggdesk-admin-token";
export const ADMIN_COOKIE_NAME = "eggdesk_admin";

/**
 * Admin routes accept the configured token from a header or a cookie.
 * Without `EGGDESK_ADMIN_TOKEN` the admin surface is open (local demo).
 */
export function requireAdmin(request: NextRequest, config?: Pick<AppConfig, "adminToken">): void {
  const adminToken = (config ?? getAppConfig()).adminToken;
  if (!adminToken) {
    debugOnce("eggdesk:admin:open", "[eggdesk api] EGGDESK_ADMIN_TOKEN is not set; admin routes are open");
    return;
  }

  const provided =
    request.headers.get(ADMIN_TOKEN_HEADER)?.trim() || request.cookies.get(ADMIN_COOKIE_NAME)?.value?.trim();
  if (!secretsMatch(adminToken, provided)) {
    throw new UnauthorizedError();
  }
}
