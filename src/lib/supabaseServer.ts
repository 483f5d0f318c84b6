import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "@/server/config";
import { ConfigError } from "@/server/errors";

export type SupabaseServerClient = SupabaseClient;

// Admin / server client – uses the service role key (server-only)
export function createSupabaseServerClient(config: Pick<AppConfig, "supabase">): SupabaseServerClient {
  if (!config.supabase) {
    throw new ConfigError(
      "SUPABASE_SERVICE_ROLE_KEY",
      "SUPABASE_URL (or NEXT_PUBLIC_SUPABASE_URL) and SUPABASE_SERVICE_ROLE_KEY are required for the Supabase store.",
    );
  }

  return createClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: { persistSession: false },
  });
}
