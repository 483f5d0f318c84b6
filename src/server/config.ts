import { DEFAULT_WHATSAPP_COUNTRY_CODE } from "@/lib/adapters/outreachLinks";
import { ConfigError } from "@/server/errors";

export type RecordStoreMode = "supabase" | "memory";

export type AppConfig = {
  storeMode: RecordStoreMode;
  supabase: { url: string; serviceRoleKey: string } | null;
  /** Null disables the deck (every slug 404s). */
  deckSlug: string | null;
  /** Null leaves the admin routes open (local demo). */
  adminToken: string | null;
  whatsappCountryCode: string;
  currency: string;
};

type Env = Record<string, string | undefined>;

export const DEMO_DECK_SLUG = "deck-demo";
const DEFAULT_CURRENCY = "GBP";

function readEnv(env: Env, key: string): string | null {
  const value = env[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const url = readEnv(env, "SUPABASE_URL") ?? readEnv(env, "NEXT_PUBLIC_SUPABASE_URL");
  const serviceRoleKey = readEnv(env, "SUPABASE_SERVICE_ROLE_KEY");
  const supabase = url && serviceRoleKey ? { url, serviceRoleKey } : null;
  const storeMode: RecordStoreMode = supabase ? "supabase" : "memory";

  const whatsappCountryCode =
    readEnv(env, "EGGDESK_WHATSAPP_COUNTRY_CODE")?.replace(/^\+/, "") ?? DEFAULT_WHATSAPP_COUNTRY_CODE;
  if (!/^\d{1,4}$/.test(whatsappCountryCode)) {
    throw new ConfigError(
      "EGGDESK_WHATSAPP_COUNTRY_CODE",
      `EGGDESK_WHATSAPP_COUNTRY_CODE must be 1-4 digits (got "${whatsappCountryCode}").`,
    );
  }

  const currency = (readEnv(env, "EGGDESK_CURRENCY") ?? DEFAULT_CURRENCY).toUpperCase();
  if (!/^[A-Z]{3}$/.test(currency)) {
    throw new ConfigError("EGGDESK_CURRENCY", `EGGDESK_CURRENCY must be an ISO 4217 code (got "${currency}").`);
  }

  const configuredSlug = readEnv(env, "EGGDESK_DECK_SLUG");

  return {
    storeMode,
    supabase,
    deckSlug: configuredSlug ?? (storeMode === "memory" ? DEMO_DECK_SLUG : null),
    adminToken: readEnv(env, "EGGDESK_ADMIN_TOKEN"),
    whatsappCountryCode,
    currency,
  };
}

let cachedConfig: AppConfig | null = null;

export function getAppConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadAppConfig();
  }
  return cachedConfig;
}

/** Tests change `process.env` between cases; this drops the cached read. */
export function resetAppConfigCache(): void {
  cachedConfig = null;
}
