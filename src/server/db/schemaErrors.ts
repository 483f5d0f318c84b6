import { sanitizeContext, type LogContext } from "@/server/logging";

export type SerializedSupabaseError = {
  message?: string;
  details?: string;
  hint?: string;
  code?: string;
};

const WARN_ONCE_KEYS = new Set<string>();
const DEBUG_ONCE_KEYS = new Set<string>();

/** One warning line per key per process. */
export function warnOnce(key: string, message: string, context?: LogContext) {
  if (WARN_ONCE_KEYS.has(key)) return;
  WARN_ONCE_KEYS.add(key);
  const payload = sanitizeContext(context);
  if (payload) {
    console.warn(message, payload);
  } else {
    console.warn(message);
  }
}

export function debugOnce(key: string, message: string, context?: LogContext) {
  if (DEBUG_ONCE_KEYS.has(key)) return;
  DEBUG_ONCE_KEYS.add(key);
  const payload = sanitizeContext(context);
  if (payload) {
    console.debug(message, payload);
  } else {
    console.debug(message);
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readStringProp(obj: Record<string, unknown>, key: string): string | null {
  const value = obj[key];
  return typeof value === "string" ? value : null;
}

function readNumberProp(obj: Record<string, unknown>, key: string): number | null {
  const value = obj[key];
  return typeof value === "number" ? value : null;
}

export function serializeSupabaseError(error: unknown): SerializedSupabaseError {
  if (!error) return {};
  if (!isObject(error)) {
    return { message: String(error) };
  }

  return {
    code: readStringProp(error, "code") ?? undefined,
    message: readStringProp(error, "message") ?? undefined,
    details: readStringProp(error, "details") ?? undefined,
    hint: readStringProp(error, "hint") ?? undefined,
  };
}

// Missing schema codes:
// - PGRST205: PostgREST schema cache / missing relation
// - 42703: undefined_column
// - 42P01: undefined_table / undefined_relation
const MISSING_SCHEMA_CODES = new Set(["PGRST205", "42703", "42P01"]);

/**
 * PostgREST can surface missing relations either with a code, or as a
 * 404-ish shape where only the status and message are present.
 */
export function isMissingTableOrColumnError(error: unknown): boolean {
  if (!isObject(error)) return false;

  const code = readStringProp(error, "code");
  if (code && MISSING_SCHEMA_CODES.has(code)) return true;

  const status = readNumberProp(error, "status") ?? readNumberProp(error, "statusCode");
  if (status !== 404) return false;

  const blob = `${readStringProp(error, "message") ?? ""} ${readStringProp(error, "details") ?? ""}`.toLowerCase();
  return (
    blob.includes("schema cache") ||
    blob.includes("could not find") ||
    blob.includes("relation") ||
    blob.includes("does not exist")
  );
}

const RLS_DENIED_CODES = new Set([
  // Postgres: insufficient_privilege (commonly returned for RLS violations)
  "42501",
  // PostgREST: insufficient privileges / RLS blocked (varies by version)
  "PGRST301",
]);

export function isRowLevelSecurityDeniedError(error: unknown): boolean {
  if (!isObject(error)) return false;

  const code = readStringProp(error, "code");
  if (code && RLS_DENIED_CODES.has(code)) return true;

  const message = readStringProp(error, "message")?.toLowerCase() ?? "";
  return message.includes("row-level security") || message.includes("permission denied");
}
