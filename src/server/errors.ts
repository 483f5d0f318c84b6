import { serializeSupabaseError, type SerializedSupabaseError } from "@/server/db/schemaErrors";

/**
 * Raised by record store implementations when the backing store rejects or
 * fails a call. Route handlers map it to `store_unavailable`.
 */
export class RecordStoreError extends Error {
  readonly operation: string;
  readonly supabaseError: SerializedSupabaseError;

  constructor(operation: string, cause: unknown) {
    const serialized = serializeSupabaseError(cause);
    super(`Record store ${operation} failed${serialized.message ? `: ${serialized.message}` : ""}`);
    this.name = "RecordStoreError";
    this.operation = operation;
    this.supabaseError = serialized;
  }
}

export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

export class UnauthorizedError extends Error {
  constructor(message = "Admin token required") {
    super(message);
    this.name = "UnauthorizedError";
  }
}
