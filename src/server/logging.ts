const LOG_PREFIXES = {
  rfqs: "[eggdesk rfqs]",
  suppliers: "[eggdesk suppliers]",
  quotes: "[eggdesk quotes]",
  matching: "[eggdesk matching]",
  comparison: "[eggdesk comparison]",
  deck: "[eggdesk deck]",
  store: "[eggdesk store]",
  config: "[eggdesk config]",
  api: "[eggdesk api]",
  cli: "[eggdesk cli]",
} as const;

export type LogScope = keyof typeof LOG_PREFIXES;
type LogLevel = "info" | "warn" | "error";

export type LogContext = Record<string, unknown | null | undefined>;

export function sanitizeContext(context?: LogContext | null): Record<string, unknown> | null {
  if (!context) {
    return null;
  }
  const entries = Object.entries(context).filter(
    ([, value]) => typeof value !== "undefined",
  );
  if (entries.length === 0) {
    return null;
  }
  return Object.fromEntries(entries);
}

function logWithScope(
  scope: LogScope,
  level: LogLevel,
  message: string,
  context?: LogContext,
) {
  const prefix = LOG_PREFIXES[scope];
  const payload = sanitizeContext(context);
  const body = payload ? [payload] : [];
  const args = [`${prefix} ${message}`, ...body];

  if (level === "error") {
    console.error(...args);
    return;
  }
  if (level === "warn") {
    console.warn(...args);
    return;
  }
  console.log(...args);
}

export type ScopedLogger = {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
};

export function createLogger(scope: LogScope): ScopedLogger {
  return {
    info: (message, context) => logWithScope(scope, "info", message, context),
    warn: (message, context) => logWithScope(scope, "warn", message, context),
    error: (message, context) => logWithScope(scope, "error", message, context),
  };
}

export function serializeError(error: unknown) {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
    };
  }
  return error ?? null;
}
