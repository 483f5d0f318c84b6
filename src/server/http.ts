import { NextResponse } from "next/server";
import { RecordStoreError, UnauthorizedError } from "@/server/errors";
import { createLogger, serializeError } from "@/server/logging";

const log = createLogger("api");

export function normalizeParam(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON object body, or null for a missing, malformed or non-object body. */
export async function readJsonObject(request: Request): Promise<Record<string, unknown> | null> {
  const body: unknown = await request.json().catch(() => null);
  return isRecord(body) ? body : null;
}

export function jsonError(
  error: string,
  status: number,
  extra?: Record<string, unknown>,
): NextResponse {
  return NextResponse.json({ ok: false, error, ...extra }, { status });
}

export function csvResponse(csv: string, filename: string): NextResponse {
  const safe = filename.replace(/"/g, "").trim() || "export.csv";
  return new NextResponse(csv, {
    status: 200,
    headers: {
      "content-type": "text/csv; charset=utf-8",
      "content-disposition": `attachment; filename="${safe}"`,
    },
  });
}

/**
 * Maps thrown errors to the shared `{ ok: false, error }` shape:
 * admin gate failures are 401, store failures 500 `store_unavailable`.
 */
export function handleRouteError(route: string, error: unknown): NextResponse {
  if (error instanceof UnauthorizedError) {
    return jsonError("unauthorized", 401);
  }
  if (error instanceof RecordStoreError) {
    log.error(`${route} store failure`, {
      operation: error.operation,
      supabaseError: error.supabaseError,
    });
    return jsonError("store_unavailable", 500);
  }
  log.error(`${route} unexpected error`, { error: serializeError(error) });
  return jsonError("unexpected_error", 500);
}
