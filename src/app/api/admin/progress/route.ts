import { NextResponse, type NextRequest } from "next/server";
import { requireAdmin } from "@/server/adminGate";
import { setDeckProgress } from "@/server/deck/deck";
import { handleRouteError, jsonError, readJsonObject } from "@/server/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  try {
    requireAdmin(req);
    const body = await readJsonObject(req);
    const result = await setDeckProgress(body?.value);
    if (!result.ok) {
      return jsonError(result.error, result.error === "deck_not_configured" ? 409 : 400);
    }
    return NextResponse.json(result);
  } catch (error) {
    return handleRouteError("POST /api/admin/progress", error);
  }
}
