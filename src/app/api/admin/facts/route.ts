import { NextResponse, type NextRequest } from "next/server";
import { requireAdmin } from "@/server/adminGate";
import { addDeckFact, loadFactsAndProgress } from "@/server/deck/deck";
import { handleRouteError, jsonError, readJsonObject } from "@/server/http";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  try {
    requireAdmin(req);
    const { facts, progress } = await loadFactsAndProgress();
    return NextResponse.json({ ok: true, facts, progress });
  } catch (error) {
    return handleRouteError("GET /api/admin/facts", error);
  }
}

export async function POST(req: NextRequest) {
  try {
    requireAdmin(req);
    const body = await readJsonObject(req);
    const result = await addDeckFact(body?.text);
    if (!result.ok) {
      return jsonError(result.error, 400);
    }
    return NextResponse.json(result, { status: 201 });
  } catch (error) {
    return handleRouteError("POST /api/admin/facts", error);
  }
}
