import { NextResponse, type NextRequest } from "next/server";
import { requireAdmin } from "@/server/adminGate";
import { handleRouteError, jsonError, readJsonObject } from "@/server/http";
import { getRecordStore } from "@/server/store";
import { saveSupplier } from "@/server/suppliers/saveSupplier";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  try {
    requireAdmin(req);
    const suppliers = await getRecordStore().listSuppliers();
    return NextResponse.json({ ok: true, suppliers });
  } catch (error) {
    return handleRouteError("GET /api/admin/suppliers", error);
  }
}

export async function POST(req: NextRequest) {
  try {
    requireAdmin(req);
    const body = await readJsonObject(req);
    if (!body) {
      return jsonError("invalid_payload", 400);
    }

    const result = await saveSupplier(body);
    if (!result.ok) {
      return result.error === "invalid_supplier"
        ? jsonError(result.error, 400, { details: result.details })
        : jsonError(result.error, 404);
    }
    return NextResponse.json(
      { ok: true, supplierId: result.supplierId },
      { status: result.created ? 201 : 200 },
    );
  } catch (error) {
    return handleRouteError("POST /api/admin/suppliers", error);
  }
}
