import { NextResponse, type NextRequest } from "next/server";
import { requireAdmin } from "@/server/adminGate";
import { handleRouteError, jsonError, readJsonObject } from "@/server/http";
import { createRfq } from "@/server/rfqs/createRfq";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  try {
    requireAdmin(req);
    const body = await readJsonObject(req);
    if (!body) {
      return jsonError("invalid_payload", 400);
    }

    const result = await createRfq({
      clientName: body.clientName ?? body.client_name,
      metaText: body.metaText ?? body.meta_text,
      deliveryAreas: body.deliveryAreas,
      welfare: body.welfare,
      deliveryWindows: body.deliveryWindows,
      paymentTerms: body.paymentTerms,
      notes: body.notes,
      lineItems: body.lineItems ?? body.line_items_json,
    });
    if (!result.ok) {
      return result.error === "invalid_line_items"
        ? jsonError(result.error, 400, { details: result.details })
        : jsonError(result.error, 400);
    }

    return NextResponse.json({ ok: true, rfq: result.rfq }, { status: 201 });
  } catch (error) {
    return handleRouteError("POST /api/rfqs", error);
  }
}
