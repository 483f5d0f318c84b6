import { NextResponse, type NextRequest } from "next/server";
import { requireAdmin } from "@/server/adminGate";
import { handleRouteError, jsonError } from "@/server/http";
import { importSuppliersCsv, reseedDemoSuppliers } from "@/server/suppliers/importSuppliers";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

/** CSV text as the request body, or `?demo=1` to restore the demo suppliers. */
export async function POST(req: NextRequest) {
  try {
    requireAdmin(req);

    if (req.nextUrl.searchParams.get("demo") === "1") {
      const result = await reseedDemoSuppliers();
      return NextResponse.json(result);
    }

    const csv = await req.text();
    const result = await importSuppliersCsv(csv);
    if (!result.ok) {
      return jsonError(result.error, 400, { details: result.details });
    }
    return NextResponse.json(result);
  } catch (error) {
    return handleRouteError("POST /api/admin/suppliers/import", error);
  }
}
