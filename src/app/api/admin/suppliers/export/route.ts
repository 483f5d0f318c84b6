import type { NextRequest } from "next/server";
import { buildSuppliersCsv } from "@/lib/supplierCsv";
import { requireAdmin } from "@/server/adminGate";
import { csvResponse, handleRouteError } from "@/server/http";
import { getRecordStore } from "@/server/store";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  try {
    requireAdmin(req);
    const suppliers = await getRecordStore().listSuppliers();
    return csvResponse(buildSuppliersCsv(suppliers), "suppliers.csv");
  } catch (error) {
    return handleRouteError("GET /api/admin/suppliers/export", error);
  }
}
