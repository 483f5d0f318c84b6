import { parseSupplierInput } from "@/lib/supplierInput";
import { createLogger } from "@/server/logging";
import { getRecordStore, type RecordStore } from "@/server/store";

const log = createLogger("suppliers");

export type SaveSupplierResult =
  | { ok: true; supplierId: string; created: boolean }
  | { ok: false; error: "invalid_supplier"; details: string[] }
  | { ok: false; error: "supplier_not_found" };

export async function saveSupplier(
  raw: Record<string, unknown>,
  deps?: { store?: RecordStore },
): Promise<SaveSupplierResult> {
  const parsed = parseSupplierInput(raw);
  if (!parsed.ok) {
    return { ok: false, error: "invalid_supplier", details: parsed.errors };
  }

  const store = deps?.store ?? getRecordStore();
  const { supplier } = parsed;

  if (supplier.id) {
    const existing = await store.getSupplier(supplier.id);
    if (!existing) {
      log.warn("update for unknown supplier", { supplierId: supplier.id });
      return { ok: false, error: "supplier_not_found" };
    }
  }

  const supplierId = await store.saveSupplier(supplier);
  log.info(supplier.id ? "updated" : "created", { supplierId, name: supplier.name });
  return { ok: true, supplierId, created: !supplier.id };
}
