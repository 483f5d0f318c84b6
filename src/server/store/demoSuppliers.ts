import { parseSupplierInput, type SupplierDraft } from "@/lib/supplierInput";
import demoSupplierRows from "./demoSuppliers.json";

/** Demo directory used to seed the memory store and by the demo re-seed import. */
export function loadDemoSupplierDrafts(): SupplierDraft[] {
  const drafts: SupplierDraft[] = [];
  for (const row of demoSupplierRows) {
    const parsed = parseSupplierInput(row);
    if (parsed.ok) {
      drafts.push({ ...parsed.supplier, id: null });
    }
  }
  return drafts;
}
