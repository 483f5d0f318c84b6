import { parseSuppliersCsv } from "@/lib/supplierCsv";
import { createLogger } from "@/server/logging";
import { getRecordStore, type RecordStore } from "@/server/store";
import { loadDemoSupplierDrafts } from "@/server/store/demoSuppliers";

const log = createLogger("suppliers");

export type SupplierImportRowError = {
  line: number;
  name: string;
  errors: string[];
};

export type ImportSuppliersResult =
  | { ok: true; created: number; updated: number; rowErrors: SupplierImportRowError[] }
  | { ok: false; error: "invalid_csv"; details: string[] };

/**
 * Saves every valid CSV row; rows that fail validation are reported by line
 * and skipped. A row with an `id` updates that supplier when it exists and is
 * reported as an error otherwise.
 */
export async function importSuppliersCsv(
  csv: string,
  deps?: { store?: RecordStore },
): Promise<ImportSuppliersResult> {
  const parsed = parseSuppliersCsv(csv);
  if (parsed.headerError) {
    return { ok: false, error: "invalid_csv", details: [parsed.headerError] };
  }

  const store = deps?.store ?? getRecordStore();
  const rowErrors: SupplierImportRowError[] = parsed.rows
    .filter((row) => row.errors.length > 0)
    .map((row) => ({ line: row.line, name: row.name, errors: [...row.errors] }));

  let created = 0;
  let updated = 0;
  for (const row of parsed.validRows) {
    const supplier = row.supplier;
    if (!supplier) continue;

    if (supplier.id && !(await store.getSupplier(supplier.id))) {
      rowErrors.push({ line: row.line, name: row.name, errors: [`Unknown supplier id "${supplier.id}".`] });
      continue;
    }

    await store.saveSupplier(supplier);
    if (supplier.id) {
      updated += 1;
    } else {
      created += 1;
    }
  }

  rowErrors.sort((a, b) => a.line - b.line);
  log.info("csv import finished", { created, updated, rejectedRows: rowErrors.length });
  return { ok: true, created, updated, rowErrors };
}

/** Re-inserts the demo suppliers whose names are not in the directory yet. */
export async function reseedDemoSuppliers(
  deps?: { store?: RecordStore },
): Promise<{ ok: true; created: number }> {
  const store = deps?.store ?? getRecordStore();
  const existing = new Set((await store.listSuppliers()).map((supplier) => supplier.name.toLowerCase()));

  let created = 0;
  for (const draft of loadDemoSupplierDrafts()) {
    if (existing.has(draft.name.toLowerCase())) continue;
    await store.saveSupplier(draft);
    created += 1;
  }

  log.info("demo suppliers reseeded", { created });
  return { ok: true, created };
}
