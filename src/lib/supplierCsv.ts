import { parseCsvRows, toCsvLine } from "@/lib/csv";
import { parseSupplierInput, type SupplierDraft } from "@/lib/supplierInput";
import type { SupplierRecord } from "@/types/eggs";

export const SUPPLIER_CSV_COLUMNS = [
  "id",
  "name",
  "welfare",
  "certs",
  "sizes",
  "pack_formats",
  "moq_trays",
  "delivery_days",
  "delivery_postcodes",
  "email",
  "phone",
  "whatsapp",
  "story_pdf_url",
  "price_band_low",
  "price_band_high",
  "notes",
] as const;

type SupplierCsvColumn = (typeof SUPPLIER_CSV_COLUMNS)[number];

export type SupplierImportRow = {
  line: number;
  name: string;
  supplier: SupplierDraft | null;
  errors: string[];
};

export type SupplierImportParseResult = {
  rows: SupplierImportRow[];
  validRows: SupplierImportRow[];
  headerError: string | null;
};

export function buildSuppliersCsv(suppliers: readonly SupplierRecord[]): string {
  const lines = [SUPPLIER_CSV_COLUMNS.join(",")];
  for (const supplier of suppliers) {
    lines.push(
      toCsvLine([
        supplier.id,
        supplier.name,
        supplier.welfare,
        supplier.certs,
        supplier.sizes.join(","),
        supplier.packFormats.join(","),
        supplier.moqTrays,
        supplier.deliveryDays.join(","),
        supplier.deliveryAreas.join(","),
        supplier.email,
        supplier.phone,
        supplier.whatsapp,
        supplier.storyPdfUrl,
        supplier.priceBandLow,
        supplier.priceBandHigh,
        supplier.notes.replace(/\r?\n/g, " "),
      ]),
    );
  }
  return lines.join("\n");
}

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, "_");
}

function isSupplierCsvColumn(value: string): value is SupplierCsvColumn {
  return SUPPLIER_CSV_COLUMNS.some((column) => column === value);
}

/**
 * Reads a supplier CSV in the export layout. Columns are matched by header
 * name, so extra or reordered columns are fine; `name` is the only one required.
 */
export function parseSuppliersCsv(input: string): SupplierImportParseResult {
  const csvRows = parseCsvRows(input);
  const header = csvRows[0];
  if (!header) {
    return { rows: [], validRows: [], headerError: "CSV is empty." };
  }

  const columns = header.fields.map(normalizeHeader);
  if (!columns.includes("name")) {
    return {
      rows: [],
      validRows: [],
      headerError: `Header row must include "name" (expected: ${SUPPLIER_CSV_COLUMNS.join(",")}).`,
    };
  }

  const rows: SupplierImportRow[] = csvRows.slice(1).map((row) => {
    const raw: Record<string, string> = {};
    columns.forEach((column, index) => {
      if (isSupplierCsvColumn(column)) {
        raw[column] = row.fields[index] ?? "";
      }
    });

    const parsed = parseSupplierInput(raw);
    return {
      line: row.line,
      name: (raw.name ?? "").trim(),
      supplier: parsed.ok ? parsed.supplier : null,
      errors: parsed.ok ? [] : parsed.errors,
    };
  });

  markDuplicateNames(rows);
  const validRows = rows.filter((row) => row.errors.length === 0);

  return { rows, validRows, headerError: null };
}

function markDuplicateNames(rows: SupplierImportRow[]): void {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const key = row.name.toLowerCase();
    if (!key) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  for (const row of rows) {
    const key = row.name.toLowerCase();
    if (!key) continue;
    if ((counts.get(key) ?? 0) > 1) {
      row.errors.push("Duplicate name in CSV.");
      row.supplier = null;
    }
  }
}
