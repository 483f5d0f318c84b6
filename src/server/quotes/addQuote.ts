import { toFiniteNumber } from "@/lib/numbers";
import { findLineItem } from "@/lib/rfq/lineItems";
import { createLogger } from "@/server/logging";
import { getRecordStore, type RecordStore } from "@/server/store";

const log = createLogger("quotes");

export type AddQuoteInput = {
  supplierId?: unknown;
  lineItemKey?: unknown;
  unitPrice?: unknown;
  deliveryCost?: unknown;
  leadTimeDays?: unknown;
  holdWeeks?: unknown;
  remarks?: unknown;
};

export type AddQuoteError =
  | "rfq_not_found"
  | "supplier_not_found"
  | "unknown_line_item"
  | "invalid_unit_price"
  | "invalid_number";

export type AddQuoteResult =
  | { ok: true; quoteId: string }
  | { ok: false; error: AddQuoteError; field?: string };

type NumberRead = { ok: true; value: number | null } | { ok: false };

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

function readNonNegative(value: unknown, options: { integer: boolean }): NumberRead {
  if (isBlank(value)) return { ok: true, value: null };
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return { ok: false };
  if (options.integer && !Number.isInteger(numeric)) return { ok: false };
  return { ok: true, value: numeric };
}

function readId(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return typeof value === "string" ? value.trim() : "";
}

/**
 * Records one supplier quote against one line item of an RFQ. Quotes are
 * append-only; a later quote from the same supplier is listed alongside.
 */
export async function addQuote(
  rfqId: string,
  input: AddQuoteInput,
  deps?: { store?: RecordStore },
): Promise<AddQuoteResult> {
  const store = deps?.store ?? getRecordStore();

  const rfq = await store.getRfq(rfqId);
  if (!rfq) {
    return { ok: false, error: "rfq_not_found" };
  }

  const unitPrice = toFiniteNumber(input.unitPrice);
  if (unitPrice === null || unitPrice <= 0) {
    return { ok: false, error: "invalid_unit_price", field: "unitPrice" };
  }

  const deliveryCost = readNonNegative(input.deliveryCost, { integer: false });
  if (!deliveryCost.ok) return { ok: false, error: "invalid_number", field: "deliveryCost" };
  const leadTimeDays = readNonNegative(input.leadTimeDays, { integer: true });
  if (!leadTimeDays.ok) return { ok: false, error: "invalid_number", field: "leadTimeDays" };
  const holdWeeks = readNonNegative(input.holdWeeks, { integer: true });
  if (!holdWeeks.ok) return { ok: false, error: "invalid_number", field: "holdWeeks" };

  const supplierId = readId(input.supplierId);
  const supplier = supplierId ? await store.getSupplier(supplierId) : null;
  if (!supplier) {
    return { ok: false, error: "supplier_not_found" };
  }

  const lineItem = findLineItem(rfq.lineItems, readId(input.lineItemKey));
  if (!lineItem) {
    log.warn("quote for unknown line item", { rfqId, supplierId });
    return { ok: false, error: "unknown_line_item", field: "lineItemKey" };
  }

  const quoteId = await store.addQuote({
    rfqId: rfq.id,
    supplierId: supplier.id,
    lineItemKey: lineItem.key,
    unitPrice,
    deliveryCost: deliveryCost.value ?? 0,
    leadTimeDays: leadTimeDays.value,
    holdWeeks: holdWeeks.value,
    remarks: typeof input.remarks === "string" ? input.remarks.trim() : "",
  });

  log.info("quote recorded", { rfqId: rfq.id, quoteId, supplierId: supplier.id });
  return { ok: true, quoteId };
}
