import { parseDeliveryAreas } from "@/lib/rfq/areas";
import { formatDeliveryDays, parseDeliveryDays } from "@/lib/rfq/deliveryDays";
import { extractRfqMetaFromText } from "@/lib/rfq/extractMeta";
import { parseLineItemDrafts, withLineItemKeys } from "@/lib/rfq/lineItems";
import { createLogger } from "@/server/logging";
import { generateLineItemKey } from "@/server/rfqs/tokens";
import { getRecordStore, type RecordStore } from "@/server/store";
import type { RfqRecord } from "@/types/eggs";

const log = createLogger("rfqs");

export type CreateRfqInput = {
  clientName?: unknown;
  /** Free text the buyer pasted; keyword-scanned for defaults and kept as notes. */
  metaText?: unknown;
  deliveryAreas?: unknown;
  welfare?: unknown;
  deliveryWindows?: unknown;
  paymentTerms?: unknown;
  notes?: unknown;
  lineItems?: unknown;
};

export type CreateRfqResult =
  | { ok: true; rfq: RfqRecord }
  | { ok: false; error: "invalid_line_items"; details: string[] }
  | { ok: false; error: "missing_line_items" };

function normalizeOptionalText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readAreaInput(value: unknown): string[] | null {
  if (typeof value === "string") {
    const areas = parseDeliveryAreas(value);
    return areas.length > 0 ? areas : null;
  }
  if (Array.isArray(value)) {
    const areas = parseDeliveryAreas(value.filter((entry): entry is string => typeof entry === "string"));
    return areas.length > 0 ? areas : null;
  }
  return null;
}

/**
 * Creates an RFQ. Structured fields win over whatever the keyword scan of
 * `metaText` found; line items are validated up front and keyed once.
 */
export async function createRfq(
  input: CreateRfqInput,
  deps?: { store?: RecordStore; lineItemKey?: () => string },
): Promise<CreateRfqResult> {
  const { items: drafts, errors } = parseLineItemDrafts(input.lineItems ?? []);
  if (errors.length > 0) {
    log.warn("line items rejected", { errorCount: errors.length });
    return { ok: false, error: "invalid_line_items", details: errors };
  }
  if (drafts.length === 0) {
    return { ok: false, error: "missing_line_items" };
  }

  const metaText = typeof input.metaText === "string" ? input.metaText.trim() : "";
  const extracted = extractRfqMetaFromText(metaText);

  const deliveryWindows = normalizeOptionalText(input.deliveryWindows) ?? extracted.deliveryWindows;
  const deliveryDays = parseDeliveryDays(deliveryWindows);
  const welfare = normalizeOptionalText(input.welfare)?.toLowerCase() ?? extracted.welfare;

  const store = deps?.store ?? getRecordStore();
  const rfq = await store.createRfq({
    clientName: normalizeOptionalText(input.clientName),
    deliveryAreas: readAreaInput(input.deliveryAreas) ?? extracted.deliveryAreas,
    welfare,
    deliveryDays,
    deliveryWindows: formatDeliveryDays(deliveryDays) ?? deliveryWindows,
    paymentTerms: normalizeOptionalText(input.paymentTerms) ?? extracted.paymentTerms,
    notes: normalizeOptionalText(input.notes) ?? metaText,
    lineItems: withLineItemKeys(drafts, deps?.lineItemKey ?? generateLineItemKey),
  });

  log.info("created", {
    rfqId: rfq.id,
    lineItemCount: rfq.lineItems.length,
    areaCount: rfq.deliveryAreas.length,
  });
  return { ok: true, rfq };
}
