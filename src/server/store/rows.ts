import { toFiniteNumber, toWholeQuantity } from "@/lib/numbers";
import { parseDeliveryAreas } from "@/lib/rfq/areas";
import { parseDeliveryDays } from "@/lib/rfq/deliveryDays";
import { parseEggSize, parsePackFormat, readStoredLineItems } from "@/lib/rfq/lineItems";
import type { SupplierDraft } from "@/lib/supplierInput";
import type { NewQuoteFields, NewRfqFields } from "@/server/store/types";
import type { EggSize, PackFormat, QuoteRecord, RfqRecord, SupplierRecord } from "@/types/eggs";

export const SUPPLIERS_TABLE = "eggdesk_suppliers";
export const RFQS_TABLE = "eggdesk_rfqs";
export const QUOTES_TABLE = "eggdesk_quotes";
export const FACTS_TABLE = "eggdesk_facts";
export const DECK_PROGRESS_TABLE = "eggdesk_deck_progress";

export const SUPPLIER_COLUMNS =
  "id,name,welfare,certs,sizes,pack_formats,moq_trays,delivery_days,delivery_postcodes,email,phone,whatsapp,story_pdf_url,price_band_low,price_band_high,notes";
export const RFQ_COLUMNS =
  "id,client_name,delivery_postcodes,welfare,delivery_days,delivery_windows,payment_terms,notes,line_items,share_token,created_at";
export const QUOTE_COLUMNS =
  "id,rfq_id,supplier_id,line_item_key,unit_price,delivery_cost,lead_time_days,hold_weeks,remarks,created_at";

export type SupplierRow = {
  id: string;
  name: string | null;
  welfare: string | null;
  certs: string | null;
  sizes: string[] | null;
  pack_formats: string[] | null;
  moq_trays: number | null;
  delivery_days: string[] | null;
  delivery_postcodes: string[] | null;
  email: string | null;
  phone: string | null;
  whatsapp: string | null;
  story_pdf_url: string | null;
  price_band_low: number | string | null;
  price_band_high: number | string | null;
  notes: string | null;
};

export type RfqRow = {
  id: string;
  client_name: string | null;
  delivery_postcodes: string[] | null;
  welfare: string | null;
  delivery_days: string[] | null;
  delivery_windows: string | null;
  payment_terms: string | null;
  notes: string | null;
  line_items: unknown;
  share_token: string;
  created_at: string;
};

export type QuoteRow = {
  id: string;
  rfq_id: string;
  supplier_id: string;
  line_item_key: string | null;
  unit_price: number | string | null;
  delivery_cost: number | string | null;
  lead_time_days: number | null;
  hold_weeks: number | null;
  remarks: string | null;
  created_at: string;
};

export type FactRow = { text: string | null };

export type DeckProgressRow = { slug: string; progress_value: number | null };

function collect<T>(values: readonly string[] | null, parse: (value: string) => T | null): T[] {
  const result: T[] = [];
  for (const value of values ?? []) {
    const parsed = parse(value);
    if (parsed !== null && !result.includes(parsed)) result.push(parsed);
  }
  return result;
}

function optionalText(value: string | null | undefined): string | null {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed.length > 0 ? trimmed : null;
}

function optionalCount(value: unknown): number | null {
  const numeric = toFiniteNumber(value);
  return numeric === null ? null : Math.trunc(numeric);
}

export function supplierFromRow(row: SupplierRow): SupplierRecord {
  return {
    id: String(row.id),
    name: row.name ?? "",
    welfare: row.welfare ?? "",
    certs: row.certs ?? "",
    sizes: collect<EggSize>(row.sizes, parseEggSize),
    packFormats: collect<PackFormat>(row.pack_formats, parsePackFormat),
    moqTrays: optionalCount(row.moq_trays),
    deliveryDays: parseDeliveryDays(row.delivery_days ?? []),
    deliveryAreas: parseDeliveryAreas(row.delivery_postcodes ?? []),
    email: optionalText(row.email),
    phone: optionalText(row.phone),
    whatsapp: optionalText(row.whatsapp),
    storyPdfUrl: optionalText(row.story_pdf_url),
    priceBandLow: toFiniteNumber(row.price_band_low),
    priceBandHigh: toFiniteNumber(row.price_band_high),
    notes: row.notes ?? "",
  };
}

export function supplierToRow(input: SupplierDraft): Omit<SupplierRow, "id"> {
  return {
    name: input.name,
    welfare: input.welfare,
    certs: input.certs,
    sizes: [...input.sizes],
    pack_formats: [...input.packFormats],
    moq_trays: input.moqTrays,
    delivery_days: [...input.deliveryDays],
    delivery_postcodes: [...input.deliveryAreas],
    email: input.email,
    phone: input.phone,
    whatsapp: input.whatsapp,
    story_pdf_url: input.storyPdfUrl,
    price_band_low: input.priceBandLow,
    price_band_high: input.priceBandHigh,
    notes: input.notes,
  };
}

export function rfqFromRow(row: RfqRow): RfqRecord {
  return {
    id: String(row.id),
    clientName: optionalText(row.client_name),
    deliveryAreas: parseDeliveryAreas(row.delivery_postcodes ?? []),
    welfare: optionalText(row.welfare),
    deliveryDays: parseDeliveryDays(row.delivery_days ?? []),
    deliveryWindows: optionalText(row.delivery_windows),
    paymentTerms: optionalText(row.payment_terms),
    notes: row.notes ?? "",
    lineItems: readStoredLineItems(row.line_items),
    shareToken: row.share_token,
    createdAt: row.created_at,
  };
}

export function rfqToRow(
  fields: NewRfqFields,
  extra: { shareToken: string },
): Omit<RfqRow, "id" | "created_at"> {
  return {
    client_name: fields.clientName,
    delivery_postcodes: [...fields.deliveryAreas],
    welfare: fields.welfare,
    delivery_days: [...fields.deliveryDays],
    delivery_windows: fields.deliveryWindows,
    payment_terms: fields.paymentTerms,
    notes: fields.notes,
    line_items: fields.lineItems.map((item) => ({
      key: item.key,
      kind: item.kind,
      size: item.size,
      pack: item.pack,
      qty_week: toWholeQuantity(item.qtyWeek),
      target_price: item.targetPrice,
    })),
    share_token: extra.shareToken,
  };
}

export function quoteFromRow(row: QuoteRow): QuoteRecord {
  return {
    id: String(row.id),
    rfqId: String(row.rfq_id),
    supplierId: String(row.supplier_id),
    lineItemKey: row.line_item_key ?? "",
    unitPrice: toFiniteNumber(row.unit_price) ?? 0,
    deliveryCost: toFiniteNumber(row.delivery_cost) ?? 0,
    leadTimeDays: optionalCount(row.lead_time_days),
    holdWeeks: optionalCount(row.hold_weeks),
    remarks: row.remarks ?? "",
    createdAt: row.created_at,
  };
}

export function quoteToRow(fields: NewQuoteFields): Omit<QuoteRow, "id" | "created_at"> {
  return {
    rfq_id: fields.rfqId,
    supplier_id: fields.supplierId,
    line_item_key: fields.lineItemKey,
    unit_price: fields.unitPrice,
    delivery_cost: fields.deliveryCost,
    lead_time_days: fields.leadTimeDays,
    hold_weeks: fields.holdWeeks,
    remarks: fields.remarks,
  };
}
