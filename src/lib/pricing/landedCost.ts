import { roundTo, toFiniteNumber, toWholeQuantity } from "@/lib/numbers";
import { findLineItem, formatLineItemLabel } from "@/lib/rfq/lineItems";
import type { LineItem, QuoteRecord } from "@/types/eggs";

/** A captured quote joined with the supplier fields the comparison shows. */
export type ComparableQuote = Pick<
  QuoteRecord,
  | "id"
  | "supplierId"
  | "lineItemKey"
  | "unitPrice"
  | "deliveryCost"
  | "leadTimeDays"
  | "holdWeeks"
  | "remarks"
  | "createdAt"
> & {
  supplierName: string;
  storyPdfUrl?: string | null;
};

export type ComparisonRow = {
  quoteId: string;
  supplierId: string;
  supplierName: string;
  storyPdfUrl: string | null;
  lineItemKey: string;
  lineItemLabel: string;
  /**
   * False when the quote points at a key the RFQ does not have. Such rows are
   * still listed (quantity 0, empty label) and should be treated as suspect.
   */
  lineItemResolved: boolean;
  unitPrice: number;
  deliveryCost: number;
  qtyWeek: number;
  deliveryPerUnit: number;
  landedPerUnit: number;
  leadTimeDays: number | null;
  holdWeeks: number | null;
  remarks: string;
  createdAt: string;
};

export type ClientComparisonRow = Pick<
  ComparisonRow,
  "supplierName" | "lineItemLabel" | "unitPrice" | "deliveryCost" | "landedPerUnit" | "storyPdfUrl"
>;

const COST_DECIMALS = 4;

function toMoney(value: unknown): number {
  return toFiniteNumber(value) ?? 0;
}

export function computeLandedUnitCost(input: {
  unitPrice: number;
  deliveryCost: number;
  qtyWeek: number;
}): { deliveryPerUnit: number; landedPerUnit: number } {
  const deliveryPerUnit = input.qtyWeek > 0 ? input.deliveryCost / input.qtyWeek : 0;
  return {
    deliveryPerUnit: roundTo(deliveryPerUnit, COST_DECIMALS),
    landedPerUnit: roundTo(input.unitPrice + deliveryPerUnit, COST_DECIMALS),
  };
}

/**
 * Spreads each quote's per-drop delivery cost over the weekly quantity of the
 * line item it prices, so suppliers quoting trays, boxes, or bundled delivery
 * compare on one landed cost per unit. Cheapest first.
 */
export function compareLandedCosts(
  lineItems: readonly LineItem[],
  quotes: readonly ComparableQuote[],
): ComparisonRow[] {
  const rows = quotes.map((quote): ComparisonRow => {
    const item = findLineItem(lineItems, quote.lineItemKey);
    const qtyWeek = item ? toWholeQuantity(item.qtyWeek) : 0;
    const unitPrice = toMoney(quote.unitPrice);
    const deliveryCost = toMoney(quote.deliveryCost);
    const { deliveryPerUnit, landedPerUnit } = computeLandedUnitCost({
      unitPrice,
      deliveryCost,
      qtyWeek,
    });

    return {
      quoteId: quote.id,
      supplierId: quote.supplierId,
      supplierName: quote.supplierName,
      storyPdfUrl: quote.storyPdfUrl ?? null,
      lineItemKey: quote.lineItemKey,
      lineItemLabel: item ? formatLineItemLabel(item) : "",
      lineItemResolved: item !== null,
      unitPrice,
      deliveryCost,
      qtyWeek,
      deliveryPerUnit,
      landedPerUnit,
      leadTimeDays: quote.leadTimeDays,
      holdWeeks: quote.holdWeeks,
      remarks: quote.remarks,
      createdAt: quote.createdAt,
    };
  });

  return rows.sort((a, b) => a.landedPerUnit - b.landedPerUnit);
}

export function toClientComparisonRow(row: ComparisonRow): ClientComparisonRow {
  return {
    supplierName: row.supplierName,
    lineItemLabel: row.lineItemLabel,
    unitPrice: row.unitPrice,
    deliveryCost: row.deliveryCost,
    landedPerUnit: row.landedPerUnit,
    storyPdfUrl: row.storyPdfUrl,
  };
}
