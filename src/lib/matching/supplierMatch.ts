import { areaCoveredBy } from "@/lib/rfq/areas";
import { countSharedDays } from "@/lib/rfq/deliveryDays";
import { parseTargetPrice } from "@/lib/rfq/targetPrice";
import type { LineItem, RfqRecord, SupplierRecord } from "@/types/eggs";

export type MatchableRfq = Pick<RfqRecord, "deliveryAreas" | "welfare" | "deliveryDays">;

export type MatchableSupplier = Pick<
  SupplierRecord,
  | "name"
  | "welfare"
  | "sizes"
  | "packFormats"
  | "moqTrays"
  | "deliveryDays"
  | "deliveryAreas"
  | "priceBandLow"
  | "priceBandHigh"
>;

export type SupplierMatchBreakdown = {
  /** 10 points per covered line item. */
  coverage: number;
  /** 2 points per shared delivery day (one day's worth when the RFQ names none). */
  deliveryDays: number;
  /** 2 points when the buyer's target sits inside the supplier's price band. */
  priceBand: number;
  /** The target the price band was checked against, when one could be read. */
  targetPrice: number | null;
};

export type ScoredSupplier<TSupplier extends MatchableSupplier = SupplierRecord> = {
  supplier: TSupplier;
  score: number;
  coveredLineItemKeys: string[];
  breakdown: SupplierMatchBreakdown;
};

const POINTS_PER_COVERED_ITEM = 10;
const POINTS_PER_SHARED_DAY = 2;
const PRICE_BAND_POINTS = 2;
/** Overlap credited when the RFQ does not name delivery days. */
const BASELINE_DAY_OVERLAP = 1;

function normalizeWelfare(value: string | null | undefined): string | null {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  return normalized.length > 0 ? normalized : null;
}

function meetsWelfare(supplier: MatchableSupplier, wanted: string | null): boolean {
  if (!wanted) return true;
  return supplier.welfare.toLowerCase().includes(wanted);
}

export function supplierCoversLineItem(
  supplier: Pick<MatchableSupplier, "sizes" | "packFormats" | "moqTrays">,
  item: Pick<LineItem, "size" | "pack" | "qtyWeek">,
): boolean {
  const size = item.size.toUpperCase();
  const sizeOk =
    size === "MIXED" || supplier.sizes.some((supported) => supported.toUpperCase() === size);
  if (!sizeOk) return false;

  const pack = item.pack.toLowerCase();
  if (!supplier.packFormats.some((supported) => supported.toLowerCase() === pack)) {
    return false;
  }

  // MOQ is counted in trays, so it only constrains tray items.
  if (pack === "tray") {
    const moq = supplier.moqTrays ?? 0;
    if (moq > item.qtyWeek) return false;
  }

  return true;
}

/** First target price that yields a number; later line items are not consulted. */
export function resolveRfqTargetPrice(lineItems: readonly Pick<LineItem, "targetPrice">[]): number | null {
  for (const item of lineItems) {
    if (!item.targetPrice) continue;
    const parsed = parseTargetPrice(item.targetPrice);
    if (parsed !== null) return parsed;
  }
  return null;
}

function priceBandPoints(supplier: MatchableSupplier, target: number | null): number {
  if (target === null) return 0;
  const low = supplier.priceBandLow;
  const high = supplier.priceBandHigh;
  if (low === null || high === null) return 0;
  return low <= target && target <= high ? PRICE_BAND_POINTS : 0;
}

function compareByScoreThenName<T extends MatchableSupplier>(
  a: ScoredSupplier<T>,
  b: ScoredSupplier<T>,
): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.supplier.name < b.supplier.name) return -1;
  if (a.supplier.name > b.supplier.name) return 1;
  return 0;
}

/**
 * Filters the supplier directory down to suppliers that can serve the RFQ and
 * ranks them. Hard constraints: delivery area, welfare, and covering at least
 * one line item. Highest score first, ties by supplier name.
 */
export function matchSuppliersForRfq<TSupplier extends MatchableSupplier>(
  rfq: MatchableRfq,
  lineItems: readonly LineItem[],
  suppliers: readonly TSupplier[],
): ScoredSupplier<TSupplier>[] {
  const wantedWelfare = normalizeWelfare(rfq.welfare);
  const targetPrice = resolveRfqTargetPrice(lineItems);
  const ranked: ScoredSupplier<TSupplier>[] = [];

  for (const supplier of suppliers) {
    if (!areaCoveredBy(supplier.deliveryAreas, rfq.deliveryAreas)) continue;
    if (!meetsWelfare(supplier, wantedWelfare)) continue;

    const coveredLineItemKeys = lineItems
      .filter((item) => supplierCoversLineItem(supplier, item))
      .map((item) => item.key);
    if (coveredLineItemKeys.length === 0) continue;

    const overlap =
      rfq.deliveryDays.length > 0
        ? countSharedDays(rfq.deliveryDays, supplier.deliveryDays)
        : BASELINE_DAY_OVERLAP;

    const breakdown: SupplierMatchBreakdown = {
      coverage: coveredLineItemKeys.length * POINTS_PER_COVERED_ITEM,
      deliveryDays: overlap * POINTS_PER_SHARED_DAY,
      priceBand: priceBandPoints(supplier, targetPrice),
      targetPrice,
    };

    ranked.push({
      supplier,
      score: breakdown.coverage + breakdown.deliveryDays + breakdown.priceBand,
      coveredLineItemKeys,
      breakdown,
    });
  }

  return ranked.sort(compareByScoreThenName);
}
