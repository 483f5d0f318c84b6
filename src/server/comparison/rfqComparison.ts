import { formatCurrency } from "@/lib/formatCurrency";
import {
  compareLandedCosts,
  toClientComparisonRow,
  type ClientComparisonRow,
  type ComparableQuote,
  type ComparisonRow,
} from "@/lib/pricing/landedCost";
import { getAppConfig, type AppConfig } from "@/server/config";
import { createLogger } from "@/server/logging";
import { getRecordStore, type RecordStore } from "@/server/store";
import type { RfqRecord, SupplierRecord } from "@/types/eggs";

const log = createLogger("comparison");

export type RfqComparisonResult =
  | { ok: true; rfq: RfqRecord; rows: ComparisonRow[] }
  | { ok: false; error: "rfq_not_found" };

export type ClientComparisonView = ClientComparisonRow & {
  display: { unitPrice: string; deliveryCost: string; landedPerUnit: string };
};

export type ClientComparison = {
  clientName: string | null;
  currency: string;
  rows: ClientComparisonView[];
};

/**
 * Landed-cost comparison of an RFQ snapshot: every quote joined with its
 * supplier, cheapest landed cost per unit first.
 */
export async function buildRfqComparison(
  rfq: RfqRecord,
  deps?: { store?: RecordStore },
): Promise<ComparisonRow[]> {
  const store = deps?.store ?? getRecordStore();
  const [quotes, suppliers] = await Promise.all([store.listQuotes(rfq.id), store.listSuppliers()]);
  const suppliersById = new Map<string, SupplierRecord>(suppliers.map((supplier) => [supplier.id, supplier]));

  const comparable = quotes.map((quote): ComparableQuote => {
    const supplier = suppliersById.get(quote.supplierId);
    return {
      ...quote,
      supplierName: supplier?.name ?? "",
      storyPdfUrl: supplier?.storyPdfUrl ?? null,
    };
  });

  const rows = compareLandedCosts(rfq.lineItems, comparable);
  for (const row of rows) {
    if (!row.lineItemResolved) {
      log.warn("quote points at a missing line item", {
        rfqId: rfq.id,
        quoteId: row.quoteId,
        lineItemKey: row.lineItemKey,
      });
    }
  }
  return rows;
}

export async function loadRfqComparison(
  rfqId: string,
  deps?: { store?: RecordStore },
): Promise<RfqComparisonResult> {
  const store = deps?.store ?? getRecordStore();
  const rfq = await store.getRfq(rfqId);
  if (!rfq) {
    return { ok: false, error: "rfq_not_found" };
  }
  const rows = await buildRfqComparison(rfq, { store });
  return { ok: true, rfq, rows };
}

/** What the buyer sees through the share link: no supplier ids, contacts or remarks. */
export async function buildClientComparison(
  rfq: RfqRecord,
  deps?: { store?: RecordStore; config?: Pick<AppConfig, "currency"> },
): Promise<ClientComparison> {
  const currency = (deps?.config ?? getAppConfig()).currency;
  const rows = await buildRfqComparison(rfq, { store: deps?.store });
  return {
    clientName: rfq.clientName,
    currency,
    rows: rows.map((row): ClientComparisonView => {
      const clientRow = toClientComparisonRow(row);
      return {
        ...clientRow,
        display: {
          unitPrice: formatCurrency(clientRow.unitPrice, currency),
          deliveryCost: formatCurrency(clientRow.deliveryCost, currency),
          landedPerUnit: formatCurrency(clientRow.landedPerUnit, currency, {
            minimumFractionDigits: 2,
            maximumFractionDigits: 4,
          }),
        },
      };
    }),
  };
}
