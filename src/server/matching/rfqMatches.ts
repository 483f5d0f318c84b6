import {
  buildRfqOutreachMessage,
  buildSupplierOutreach,
  type OutreachMessage,
  type SupplierOutreach,
} from "@/lib/adapters/rfqOutreach";
import { currencySymbol } from "@/lib/formatCurrency";
import { matchSuppliersForRfq, type ScoredSupplier } from "@/lib/matching/supplierMatch";
import { getAppConfig, type AppConfig } from "@/server/config";
import { createLogger } from "@/server/logging";
import { getRecordStore, type RecordStore } from "@/server/store";
import type { RfqRecord } from "@/types/eggs";

const log = createLogger("matching");

export type RfqSupplierMatch = ScoredSupplier & { outreach: SupplierOutreach };

export type RfqMatchesResult =
  | {
      ok: true;
      rfq: RfqRecord;
      /** Message without a named recipient, for copy/paste into other channels. */
      outreach: OutreachMessage;
      matches: RfqSupplierMatch[];
    }
  | { ok: false; error: "rfq_not_found" };

export async function loadRfqMatches(
  rfqId: string,
  deps?: { store?: RecordStore; config?: Pick<AppConfig, "currency" | "whatsappCountryCode"> },
): Promise<RfqMatchesResult> {
  const store = deps?.store ?? getRecordStore();
  const config = deps?.config ?? getAppConfig();

  const rfq = await store.getRfq(rfqId);
  if (!rfq) {
    return { ok: false, error: "rfq_not_found" };
  }

  const suppliers = await store.listSuppliers();
  const options = {
    currencySymbol: currencySymbol(config.currency),
    whatsappCountryCode: config.whatsappCountryCode,
  };
  const matches = matchSuppliersForRfq(rfq, rfq.lineItems, suppliers).map(
    (match): RfqSupplierMatch => ({
      ...match,
      outreach: buildSupplierOutreach(rfq, match.supplier, options),
    }),
  );

  log.info("matched", {
    rfqId: rfq.id,
    supplierCount: suppliers.length,
    matchCount: matches.length,
    topScore: matches[0]?.score ?? null,
  });

  return {
    ok: true,
    rfq,
    outreach: buildRfqOutreachMessage(rfq, null, options),
    matches,
  };
}
