import { createLogger } from "@/server/logging";
import { secretsMatch } from "@/server/rfqs/tokens";
import { getRecordStore, type RecordStore } from "@/server/store";
import type { RfqRecord } from "@/types/eggs";

const log = createLogger("rfqs");

/**
 * Resolves an RFQ for the client share link. A wrong token and an unknown id
 * look the same to the caller.
 */
export async function loadSharedRfq(
  rfqId: string,
  token: string,
  deps?: { store?: RecordStore },
): Promise<RfqRecord | null> {
  const store = deps?.store ?? getRecordStore();
  const rfq = await store.getRfq(rfqId);
  if (!rfq) return null;

  if (!secretsMatch(rfq.shareToken, token)) {
    log.warn("share token mismatch", { rfqId });
    return null;
  }
  return rfq;
}
