import { toCsvLine } from "@/lib/csv";
import type { RfqRecord } from "@/types/eggs";

/**
 * Summary sheet for an RFQ: one block of request details, a blank line,
 * then one row per line item.
 */
export function buildRfqCsv(
  rfq: Pick<
    RfqRecord,
    "clientName" | "deliveryAreas" | "deliveryWindows" | "paymentTerms" | "notes" | "lineItems"
  >,
  options?: { currencySymbol?: string },
): string {
  const currency = options?.currencySymbol ?? "£";
  const lines = [
    toCsvLine(["Client", "Postcodes", "Delivery", "Terms", "Notes"]),
    toCsvLine([
      rfq.clientName ?? "",
      rfq.deliveryAreas.join(","),
      rfq.deliveryWindows ?? "",
      rfq.paymentTerms ?? "",
      rfq.notes.replace(/\r?\n/g, " "),
    ]),
    "",
    toCsvLine(["Items: kind", "size", "pack", "qty/week", `target ${currency}`]),
    ...rfq.lineItems.map((item) =>
      toCsvLine([item.kind, item.size, item.pack, item.qtyWeek, item.targetPrice ?? ""]),
    ),
  ];
  return `${lines.join("\r\n")}\r\n`;
}
