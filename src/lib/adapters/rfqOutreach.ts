import { formatLineItemSummary } from "@/lib/rfq/lineItems";
import type { RfqRecord, SupplierRecord } from "@/types/eggs";
import { buildMailtoUrl, buildTelUrl, buildWhatsappUrl } from "./outreachLinks";

export type OutreachMessage = {
  subject: string;
  body: string;
};

export type SupplierOutreach = OutreachMessage & {
  links: {
    email: string | null;
    whatsapp: string | null;
    phone: string | null;
    story: string | null;
  };
};

export type OutreachOptions = {
  currencySymbol?: string;
  whatsappCountryCode?: string;
};

type OutreachRfq = Pick<
  RfqRecord,
  "id" | "clientName" | "deliveryAreas" | "deliveryWindows" | "notes" | "lineItems"
>;

function orDash(value: string | null | undefined): string {
  const trimmed = typeof value === "string" ? value.trim() : "";
  return trimmed || "-";
}

export function buildRfqOutreachSubject(rfq: Pick<OutreachRfq, "id" | "lineItems">): string {
  const first = rfq.lineItems[0];
  if (!first) return `RFQ #${rfq.id}`;
  return `RFQ #${rfq.id} — ${first.qtyWeek} ${first.pack} / week`;
}

export function buildRfqOutreachMessage(
  rfq: OutreachRfq,
  recipientName?: string | null,
  options?: OutreachOptions,
): OutreachMessage {
  const currency = options?.currencySymbol ?? "£";
  const greetingName = typeof recipientName === "string" && recipientName.trim() ? recipientName.trim() : "there";

  const lines: string[] = [];
  lines.push(`Hi ${greetingName},`);
  lines.push("");
  lines.push("We have a buyer request:");
  lines.push(`Client: ${orDash(rfq.clientName)}`);
  lines.push(`Areas: ${orDash(rfq.deliveryAreas.join(","))}`);
  lines.push(`Delivery: ${orDash(rfq.deliveryWindows)}`);
  lines.push("Items:");
  if (rfq.lineItems.length === 0) {
    lines.push("- Not specified");
  } else {
    lines.push(...rfq.lineItems.map((item) => `- ${formatLineItemSummary(item)}`));
  }
  lines.push("");
  lines.push(`Notes: ${orDash(rfq.notes)}`);
  lines.push("");
  lines.push(
    `Please reply with unit ${currency}/tray or box and delivery ${currency}/drop, lead time and hold period.`,
  );

  return { subject: buildRfqOutreachSubject(rfq), body: lines.join("\n") };
}

/** Message plus one deep link per contact channel the supplier has on file. */
export function buildSupplierOutreach(
  rfq: OutreachRfq,
  supplier: Pick<SupplierRecord, "name" | "email" | "phone" | "whatsapp" | "storyPdfUrl">,
  options?: OutreachOptions,
): SupplierOutreach {
  const message = buildRfqOutreachMessage(rfq, supplier.name, options);
  const email = (supplier.email ?? "").trim();

  return {
    ...message,
    links: {
      email: email ? buildMailtoUrl({ to: email, subject: message.subject, body: message.body }) : null,
      whatsapp: buildWhatsappUrl(supplier.whatsapp, message.body, {
        defaultCountryCode: options?.whatsappCountryCode,
      }),
      phone: buildTelUrl(supplier.phone),
      story: supplier.storyPdfUrl?.trim() || null,
    },
  };
}
