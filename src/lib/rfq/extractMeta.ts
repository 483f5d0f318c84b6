/**
 * Keyword-based prefill for RFQ metadata pasted as free text.
 *
 * This is a heuristic: plain substring checks, no language understanding.
 * Anything it returns can be overridden by structured fields on the request.
 */

export type ExtractedRfqMeta = {
  deliveryAreas: string[];
  welfare: "organic" | "free-range" | null;
  deliveryWindows: string | null;
  paymentTerms: string | null;
  targetPrice: string | null;
};

const AREA_TOKENS = ["bn1", "bn2", "bn", "rh", "po", "se", "sw", "w1", "ec"] as const;

const DAY_TOKENS: Array<[string, string]> = [
  ["mon", "Mon"],
  ["tue", "Tue"],
  ["wed", "Wed"],
  ["thu", "Thu"],
  ["fri", "Fri"],
  ["sat", "Sat"],
  ["sun", "Sun"],
];

function extractWelfare(lower: string): ExtractedRfqMeta["welfare"] {
  if (lower.includes("organic")) return "organic";
  if (lower.includes("free-range") || lower.includes("free range")) return "free-range";
  return null;
}

function extractDeliveryWindows(lower: string): string | null {
  if (lower.includes("tue") && lower.includes("fri")) return "Tue/Fri";
  const found = DAY_TOKENS.filter(([token]) => lower.includes(token)).map(([, name]) => name);
  return found.length > 0 ? found.slice(0, 2).join("/") : null;
}

export function extractRfqMetaFromText(text: string | null | undefined): ExtractedRfqMeta {
  const source = typeof text === "string" ? text : "";
  const lower = source.toLowerCase();

  const deliveryAreas: string[] = [];
  for (const token of AREA_TOKENS) {
    const upper = token.toUpperCase();
    if (lower.includes(token) && !deliveryAreas.includes(upper)) {
      deliveryAreas.push(upper);
    }
  }

  const termsMatch = /(\d{1,2})\s*day/.exec(lower);
  const priceMatch = /£\s*(\d+(?:\.\d{1,2})?)/.exec(source);

  return {
    deliveryAreas,
    welfare: extractWelfare(lower),
    deliveryWindows: extractDeliveryWindows(lower),
    paymentTerms: termsMatch?.[1] ? `${termsMatch[1]} days` : null,
    targetPrice: priceMatch?.[1] ? `£${priceMatch[1]}` : null,
  };
}
