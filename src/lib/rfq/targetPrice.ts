const TARGET_PRICE_PATTERN = /(\d+(?:\.\d{1,2})?)/;

/**
 * First amount found in a buyer's target price text ("£2,450.50 per pallet" -> 2450.5).
 * Thousands separators are dropped before matching.
 */
export function parseTargetPrice(text: string | null | undefined): number | null {
  if (typeof text !== "string") return null;
  const match = TARGET_PRICE_PATTERN.exec(text.replace(/,/g, ""));
  if (!match?.[1]) return null;
  const parsed = Number(match[1]);
  return Number.isFinite(parsed) ? parsed : null;
}
