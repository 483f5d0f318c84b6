import { DELIVERY_DAYS, type DeliveryDay } from "@/types/eggs";

function toDeliveryDay(token: string): DeliveryDay | null {
  const trimmed = token.trim();
  if (trimmed.length < 3) return null;
  const short = trimmed.slice(0, 3).toLowerCase();
  const candidate = short.charAt(0).toUpperCase() + short.slice(1);
  return DELIVERY_DAYS.find((day) => day === candidate) ?? null;
}

/**
 * Accepts "Tue/Fri", "mon, wed", "Tuesday Friday" or an array of such tokens.
 * Unknown tokens are dropped; order of first appearance is kept.
 */
export function parseDeliveryDays(
  value: string | readonly string[] | null | undefined,
): DeliveryDay[] {
  if (value == null) return [];
  const tokens = (typeof value === "string" ? [value] : value).flatMap((entry) =>
    typeof entry === "string" ? entry.split(/[,/\s]+/g) : [],
  );

  const days: DeliveryDay[] = [];
  for (const token of tokens) {
    const day = toDeliveryDay(token);
    if (day && !days.includes(day)) {
      days.push(day);
    }
  }
  return days;
}

export function formatDeliveryDays(days: readonly DeliveryDay[]): string | null {
  return days.length > 0 ? days.join("/") : null;
}

export function countSharedDays(
  left: readonly DeliveryDay[],
  right: readonly DeliveryDay[],
): number {
  const rightSet = new Set(right);
  return new Set(left.filter((day) => rightSet.has(day))).size;
}
