/**
 * Delivery areas are free-form postal prefixes ("BN", "BN1", "RH12").
 * Stored upper-cased, trimmed and de-duplicated.
 */
export function parseDeliveryAreas(value: string | readonly string[] | null | undefined): string[] {
  if (value == null) return [];
  const tokens = (typeof value === "string" ? [value] : value).flatMap((entry) =>
    typeof entry === "string" ? entry.split(/[,;]+/g) : [],
  );

  const areas: string[] = [];
  for (const token of tokens) {
    const normalized = token.trim().toUpperCase();
    if (normalized && !areas.includes(normalized)) {
      areas.push(normalized);
    }
  }
  return areas;
}

/** True when any supplier prefix starts at least one of the RFQ area codes. */
export function areaCoveredBy(
  supplierPrefixes: readonly string[],
  rfqAreas: readonly string[],
): boolean {
  const prefixes = supplierPrefixes
    .map((prefix) => prefix.trim().toUpperCase())
    .filter((prefix) => prefix.length > 0);
  if (prefixes.length === 0) return false;

  return rfqAreas.some((area) => {
    const code = area.trim().toUpperCase();
    return prefixes.some((prefix) => code.startsWith(prefix));
  });
}
