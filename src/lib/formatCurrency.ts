const DEFAULT_CURRENCY = "GBP";

type FormatCurrencyOptions = Pick<
  Intl.NumberFormatOptions,
  "minimumFractionDigits" | "maximumFractionDigits"
>;

/**
 * Prices here are per tray or per box, so two decimals is the default;
 * landed costs ask for four.
 */
export function formatCurrency(
  value: number | null | undefined,
  currency?: string | null,
  options?: FormatCurrencyOptions,
): string {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return "—";
  }

  const resolvedCurrency = (currency ?? DEFAULT_CURRENCY).toUpperCase();
  const maximumFractionDigits = options?.maximumFractionDigits ?? 2;
  const minimumFractionDigits = options?.minimumFractionDigits ?? maximumFractionDigits;

  try {
    return new Intl.NumberFormat("en-GB", {
      style: "currency",
      currency: resolvedCurrency,
      minimumFractionDigits,
      maximumFractionDigits,
    }).format(value);
  } catch {
    const digits = Math.max(minimumFractionDigits, maximumFractionDigits);
    return `${resolvedCurrency} ${value.toFixed(digits)}`;
  }
}

export function currencySymbol(currency?: string | null): string {
  const resolvedCurrency = (currency ?? DEFAULT_CURRENCY).toUpperCase();
  try {
    const part = new Intl.NumberFormat("en-GB", { style: "currency", currency: resolvedCurrency })
      .formatToParts(0)
      .find((entry) => entry.type === "currency");
    return part?.value ?? resolvedCurrency;
  } catch {
    return resolvedCurrency;
  }
}
