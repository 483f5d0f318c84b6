import { toFiniteNumber } from "@/lib/numbers";
import { parseDeliveryAreas } from "@/lib/rfq/areas";
import { parseDeliveryDays } from "@/lib/rfq/deliveryDays";
import { parseEggSize, parsePackFormat } from "@/lib/rfq/lineItems";
import type { DeliveryDay, EggSize, PackFormat, SupplierRecord } from "@/types/eggs";

/** Supplier fields as an admin submits them; `id` present means update. */
export type SupplierDraft = Omit<SupplierRecord, "id"> & { id: string | null };

export type SupplierInputResult =
  | { ok: true; supplier: SupplierDraft }
  | { ok: false; errors: string[] };

type RawSupplierInput = Record<string, unknown>;

function readValue(raw: RawSupplierInput, ...keys: string[]): unknown {
  for (const key of keys) {
    if (key in raw && raw[key] !== undefined) return raw[key];
  }
  return undefined;
}

function readText(raw: RawSupplierInput, ...keys: string[]): string {
  const value = readValue(raw, ...keys);
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return typeof value === "string" ? value.trim() : "";
}

function readOptionalText(raw: RawSupplierInput, ...keys: string[]): string | null {
  const text = readText(raw, ...keys);
  return text.length > 0 ? text : null;
}

function readTokens(raw: RawSupplierInput, ...keys: string[]): string[] {
  const value = readValue(raw, ...keys);
  const entries = Array.isArray(value) ? value : [value];
  return entries
    .flatMap((entry) => (typeof entry === "string" ? entry.split(/[,/]+/g) : []))
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

function collectKnown<T>(
  tokens: string[],
  parse: (token: string) => T | null,
  label: string,
  errors: string[],
): T[] {
  const values: T[] = [];
  for (const token of tokens) {
    const parsed = parse(token);
    if (parsed === null) {
      errors.push(`Unknown ${label} "${token}".`);
      continue;
    }
    if (!values.includes(parsed)) values.push(parsed);
  }
  return values;
}

function readOptionalNumber(
  raw: RawSupplierInput,
  label: string,
  errors: string[],
  options: { integer?: boolean },
  ...keys: string[]
): number | null {
  const value = readValue(raw, ...keys);
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && value.trim() === "") return null;

  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) {
    errors.push(`${label} must be a non-negative number.`);
    return null;
  }
  if (options.integer && !Number.isInteger(numeric)) {
    errors.push(`${label} must be a whole number.`);
    return null;
  }
  return numeric;
}

function parseDayToken(token: string): DeliveryDay | null {
  return parseDeliveryDays(token)[0] ?? null;
}

/**
 * Validates a supplier submitted through the admin API or a CSV import.
 * Both camelCase keys and the CSV's snake_case column names are accepted.
 */
export function parseSupplierInput(raw: RawSupplierInput): SupplierInputResult {
  const errors: string[] = [];

  const name = readText(raw, "name");
  if (!name) {
    errors.push("Name is required.");
  }

  const sizes = collectKnown<EggSize>(readTokens(raw, "sizes"), parseEggSize, "size", errors);
  const packFormats = collectKnown<PackFormat>(
    readTokens(raw, "packFormats", "pack_formats"),
    parsePackFormat,
    "pack format",
    errors,
  );
  const deliveryDays = collectKnown<DeliveryDay>(
    readTokens(raw, "deliveryDays", "delivery_days"),
    parseDayToken,
    "delivery day",
    errors,
  );

  const moqTrays = readOptionalNumber(raw, "MOQ trays", errors, { integer: true }, "moqTrays", "moq_trays");
  const priceBandLow = readOptionalNumber(
    raw,
    "Price band low",
    errors,
    {},
    "priceBandLow",
    "price_band_low",
  );
  const priceBandHigh = readOptionalNumber(
    raw,
    "Price band high",
    errors,
    {},
    "priceBandHigh",
    "price_band_high",
  );
  if (priceBandLow !== null && priceBandHigh !== null && priceBandLow > priceBandHigh) {
    errors.push("Price band low must not exceed price band high.");
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    supplier: {
      id: readOptionalText(raw, "id"),
      name,
      welfare: readText(raw, "welfare"),
      certs: readText(raw, "certs"),
      sizes,
      packFormats,
      moqTrays,
      deliveryDays,
      deliveryAreas: parseDeliveryAreas(readTokens(raw, "deliveryAreas", "delivery_postcodes")),
      email: readOptionalText(raw, "email"),
      phone: readOptionalText(raw, "phone"),
      whatsapp: readOptionalText(raw, "whatsapp"),
      storyPdfUrl: readOptionalText(raw, "storyPdfUrl", "story_pdf_url"),
      priceBandLow,
      priceBandHigh,
      notes: readText(raw, "notes"),
    },
  };
}
