import { toWholeQuantity } from "@/lib/numbers";
import {
  EGG_SIZES,
  LINE_ITEM_KINDS,
  PACK_FORMATS,
  type EggSize,
  type LineItem,
  type LineItemKind,
  type PackFormat,
} from "@/types/eggs";

export type LineItemDraft = Omit<LineItem, "key">;

export type LineItemDraftParseResult = {
  items: LineItemDraft[];
  errors: string[];
};

function readText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseEggSize(value: unknown): EggSize | null {
  const upper = readText(value).toUpperCase();
  if (!upper) return null;
  return EGG_SIZES.find((size) => size.toUpperCase() === upper) ?? null;
}

export function parsePackFormat(value: unknown): PackFormat | null {
  const lower = readText(value).toLowerCase();
  return PACK_FORMATS.find((pack) => pack === lower) ?? null;
}

export function parseLineItemKind(value: unknown): LineItemKind | null {
  const lower = readText(value).toLowerCase();
  return LINE_ITEM_KINDS.find((kind) => kind === lower) ?? null;
}

function readField(entry: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (key in entry) return entry[key];
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates raw line items coming from a form, a JSON body or a JSON string.
 * Accepts both camelCase (`qtyWeek`, `targetPrice`) and the snake_case names
 * older clients post (`qty_week`, `target_price`).
 */
export function parseLineItemDrafts(raw: unknown): LineItemDraftParseResult {
  let input = raw;
  if (typeof input === "string") {
    try {
      input = JSON.parse(input);
    } catch {
      return { items: [], errors: ["Line items must be a JSON array."] };
    }
  }

  if (!Array.isArray(input)) {
    return { items: [], errors: ["Line items must be an array."] };
  }

  const items: LineItemDraft[] = [];
  const errors: string[] = [];

  input.forEach((entry: unknown, index) => {
    const label = `Line ${index + 1}`;
    if (!isRecord(entry)) {
      errors.push(`${label}: expected an object.`);
      return;
    }

    const kindInput = readField(entry, "kind");
    const sizeInput = readField(entry, "size");
    const packInput = readField(entry, "pack");

    const kind = parseLineItemKind(kindInput);
    const size = parseEggSize(sizeInput);
    const pack = parsePackFormat(packInput);

    if (!kind) {
      errors.push(`${label}: kind "${readText(kindInput)}" must be one of ${LINE_ITEM_KINDS.join(", ")}.`);
    }
    if (!size) {
      errors.push(`${label}: size "${readText(sizeInput)}" must be one of ${EGG_SIZES.join(", ")}.`);
    }
    if (!pack) {
      errors.push(`${label}: pack "${readText(packInput)}" must be one of ${PACK_FORMATS.join(", ")}.`);
    }
    if (!kind || !size || !pack) return;

    const targetPrice = readText(readField(entry, "targetPrice", "target_price"));

    items.push({
      kind,
      size,
      pack,
      qtyWeek: toWholeQuantity(readField(entry, "qtyWeek", "qty_week")),
      targetPrice: targetPrice || null,
    });
  });

  return { items, errors };
}

/**
 * Attaches stable keys to freshly parsed drafts. `nextKey` is retried until
 * it yields a key unused within this RFQ.
 */
export function withLineItemKeys(
  drafts: readonly LineItemDraft[],
  nextKey: () => string,
): LineItem[] {
  const used = new Set<string>();
  return drafts.map((draft) => {
    let key = nextKey();
    while (used.has(key)) {
      key = nextKey();
    }
    used.add(key);
    return { key, ...draft };
  });
}

/**
 * Lenient reader for line items already persisted with an RFQ.
 * Entries that cannot be read (or carry no key) are skipped.
 */
export function readStoredLineItems(raw: unknown): LineItem[] {
  if (!Array.isArray(raw)) return [];
  const items: LineItem[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const key = readText(entry.key);
    const { items: parsed } = parseLineItemDrafts([entry]);
    const draft = parsed[0];
    if (!key || !draft) continue;
    items.push({ key, ...draft });
  }
  return items;
}

export function findLineItem(
  items: readonly LineItem[],
  key: string | null | undefined,
): LineItem | null {
  if (!key) return null;
  return items.find((item) => item.key === key) ?? null;
}

export function formatLineItemLabel(item: Pick<LineItem, "kind" | "size" | "pack">): string {
  return `${item.kind} ${item.size} ${item.pack}`;
}

export function formatLineItemSummary(item: LineItem): string {
  const base = `${formatLineItemLabel(item)} x ${item.qtyWeek}/week`;
  return item.targetPrice ? `${base} (target ${item.targetPrice})` : base;
}
