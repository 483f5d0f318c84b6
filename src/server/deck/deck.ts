import { toFiniteNumber } from "@/lib/numbers";
import { getAppConfig, type AppConfig } from "@/server/config";
import { warnOnce } from "@/server/db/schemaErrors";
import { createLogger } from "@/server/logging";
import { secretsMatch } from "@/server/rfqs/tokens";
import { getRecordStore, type RecordStore } from "@/server/store";

const log = createLogger("deck");

/** What to ask a buyer for before opening an RFQ. */
export const RFQ_GUIDANCE = [
  "Client name",
  "Delivery postcodes (e.g. BN1, BN2)",
  "Delivery days (e.g. Tue/Fri)",
  "Payment terms (e.g. 14 days)",
  "Line items: size (S/M/L/XL/Mixed), pack (tray/box), kind (retail/wholesale), qty/week, target price (optional)",
  "Any welfare or certification requirements",
] as const;

export type DeckView = {
  slug: string;
  facts: string[];
  progress: number;
  guidance: readonly string[];
};

type DeckDeps = {
  store?: RecordStore;
  config?: Pick<AppConfig, "deckSlug" | "storeMode">;
};

export type AddFactResult = { ok: true; facts: string[] } | { ok: false; error: "invalid_fact" };

export type SetProgressResult =
  | { ok: true; progress: number }
  | { ok: false; error: "invalid_number" | "deck_not_configured" };

function resolveDeckSlug(config: Pick<AppConfig, "deckSlug" | "storeMode">): string | null {
  if (!config.deckSlug && config.storeMode === "supabase") {
    warnOnce(
      "eggdesk:deck:no_slug",
      "[eggdesk deck] EGGDESK_DECK_SLUG is not set; the deck is disabled",
    );
  }
  return config.deckSlug;
}

/**
 * Facts, progress and RFQ guidance for the configured deck. Any other slug,
 * or no configured slug at all, resolves to null.
 */
export async function loadDeck(slug: string, deps?: DeckDeps): Promise<DeckView | null> {
  const config = deps?.config ?? getAppConfig();
  const deckSlug = resolveDeckSlug(config);
  if (!deckSlug || !secretsMatch(deckSlug, slug)) {
    return null;
  }

  const store = deps?.store ?? getRecordStore();
  const [facts, progress] = await Promise.all([store.listFacts(), store.getProgress(deckSlug)]);
  return { slug: deckSlug, facts, progress, guidance: RFQ_GUIDANCE };
}

export async function loadFactsAndProgress(
  deps?: DeckDeps,
): Promise<{ facts: string[]; progress: number | null }> {
  const config = deps?.config ?? getAppConfig();
  const store = deps?.store ?? getRecordStore();
  const deckSlug = resolveDeckSlug(config);
  const [facts, progress] = await Promise.all([
    store.listFacts(),
    deckSlug ? store.getProgress(deckSlug) : Promise.resolve(null),
  ]);
  return { facts, progress };
}

export async function addDeckFact(text: unknown, deps?: DeckDeps): Promise<AddFactResult> {
  const trimmed = typeof text === "string" ? text.trim() : "";
  if (!trimmed) {
    return { ok: false, error: "invalid_fact" };
  }
  const store = deps?.store ?? getRecordStore();
  await store.addFact(trimmed);
  log.info("fact added", { length: trimmed.length });
  return { ok: true, facts: await store.listFacts() };
}

export async function setDeckProgress(value: unknown, deps?: DeckDeps): Promise<SetProgressResult> {
  const config = deps?.config ?? getAppConfig();
  const deckSlug = resolveDeckSlug(config);
  if (!deckSlug) {
    return { ok: false, error: "deck_not_configured" };
  }

  const numeric = toFiniteNumber(value);
  if (numeric === null) {
    return { ok: false, error: "invalid_number" };
  }

  const store = deps?.store ?? getRecordStore();
  const progress = await store.setProgress(deckSlug, numeric);
  log.info("progress set", { progress });
  return { ok: true, progress };
}
