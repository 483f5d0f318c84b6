import { clampPercent } from "@/lib/numbers";
import type { SupabaseServerClient } from "@/lib/supabaseServer";
import type { SupplierDraft } from "@/lib/supplierInput";
import {
  isMissingTableOrColumnError,
  isRowLevelSecurityDeniedError,
  serializeSupabaseError,
  warnOnce,
} from "@/server/db/schemaErrors";
import { RecordStoreError } from "@/server/errors";
import { createLogger } from "@/server/logging";
import { generateShareToken } from "@/server/rfqs/tokens";
import {
  DECK_PROGRESS_TABLE,
  FACTS_TABLE,
  QUOTES_TABLE,
  QUOTE_COLUMNS,
  RFQS_TABLE,
  RFQ_COLUMNS,
  SUPPLIERS_TABLE,
  SUPPLIER_COLUMNS,
  quoteFromRow,
  quoteToRow,
  rfqFromRow,
  rfqToRow,
  supplierFromRow,
  supplierToRow,
  type DeckProgressRow,
  type FactRow,
  type QuoteRow,
  type RfqRow,
  type SupplierRow,
} from "@/server/store/rows";
import type { NewQuoteFields, NewRfqFields, RecordStore } from "@/server/store/types";
import type { QuoteRecord, RfqRecord, SupplierRecord } from "@/types/eggs";

const log = createLogger("store");

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Postgres rejects a malformed uuid outright; such ids cannot match a row.
function isUuid(id: string): boolean {
  return UUID_PATTERN.test(id);
}

/**
 * Postgres-backed store. Every failed call is logged with the serialized
 * PostgREST error and rethrown as `RecordStoreError`.
 */
export class SupabaseRecordStore implements RecordStore {
  constructor(private readonly client: SupabaseServerClient) {}

  private fail(operation: string, table: string, error: unknown): never {
    if (isMissingTableOrColumnError(error)) {
      warnOnce(
        `eggdesk:missing_schema:${table}`,
        `[eggdesk store] ${table} is missing; apply supabase/migrations before using the Supabase store`,
        { table, supabaseError: serializeSupabaseError(error) },
      );
    } else if (isRowLevelSecurityDeniedError(error)) {
      warnOnce(
        `eggdesk:rls_denied:${table}`,
        `[eggdesk store] ${table} denied by row-level security; the store needs the service role key`,
        { table, supabaseError: serializeSupabaseError(error) },
      );
    } else {
      log.error(`${operation} failed`, { table, supabaseError: serializeSupabaseError(error) });
    }
    throw new RecordStoreError(operation, error);
  }

  async getSupplier(id: string): Promise<SupplierRecord | null> {
    if (!isUuid(id)) return null;
    const { data, error } = await this.client
      .from(SUPPLIERS_TABLE)
      .select(SUPPLIER_COLUMNS)
      .eq("id", id)
      .maybeSingle<SupplierRow>();
    if (error) this.fail("getSupplier", SUPPLIERS_TABLE, error);
    return data ? supplierFromRow(data) : null;
  }

  async listSuppliers(): Promise<SupplierRecord[]> {
    const { data, error } = await this.client
      .from(SUPPLIERS_TABLE)
      .select(SUPPLIER_COLUMNS)
      .order("name", { ascending: true })
      .returns<SupplierRow[]>();
    if (error) this.fail("listSuppliers", SUPPLIERS_TABLE, error);
    return (data ?? []).map(supplierFromRow);
  }

  async saveSupplier(input: SupplierDraft): Promise<string> {
    const row = supplierToRow(input);

    if (input.id) {
      const { data, error } = await this.client
        .from(SUPPLIERS_TABLE)
        .update(row)
        .eq("id", input.id)
        .select("id")
        .maybeSingle<{ id: string }>();
      if (error) this.fail("saveSupplier", SUPPLIERS_TABLE, error);
      if (!data) {
        throw new RecordStoreError("saveSupplier", { message: `supplier ${input.id} does not exist` });
      }
      return String(data.id);
    }

    const { data, error } = await this.client
      .from(SUPPLIERS_TABLE)
      .insert(row)
      .select("id")
      .single<{ id: string }>();
    if (error || !data) this.fail("saveSupplier", SUPPLIERS_TABLE, error);
    return String(data.id);
  }

  async getRfq(id: string): Promise<RfqRecord | null> {
    if (!isUuid(id)) return null;
    const { data, error } = await this.client
      .from(RFQS_TABLE)
      .select(RFQ_COLUMNS)
      .eq("id", id)
      .maybeSingle<RfqRow>();
    if (error) this.fail("getRfq", RFQS_TABLE, error);
    return data ? rfqFromRow(data) : null;
  }

  async createRfq(fields: NewRfqFields): Promise<RfqRecord> {
    const { data, error } = await this.client
      .from(RFQS_TABLE)
      .insert(rfqToRow(fields, { shareToken: generateShareToken() }))
      .select(RFQ_COLUMNS)
      .single<RfqRow>();
    if (error || !data) this.fail("createRfq", RFQS_TABLE, error);
    return rfqFromRow(data);
  }

  async listQuotes(rfqId: string): Promise<QuoteRecord[]> {
    if (!isUuid(rfqId)) return [];
    const { data, error } = await this.client
      .from(QUOTES_TABLE)
      .select(QUOTE_COLUMNS)
      .eq("rfq_id", rfqId)
      .order("created_at", { ascending: false })
      .returns<QuoteRow[]>();
    if (error) this.fail("listQuotes", QUOTES_TABLE, error);
    return (data ?? []).map(quoteFromRow);
  }

  async addQuote(fields: NewQuoteFields): Promise<string> {
    const { data, error } = await this.client
      .from(QUOTES_TABLE)
      .insert(quoteToRow(fields))
      .select("id")
      .single<{ id: string }>();
    if (error || !data) this.fail("addQuote", QUOTES_TABLE, error);
    return String(data.id);
  }

  async listFacts(): Promise<string[]> {
    const { data, error } = await this.client
      .from(FACTS_TABLE)
      .select("text")
      .order("id", { ascending: false })
      .returns<FactRow[]>();
    if (error) this.fail("listFacts", FACTS_TABLE, error);
    return (data ?? []).flatMap((row) => (row.text ? [row.text] : []));
  }

  async addFact(text: string): Promise<void> {
    const { error } = await this.client.from(FACTS_TABLE).insert({ text });
    if (error) this.fail("addFact", FACTS_TABLE, error);
  }

  async getProgress(deckSlug: string): Promise<number> {
    const { data, error } = await this.client
      .from(DECK_PROGRESS_TABLE)
      .select("slug,progress_value")
      .eq("slug", deckSlug)
      .maybeSingle<DeckProgressRow>();
    if (error) this.fail("getProgress", DECK_PROGRESS_TABLE, error);
    return clampPercent(data?.progress_value ?? 0);
  }

  async setProgress(deckSlug: string, value: number): Promise<number> {
    const clamped = clampPercent(value);
    const { error } = await this.client
      .from(DECK_PROGRESS_TABLE)
      .upsert(
        { slug: deckSlug, progress_value: clamped, updated_at: new Date().toISOString() },
        { onConflict: "slug" },
      );
    if (error) this.fail("setProgress", DECK_PROGRESS_TABLE, error);
    return clamped;
  }
}
