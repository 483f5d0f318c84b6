import type { SupplierDraft } from "@/lib/supplierInput";
import type { QuoteRecord, RfqRecord, SupplierRecord } from "@/types/eggs";

export type NewRfqFields = Omit<RfqRecord, "id" | "shareToken" | "createdAt">;

export type NewQuoteFields = Omit<QuoteRecord, "id" | "createdAt">;

/**
 * Persistence boundary for every service. Implementations throw
 * `RecordStoreError` when the backing store fails; "not found" is `null`.
 */
export interface RecordStore {
  getSupplier(id: string): Promise<SupplierRecord | null>;
  /** Ordered by name. */
  listSuppliers(): Promise<SupplierRecord[]>;
  /** Updates when `input.id` is set, inserts otherwise. Resolves to the row id. */
  saveSupplier(input: SupplierDraft): Promise<string>;

  getRfq(id: string): Promise<RfqRecord | null>;
  /** Assigns the share token and creation time. */
  createRfq(fields: NewRfqFields): Promise<RfqRecord>;

  /** Most recent first. */
  listQuotes(rfqId: string): Promise<QuoteRecord[]>;
  addQuote(fields: NewQuoteFields): Promise<string>;

  /** Most recent first. */
  listFacts(): Promise<string[]>;
  addFact(text: string): Promise<void>;

  getProgress(deckSlug: string): Promise<number>;
  /** Resolves to the stored (clamped) value. */
  setProgress(deckSlug: string, value: number): Promise<number>;
}
