import { clampPercent } from "@/lib/numbers";
import type { SupplierDraft } from "@/lib/supplierInput";
import { RecordStoreError } from "@/server/errors";
import { generateShareToken } from "@/server/rfqs/tokens";
import { loadDemoSupplierDrafts } from "@/server/store/demoSuppliers";
import type { NewQuoteFields, NewRfqFields, RecordStore } from "@/server/store/types";
import type { QuoteRecord, RfqRecord, SupplierRecord } from "@/types/eggs";

export type MemoryRecordStoreOptions = {
  /** Seed the demo supplier directory on creation. */
  seedDemoSuppliers?: boolean;
  now?: () => Date;
  shareToken?: () => string;
};

type CounterKind = "supplier" | "rfq" | "quote";

function compareByName(a: SupplierRecord, b: SupplierRecord): number {
  const left = a.name.toLowerCase();
  const right = b.name.toLowerCase();
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function cloneRfq(rfq: RfqRecord): RfqRecord {
  return {
    ...rfq,
    deliveryAreas: [...rfq.deliveryAreas],
    deliveryDays: [...rfq.deliveryDays],
    lineItems: rfq.lineItems.map((item) => ({ ...item })),
  };
}

function cloneSupplier(supplier: SupplierRecord): SupplierRecord {
  return {
    ...supplier,
    sizes: [...supplier.sizes],
    packFormats: [...supplier.packFormats],
    deliveryDays: [...supplier.deliveryDays],
    deliveryAreas: [...supplier.deliveryAreas],
  };
}

/**
 * In-process record store used in demo mode (no Supabase credentials) and by
 * the tests. Ids are sequential per record type; records are copied on the
 * way in and out so callers never share state with the store.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly suppliers = new Map<string, SupplierRecord>();
  private readonly rfqs = new Map<string, RfqRecord>();
  private readonly quotes: QuoteRecord[] = [];
  private readonly facts: string[] = [];
  private readonly progress = new Map<string, number>();
  private readonly counters: Record<CounterKind, number> = { supplier: 0, rfq: 0, quote: 0 };
  private readonly now: () => Date;
  private readonly shareToken: () => string;

  constructor(options: MemoryRecordStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.shareToken = options.shareToken ?? generateShareToken;
    if (options.seedDemoSuppliers) {
      for (const draft of loadDemoSupplierDrafts()) {
        this.insertSupplier(draft);
      }
    }
  }

  private nextId(kind: CounterKind): string {
    this.counters[kind] += 1;
    return String(this.counters[kind]);
  }

  private insertSupplier(input: SupplierDraft): string {
    const id = this.nextId("supplier");
    this.suppliers.set(id, cloneSupplier({ ...input, id }));
    return id;
  }

  async getSupplier(id: string): Promise<SupplierRecord | null> {
    const supplier = this.suppliers.get(id);
    return supplier ? cloneSupplier(supplier) : null;
  }

  async listSuppliers(): Promise<SupplierRecord[]> {
    return Array.from(this.suppliers.values()).map(cloneSupplier).sort(compareByName);
  }

  async saveSupplier(input: SupplierDraft): Promise<string> {
    if (!input.id) {
      return this.insertSupplier(input);
    }
    if (!this.suppliers.has(input.id)) {
      throw new RecordStoreError("saveSupplier", { message: `supplier ${input.id} does not exist` });
    }
    this.suppliers.set(input.id, cloneSupplier({ ...input, id: input.id }));
    return input.id;
  }

  async getRfq(id: string): Promise<RfqRecord | null> {
    const rfq = this.rfqs.get(id);
    return rfq ? cloneRfq(rfq) : null;
  }

  async createRfq(fields: NewRfqFields): Promise<RfqRecord> {
    const rfq: RfqRecord = cloneRfq({
      ...fields,
      id: this.nextId("rfq"),
      shareToken: this.shareToken(),
      createdAt: this.now().toISOString(),
    });
    this.rfqs.set(rfq.id, rfq);
    return cloneRfq(rfq);
  }

  async listQuotes(rfqId: string): Promise<QuoteRecord[]> {
    return this.quotes
      .filter((quote) => quote.rfqId === rfqId)
      .reverse()
      .map((quote) => ({ ...quote }));
  }

  async addQuote(fields: NewQuoteFields): Promise<string> {
    const id = this.nextId("quote");
    this.quotes.push({ ...fields, id, createdAt: this.now().toISOString() });
    return id;
  }

  async listFacts(): Promise<string[]> {
    return [...this.facts].reverse();
  }

  async addFact(text: string): Promise<void> {
    this.facts.push(text);
  }

  async getProgress(deckSlug: string): Promise<number> {
    return this.progress.get(deckSlug) ?? 0;
  }

  async setProgress(deckSlug: string, value: number): Promise<number> {
    const clamped = clampPercent(value);
    this.progress.set(deckSlug, clamped);
    return clamped;
  }
}
