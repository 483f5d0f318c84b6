import { createSupabaseServerClient } from "@/lib/supabaseServer";
import { getAppConfig } from "@/server/config";
import { debugOnce } from "@/server/db/schemaErrors";
import { MemoryRecordStore } from "@/server/store/memoryStore";
import { SupabaseRecordStore } from "@/server/store/supabaseStore";
import type { RecordStore } from "@/server/store/types";

export type { NewQuoteFields, NewRfqFields, RecordStore } from "@/server/store/types";

let activeStore: RecordStore | null = null;

/**
 * Process-wide store. Supabase when credentials are configured, otherwise a
 * memory store seeded with the demo suppliers.
 */
export function getRecordStore(): RecordStore {
  if (activeStore) return activeStore;

  const config = getAppConfig();
  if (config.storeMode === "supabase") {
    activeStore = new SupabaseRecordStore(createSupabaseServerClient(config));
  } else {
    debugOnce(
      "eggdesk:store:memory",
      "[eggdesk store] Supabase credentials missing; using the in-memory demo store",
    );
    activeStore = new MemoryRecordStore({ seedDemoSuppliers: true });
  }
  return activeStore;
}

/** Swap the process-wide store (tests); `null` rebuilds it from config on next use. */
export function setRecordStore(store: RecordStore | null): void {
  activeStore = store;
}
