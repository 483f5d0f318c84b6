import test from "node:test";
import assert from "node:assert/strict";

import { loadRfqMatches } from "@/server/matching/rfqMatches";
import { MemoryRecordStore } from "@/server/store/memoryStore";
import type { NewRfqFields } from "@/server/store/types";

const config = { currency: "GBP", whatsappCountryCode: "44" };

const bakeryRfq: NewRfqFields = {
  clientName: "Brighton Bakery",
  deliveryAreas: ["BN1"],
  welfare: null,
  deliveryDays: ["Tue", "Fri"],
  deliveryWindows: "Tue/Fri",
  paymentTerms: "14 days",
  notes: "",
  lineItems: [{ key: "li_tray", kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: "£2.40" }],
};

test("loadRfqMatches ranks the demo directory and builds outreach per supplier", async () => {
  const store = new MemoryRecordStore({ seedDemoSuppliers: true });
  const rfq = await store.createRfq(bakeryRfq);

  const result = await loadRfqMatches(rfq.id, { store, config });
  assert.equal(result.ok, true);
  if (!result.ok) return;

  assert.deepEqual(
    result.matches.map((match) => [match.supplier.name, match.score]),
    [
      ["Orchard Eggs", 16],
      ["Marshwood Farm", 12],
    ],
  );
  assert.deepEqual(result.matches[0]?.breakdown, { coverage: 10, deliveryDays: 4, priceBand: 2, targetPrice: 2.4 });

  const orchard = result.matches[0]?.outreach;
  assert.equal(orchard?.subject, "RFQ #1 — 120 tray / week");
  assert.equal(orchard?.body.split("\n")[0], "Hi Orchard Eggs,");
  assert.equal(orchard?.links.phone, "tel:+447700900111");
  assert.equal(orchard?.links.story, "https://example.com/orchard.pdf");
  assert.equal(
    orchard?.links.whatsapp,
    `https://wa.me/447700900111?text=${encodeURIComponent(orchard?.body ?? "")}`,
  );

  assert.equal(result.outreach.body.split("\n")[0], "Hi there,");
});

test("loadRfqMatches applies the welfare requirement", async () => {
  const store = new MemoryRecordStore({ seedDemoSuppliers: true });
  const rfq = await store.createRfq({ ...bakeryRfq, welfare: "organic" });

  const result = await loadRfqMatches(rfq.id, { store, config });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(
    result.matches.map((match) => match.supplier.name),
    ["Marshwood Farm"],
  );
});

test("loadRfqMatches returns an empty list when nobody delivers to the area", async () => {
  const store = new MemoryRecordStore({ seedDemoSuppliers: true });
  const rfq = await store.createRfq({ ...bakeryRfq, deliveryAreas: ["EC1"] });

  const result = await loadRfqMatches(rfq.id, { store, config });
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.matches, []);
});

test("loadRfqMatches reports an unknown RFQ", async () => {
  const store = new MemoryRecordStore();
  assert.deepEqual(await loadRfqMatches("404", { store, config }), { ok: false, error: "rfq_not_found" });
});
