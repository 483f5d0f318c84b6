import test from "node:test";
import assert from "node:assert/strict";

import { buildClientComparison, loadRfqComparison } from "@/server/comparison/rfqComparison";
import { MemoryRecordStore } from "@/server/store/memoryStore";

async function seededStore() {
  const store = new MemoryRecordStore({
    seedDemoSuppliers: true,
    now: () => new Date("2026-03-02T09:00:00.000Z"),
    shareToken: () => "share-token",
  });
  const rfq = await store.createRfq({
    clientName: "Brighton Bakery",
    deliveryAreas: ["BN1"],
    welfare: null,
    deliveryDays: [],
    deliveryWindows: null,
    paymentTerms: null,
    notes: "",
    lineItems: [
      { key: "li_tray", kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: null },
      { key: "li_box", kind: "retail", size: "M", pack: "box", qtyWeek: 60, targetPrice: null },
    ],
  });

  const quote = {
    rfqId: rfq.id,
    leadTimeDays: null,
    holdWeeks: null,
    remarks: "",
  };
  // Suppliers "1" and "2" are Orchard Eggs and Marshwood Farm.
  await store.addQuote({ ...quote, supplierId: "1", lineItemKey: "li_tray", unitPrice: 2.3, deliveryCost: 10 });
  await store.addQuote({ ...quote, supplierId: "2", lineItemKey: "li_tray", unitPrice: 2.25, deliveryCost: 30 });
  await store.addQuote({ ...quote, supplierId: "1", lineItemKey: "li_box", unitPrice: 1.8, deliveryCost: 0 });
  await store.addQuote({ ...quote, supplierId: "2", lineItemKey: "li_gone", unitPrice: 2, deliveryCost: 5 });
  return { store, rfq };
}

test("loadRfqComparison ranks quotes by landed cost per unit", async () => {
  const { store, rfq } = await seededStore();
  const result = await loadRfqComparison(rfq.id, { store });
  assert.equal(result.ok, true);
  if (!result.ok) return;

  assert.deepEqual(
    result.rows.map((row) => [row.supplierName, row.lineItemKey, row.deliveryPerUnit, row.landedPerUnit]),
    [
      ["Orchard Eggs", "li_box", 0, 1.8],
      ["Marshwood Farm", "li_gone", 0, 2],
      ["Orchard Eggs", "li_tray", 0.0833, 2.3833],
      ["Marshwood Farm", "li_tray", 0.25, 2.5],
    ],
  );

  const orphan = result.rows[1];
  assert.equal(orphan?.lineItemResolved, false);
  assert.equal(orphan?.qtyWeek, 0);
  assert.equal(orphan?.lineItemLabel, "");

  const cheapestTray = result.rows[2];
  assert.equal(cheapestTray?.lineItemResolved, true);
  assert.equal(cheapestTray?.lineItemLabel, "wholesale L tray");
  assert.equal(cheapestTray?.storyPdfUrl, "https://example.com/orchard.pdf");
  assert.equal(cheapestTray?.createdAt, "2026-03-02T09:00:00.000Z");
});

test("loadRfqComparison reports an unknown RFQ", async () => {
  const store = new MemoryRecordStore();
  assert.deepEqual(await loadRfqComparison("9", { store }), { ok: false, error: "rfq_not_found" });
});

test("buildClientComparison hides supplier ids and formats money", async () => {
  const { store, rfq } = await seededStore();
  const view = await buildClientComparison(rfq, { store, config: { currency: "GBP" } });

  assert.equal(view.clientName, "Brighton Bakery");
  assert.equal(view.currency, "GBP");
  assert.equal(view.rows.length, 4);
  assert.deepEqual(view.rows[2], {
    supplierName: "Orchard Eggs",
    lineItemLabel: "wholesale L tray",
    unitPrice: 2.3,
    deliveryCost: 10,
    landedPerUnit: 2.3833,
    storyPdfUrl: "https://example.com/orchard.pdf",
    display: { unitPrice: "£2.30", deliveryCost: "£10.00", landedPerUnit: "£2.3833" },
  });
  assert.deepEqual(view.rows[0]?.display, { unitPrice: "£1.80", deliveryCost: "£0.00", landedPerUnit: "£1.80" });
});

test("buildClientComparison is empty before any quote arrives", async () => {
  const store = new MemoryRecordStore();
  const rfq = await store.createRfq({
    clientName: null,
    deliveryAreas: [],
    welfare: null,
    deliveryDays: [],
    deliveryWindows: null,
    paymentTerms: null,
    notes: "",
    lineItems: [],
  });
  const view = await buildClientComparison(rfq, { store, config: { currency: "EUR" } });
  assert.deepEqual(view, { clientName: null, currency: "EUR", rows: [] });
});
