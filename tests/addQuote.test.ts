import test from "node:test";
import assert from "node:assert/strict";

import { addQuote } from "@/server/quotes/addQuote";
import { MemoryRecordStore } from "@/server/store/memoryStore";

async function setup() {
  const store = new MemoryRecordStore({
    seedDemoSuppliers: true,
    now: () => new Date("2026-03-03T08:30:00.000Z"),
  });
  const rfq = await store.createRfq({
    clientName: "Brighton Bakery",
    deliveryAreas: ["BN1"],
    welfare: null,
    deliveryDays: [],
    deliveryWindows: null,
    paymentTerms: null,
    notes: "",
    lineItems: [{ key: "li_tray", kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: null }],
  });
  return { store, rfq };
}

const validQuote = { supplierId: "1", lineItemKey: "li_tray", unitPrice: "2.45" };

test("addQuote records a quote with optional fields defaulted", async () => {
  const { store, rfq } = await setup();
  const result = await addQuote(
    rfq.id,
    { ...validQuote, supplierId: 1, deliveryCost: "", leadTimeDays: "2", holdWeeks: "", remarks: " Lion stamped " },
    { store },
  );
  assert.deepEqual(result, { ok: true, quoteId: "1" });

  assert.deepEqual(await store.listQuotes(rfq.id), [
    {
      id: "1",
      rfqId: rfq.id,
      supplierId: "1",
      lineItemKey: "li_tray",
      unitPrice: 2.45,
      deliveryCost: 0,
      leadTimeDays: 2,
      holdWeeks: null,
      remarks: "Lion stamped",
      createdAt: "2026-03-03T08:30:00.000Z",
    },
  ]);
});

test("addQuote requires an existing RFQ", async () => {
  const { store } = await setup();
  assert.deepEqual(await addQuote("99", validQuote, { store }), { ok: false, error: "rfq_not_found" });
});

test("addQuote requires a positive unit price", async () => {
  const { store, rfq } = await setup();
  for (const unitPrice of [0, "-1", "abc", undefined]) {
    assert.deepEqual(await addQuote(rfq.id, { ...validQuote, unitPrice }, { store }), {
      ok: false,
      error: "invalid_unit_price",
      field: "unitPrice",
    });
  }
  assert.deepEqual(await store.listQuotes(rfq.id), []);
});

test("addQuote rejects negative or fractional counts", async () => {
  const { store, rfq } = await setup();
  assert.deepEqual(await addQuote(rfq.id, { ...validQuote, deliveryCost: "-5" }, { store }), {
    ok: false,
    error: "invalid_number",
    field: "deliveryCost",
  });
  assert.deepEqual(await addQuote(rfq.id, { ...validQuote, leadTimeDays: "1.5" }, { store }), {
    ok: false,
    error: "invalid_number",
    field: "leadTimeDays",
  });
  assert.deepEqual(await addQuote(rfq.id, { ...validQuote, holdWeeks: "soon" }, { store }), {
    ok: false,
    error: "invalid_number",
    field: "holdWeeks",
  });
});

test("addQuote requires a known supplier", async () => {
  const { store, rfq } = await setup();
  assert.deepEqual(await addQuote(rfq.id, { ...validQuote, supplierId: "99" }, { store }), {
    ok: false,
    error: "supplier_not_found",
  });
  assert.deepEqual(await addQuote(rfq.id, { ...validQuote, supplierId: undefined }, { store }), {
    ok: false,
    error: "supplier_not_found",
  });
});

test("addQuote only accepts line item keys of the RFQ", async () => {
  const { store, rfq } = await setup();
  for (const lineItemKey of ["li_missing", "0", undefined]) {
    assert.deepEqual(await addQuote(rfq.id, { ...validQuote, lineItemKey }, { store }), {
      ok: false,
      error: "unknown_line_item",
      field: "lineItemKey",
    });
  }
});
