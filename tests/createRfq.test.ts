import test from "node:test";
import assert from "node:assert/strict";

import { createRfq } from "@/server/rfqs/createRfq";
import { MemoryRecordStore } from "@/server/store/memoryStore";

function setup() {
  const store = new MemoryRecordStore({
    now: () => new Date("2026-03-02T10:00:00.000Z"),
    shareToken: () => "test-share-token",
  });
  let counter = 0;
  const lineItemKey = () => {
    counter += 1;
    return `li_test000${counter}`;
  };
  return { store, deps: { store, lineItemKey } };
}

const trayLine = { kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: "£2.40" };

test("createRfq fills request fields from the pasted text", async () => {
  const { store, deps } = setup();
  const result = await createRfq(
    {
      clientName: " Brighton Bakery ",
      metaText: "Organic eggs for BN1 cafe, deliver Tue and Fri, 14 days terms",
      lineItems: [trayLine],
    },
    deps,
  );

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.rfq, {
    id: "1",
    clientName: "Brighton Bakery",
    deliveryAreas: ["BN1", "BN"],
    welfare: "organic",
    deliveryDays: ["Tue", "Fri"],
    deliveryWindows: "Tue/Fri",
    paymentTerms: "14 days",
    notes: "Organic eggs for BN1 cafe, deliver Tue and Fri, 14 days terms",
    lineItems: [
      { key: "li_test0001", kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: "£2.40" },
    ],
    shareToken: "test-share-token",
    createdAt: "2026-03-02T10:00:00.000Z",
  });
  assert.deepEqual(await store.getRfq("1"), result.rfq);
});

test("structured fields override what the text scan found", async () => {
  const { deps } = setup();
  const result = await createRfq(
    {
      metaText: "Organic eggs for BN1 cafe, deliver Tue and Fri, 14 days terms",
      deliveryAreas: "rh1, po",
      welfare: "Free-Range",
      deliveryWindows: "monday wednesday",
      paymentTerms: "30 days",
      notes: "Call first",
      lineItems: JSON.stringify([trayLine, { ...trayLine, size: "XL", pack: "box", qtyWeek: 10 }]),
    },
    deps,
  );

  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.rfq.deliveryAreas, ["RH1", "PO"]);
  assert.equal(result.rfq.welfare, "free-range");
  assert.deepEqual(result.rfq.deliveryDays, ["Mon", "Wed"]);
  assert.equal(result.rfq.deliveryWindows, "Mon/Wed");
  assert.equal(result.rfq.paymentTerms, "30 days");
  assert.equal(result.rfq.notes, "Call first");
  assert.deepEqual(
    result.rfq.lineItems.map((item) => item.key),
    ["li_test0001", "li_test0002"],
  );
});

test("delivery text without recognizable days is kept as written", async () => {
  const { deps } = setup();
  const result = await createRfq({ deliveryWindows: "early mornings", lineItems: [trayLine] }, deps);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  assert.deepEqual(result.rfq.deliveryDays, []);
  assert.equal(result.rfq.deliveryWindows, "early mornings");
  assert.equal(result.rfq.clientName, null);
  assert.deepEqual(result.rfq.deliveryAreas, []);
});

test("invalid line items are rejected with per-line details", async () => {
  const { store, deps } = setup();
  const result = await createRfq({ lineItems: [{ ...trayLine, size: "Jumbo" }] }, deps);
  assert.deepEqual(result, {
    ok: false,
    error: "invalid_line_items",
    details: ['Line 1: size "Jumbo" must be one of S, M, L, XL, Mixed.'],
  });
  assert.equal(await store.getRfq("1"), null);
});

test("an RFQ needs at least one line item", async () => {
  const { deps } = setup();
  assert.deepEqual(await createRfq({ lineItems: [] }, deps), { ok: false, error: "missing_line_items" });
  assert.deepEqual(await createRfq({ clientName: "No items" }, deps), { ok: false, error: "missing_line_items" });
});
