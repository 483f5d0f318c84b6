import test from "node:test";
import assert from "node:assert/strict";

import { MemoryRecordStore } from "@/server/store/memoryStore";
import { importSuppliersCsv, reseedDemoSuppliers } from "@/server/suppliers/importSuppliers";
import { saveSupplier } from "@/server/suppliers/saveSupplier";

test("saveSupplier inserts a new supplier from form-style input", async () => {
  const store = new MemoryRecordStore();
  const result = await saveSupplier(
    {
      name: " Downs Poultry ",
      welfare: "free-range",
      sizes: "M, L",
      pack_formats: "tray",
      moq_trays: "20",
      delivery_days: "Tue/Thu",
      delivery_postcodes: "bn, rh",
      price_band_low: "2.00",
      price_band_high: "2.60",
      email: "orders@example.com",
    },
    { store },
  );

  assert.deepEqual(result, { ok: true, supplierId: "1", created: true });
  const saved = await store.getSupplier("1");
  assert.equal(saved?.name, "Downs Poultry");
  assert.deepEqual(saved?.sizes, ["M", "L"]);
  assert.deepEqual(saved?.deliveryDays, ["Tue", "Thu"]);
  assert.deepEqual(saved?.deliveryAreas, ["BN", "RH"]);
  assert.equal(saved?.moqTrays, 20);
  assert.equal(saved?.priceBandLow, 2);
  assert.equal(saved?.phone, null);
});

test("saveSupplier updates when an id is given", async () => {
  const store = new MemoryRecordStore({ seedDemoSuppliers: true });
  const result = await saveSupplier({ id: "2", name: "Marshwood Farm", welfare: "organic", notes: "Moved to Mondays" }, { store });
  assert.deepEqual(result, { ok: true, supplierId: "2", created: false });
  assert.equal((await store.getSupplier("2"))?.notes, "Moved to Mondays");
});

test("saveSupplier rejects unknown ids and invalid fields", async () => {
  const store = new MemoryRecordStore();
  assert.deepEqual(await saveSupplier({ id: "42", name: "Ghost Farm" }, { store }), {
    ok: false,
    error: "supplier_not_found",
  });
  assert.deepEqual(
    await saveSupplier({ name: "", moqTrays: 2.5, priceBandLow: 3, priceBandHigh: 2 }, { store }),
    {
      ok: false,
      error: "invalid_supplier",
      details: [
        "Name is required.",
        "MOQ trays must be a whole number.",
        "Price band low must not exceed price band high.",
      ],
    },
  );
  assert.deepEqual(await store.listSuppliers(), []);
});

test("importSuppliersCsv saves valid rows and reports the rest", async () => {
  const store = new MemoryRecordStore({ seedDemoSuppliers: true });
  const csv = [
    "id,name,sizes,pack_formats,delivery_postcodes",
    ",Downs Poultry,L,tray,BN",
    "1,Orchard Eggs,L,\"tray,box\",\"BN,RH\"",
    "77,Ghost Farm,L,tray,BN",
    ",Broken Farm,Jumbo,tray,BN",
  ].join("\n");

  const result = await importSuppliersCsv(csv, { store });
  assert.deepEqual(result, {
    ok: true,
    created: 1,
    updated: 1,
    rowErrors: [
      { line: 4, name: "Ghost Farm", errors: ['Unknown supplier id "77".'] },
      { line: 5, name: "Broken Farm", errors: ['Unknown size "Jumbo".'] },
    ],
  });
  assert.deepEqual(
    (await store.listSuppliers()).map((supplier) => supplier.name),
    ["Downs Poultry", "Marshwood Farm", "Orchard Eggs"],
  );
  assert.deepEqual((await store.getSupplier("1"))?.sizes, ["L"]);
});

test("importSuppliersCsv rejects a file without a usable header", async () => {
  const store = new MemoryRecordStore();
  assert.deepEqual(await importSuppliersCsv("", { store }), {
    ok: false,
    error: "invalid_csv",
    details: ["CSV is empty."],
  });
});

test("reseedDemoSuppliers only restores demo suppliers missing by name", async () => {
  const store = new MemoryRecordStore();
  await saveSupplier({ name: "orchard eggs", sizes: "L" }, { store });

  assert.deepEqual(await reseedDemoSuppliers({ store }), { ok: true, created: 1 });
  assert.deepEqual(
    (await store.listSuppliers()).map((supplier) => supplier.name),
    ["Marshwood Farm", "orchard eggs"],
  );
  assert.deepEqual(await reseedDemoSuppliers({ store }), { ok: true, created: 0 });
});
