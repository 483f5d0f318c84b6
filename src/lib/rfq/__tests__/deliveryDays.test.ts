import test from "node:test";
import assert from "node:assert/strict";

import { areaCoveredBy, parseDeliveryAreas } from "@/lib/rfq/areas";
import { countSharedDays, formatDeliveryDays, parseDeliveryDays } from "@/lib/rfq/deliveryDays";

test("parseDeliveryDays accepts separators, full names and any case", () => {
  assert.deepEqual(parseDeliveryDays("Tue/Fri"), ["Tue", "Fri"]);
  assert.deepEqual(parseDeliveryDays("monday, WEDNESDAY thu"), ["Mon", "Wed", "Thu"]);
  assert.deepEqual(parseDeliveryDays(["Fri", "fri", "Tue,Fri"]), ["Fri", "Tue"]);
});

test("parseDeliveryDays drops unknown tokens", () => {
  assert.deepEqual(parseDeliveryDays("mornings, Tu, Sat"), ["Sat"]);
  assert.deepEqual(parseDeliveryDays(null), []);
});

test("formatDeliveryDays joins with a slash and is null when empty", () => {
  assert.equal(formatDeliveryDays(["Tue", "Fri"]), "Tue/Fri");
  assert.equal(formatDeliveryDays([]), null);
});

test("countSharedDays counts each shared day once", () => {
  assert.equal(countSharedDays(["Tue", "Fri"], ["Mon", "Tue", "Fri"]), 2);
  assert.equal(countSharedDays(["Tue", "Tue"], ["Tue"]), 1);
  assert.equal(countSharedDays([], ["Tue"]), 0);
});

test("parseDeliveryAreas upper-cases and de-duplicates prefixes", () => {
  assert.deepEqual(parseDeliveryAreas(" bn1, BN1;rh "), ["BN1", "RH"]);
  assert.deepEqual(parseDeliveryAreas(["bn", "po, bn"]), ["BN", "PO"]);
});

test("areaCoveredBy matches supplier prefixes against RFQ area codes", () => {
  assert.equal(areaCoveredBy(["BN"], ["BN1"]), true);
  assert.equal(areaCoveredBy([" bn "], ["BN1"]), true);
  assert.equal(areaCoveredBy(["BN1"], ["BN"]), false);
  assert.equal(areaCoveredBy(["RH"], ["BN1", "PO2"]), false);
  assert.equal(areaCoveredBy([], ["BN1"]), false);
  assert.equal(areaCoveredBy(["  "], ["BN1"]), false);
});
