import test from "node:test";
import assert from "node:assert/strict";

import { buildMailtoUrl, buildTelUrl, buildWhatsappUrl } from "@/lib/adapters/outreachLinks";
import { buildRfqOutreachMessage, buildSupplierOutreach } from "@/lib/adapters/rfqOutreach";

const rfq: Parameters<typeof buildRfqOutreachMessage>[0] = {
  id: "7",
  clientName: "Brighton Bakery",
  deliveryAreas: ["BN1", "BN2"],
  deliveryWindows: "Tue/Fri",
  notes: "Lion stamped only",
  lineItems: [
    { key: "li_a", kind: "wholesale", size: "L", pack: "tray", qtyWeek: 120, targetPrice: "£2.40" },
    { key: "li_b", kind: "retail", size: "M", pack: "box", qtyWeek: 30, targetPrice: null },
  ],
};

const expectedBody = [
  "Hi Orchard Eggs,",
  "",
  "We have a buyer request:",
  "Client: Brighton Bakery",
  "Areas: BN1,BN2",
  "Delivery: Tue/Fri",
  "Items:",
  "- wholesale L tray x 120/week (target £2.40)",
  "- retail M box x 30/week",
  "",
  "Notes: Lion stamped only",
  "",
  "Please reply with unit £/tray or box and delivery £/drop, lead time and hold period.",
].join("\n");

test("buildRfqOutreachMessage lists the request and the first item in the subject", () => {
  const message = buildRfqOutreachMessage(rfq, "Orchard Eggs");
  assert.equal(message.subject, "RFQ #7 — 120 tray / week");
  assert.equal(message.body, expectedBody);
});

test("buildRfqOutreachMessage fills gaps with dashes", () => {
  const message = buildRfqOutreachMessage(
    { id: "8", clientName: null, deliveryAreas: [], deliveryWindows: null, notes: "", lineItems: [] },
    null,
    { currencySymbol: "€" },
  );
  assert.equal(message.subject, "RFQ #8");
  assert.equal(
    message.body,
    [
      "Hi there,",
      "",
      "We have a buyer request:",
      "Client: -",
      "Areas: -",
      "Delivery: -",
      "Items:",
      "- Not specified",
      "",
      "Notes: -",
      "",
      "Please reply with unit €/tray or box and delivery €/drop, lead time and hold period.",
    ].join("\n"),
  );
});

test("buildSupplierOutreach links every channel the supplier has", () => {
  const outreach = buildSupplierOutreach(rfq, {
    name: "Orchard Eggs",
    email: "orders@example.com",
    phone: "+44 7700 900111",
    whatsapp: "07700 900111",
    storyPdfUrl: " https://example.com/orchard.pdf ",
  });

  assert.equal(outreach.links.whatsapp, `https://wa.me/447700900111?text=${encodeURIComponent(expectedBody)}`);
  assert.equal(outreach.links.phone, "tel:+447700900111");
  assert.equal(outreach.links.story, "https://example.com/orchard.pdf");

  assert.ok(outreach.links.email);
  const mailto = new URL(outreach.links.email);
  assert.equal(mailto.protocol, "mailto:");
  assert.equal(mailto.pathname, "orders@example.com");
  assert.equal(mailto.searchParams.get("subject"), "RFQ #7 — 120 tray / week");
  assert.equal(mailto.searchParams.get("body"), expectedBody.replace(/\n/g, "\r\n"));
});

test("buildSupplierOutreach leaves missing channels null", () => {
  const outreach = buildSupplierOutreach(rfq, {
    name: "Quiet Farm",
    email: null,
    phone: null,
    whatsapp: "",
    storyPdfUrl: null,
  });
  assert.deepEqual(outreach.links, { email: null, whatsapp: null, phone: null, story: null });
});

test("buildWhatsappUrl keeps digits and applies the country code to national numbers", () => {
  assert.equal(buildWhatsappUrl("+44 7700 900222", ""), "https://wa.me/447700900222");
  assert.equal(buildWhatsappUrl("0612 345 678", "hi", { defaultCountryCode: "+31" }), "https://wa.me/31612345678?text=hi");
  assert.equal(buildWhatsappUrl("n/a", "hi"), null);
});

test("buildMailtoUrl joins recipients and skips empty parameters", () => {
  assert.equal(buildMailtoUrl({ to: ["a@example.com", " b@example.com "] }), "mailto:a@example.com,b@example.com");
  assert.equal(buildMailtoUrl({ to: "a@example.com", subject: "  ", body: "" }), "mailto:a@example.com");
});

test("buildMailtoUrl percent-encodes spaces instead of using plus signs", () => {
  assert.equal(
    buildMailtoUrl({ to: "orders@example.com", subject: "RFQ #1 — 120 tray / week", body: "Hi there,\nTrays+boxes" }),
    "mailto:orders@example.com?subject=RFQ%20%231%20%E2%80%94%20120%20tray%20%2F%20week&body=Hi%20there%2C%0D%0ATrays%2Bboxes",
  );
});

test("buildTelUrl strips formatting", () => {
  assert.equal(buildTelUrl("(01273) 555-010"), "tel:01273555010");
  assert.equal(buildTelUrl("  "), null);
});
