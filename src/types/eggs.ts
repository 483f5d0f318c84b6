export const DELIVERY_DAYS = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type DeliveryDay = (typeof DELIVERY_DAYS)[number];

export const EGG_SIZES = ["S", "M", "L", "XL", "Mixed"] as const;
export type EggSize = (typeof EGG_SIZES)[number];

export const PACK_FORMATS = ["tray", "box"] as const;
export type PackFormat = (typeof PACK_FORMATS)[number];

export const LINE_ITEM_KINDS = ["retail", "wholesale"] as const;
export type LineItemKind = (typeof LINE_ITEM_KINDS)[number];

export type LineItem = {
  /**
   * Stable identifier assigned when the RFQ is created.
   * Quotes point at line items through this key, never through list position.
   */
  key: string;
  kind: LineItemKind;
  size: EggSize;
  pack: PackFormat;
  qtyWeek: number;
  /** Free text as the buyer wrote it, e.g. "£2.40/tray". */
  targetPrice: string | null;
};

export type RfqRecord = {
  id: string;
  clientName: string | null;
  deliveryAreas: string[];
  welfare: string | null;
  deliveryDays: DeliveryDay[];
  /** Human text the delivery days were read from, e.g. "Tue/Fri". */
  deliveryWindows: string | null;
  paymentTerms: string | null;
  notes: string;
  lineItems: LineItem[];
  shareToken: string;
  createdAt: string;
};

export type SupplierRecord = {
  id: string;
  name: string;
  welfare: string;
  certs: string;
  sizes: EggSize[];
  packFormats: PackFormat[];
  moqTrays: number | null;
  deliveryDays: DeliveryDay[];
  deliveryAreas: string[];
  email: string | null;
  phone: string | null;
  whatsapp: string | null;
  storyPdfUrl: string | null;
  priceBandLow: number | null;
  priceBandHigh: number | null;
  notes: string;
};

export type QuoteRecord = {
  id: string;
  rfqId: string;
  supplierId: string;
  lineItemKey: string;
  /** Currency per tray or per box, following the line item's pack. */
  unitPrice: number;
  /** Currency per delivery drop. */
  deliveryCost: number;
  leadTimeDays: number | null;
  holdWeeks: number | null;
  remarks: string;
  createdAt: string;
};
