import { randomBytes, timingSafeEqual } from "node:crypto";

const SHARE_TOKEN_BYTES = 16;
const LINE_ITEM_KEY_BYTES = 4;

export function generateShareToken(): string {
  return randomBytes(SHARE_TOKEN_BYTES).toString("base64url");
}

export function generateLineItemKey(): string {
  return `li_${randomBytes(LINE_ITEM_KEY_BYTES).toString("hex")}`;
}

/** Constant-time comparison; length mismatch is a plain `false`. */
export function secretsMatch(expected: string, provided: string | null | undefined): boolean {
  if (typeof provided !== "string" || provided.length === 0 || expected.length === 0) {
    return false;
  }
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(provided, "utf8");
  if (a.length !== b.length) return false;
  return timingSafeEqual(a, b);
}
