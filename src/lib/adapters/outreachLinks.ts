type MailtoArgs = {
  to: string | readonly string[];
  subject?: string | null;
  body?: string | null;
};

function joinRecipients(value: MailtoArgs["to"]): string {
  const list = typeof value === "string" ? [value] : value;
  return list.map((item) => item.trim()).filter(Boolean).join(",");
}

/**
 * RFC 6068 mailto link. Values are percent-encoded (a space is `%20`; mail
 * clients read `+` literally) and body line breaks become CRLF.
 */
export function buildMailtoUrl({ to, subject, body }: MailtoArgs): string {
  const params: string[] = [];
  const trimmedSubject = subject?.trim() ?? "";
  if (trimmedSubject) {
    params.push(`subject=${encodeURIComponent(trimmedSubject)}`);
  }
  const trimmedBody = body?.trim() ?? "";
  if (trimmedBody) {
    params.push(`body=${encodeURIComponent(trimmedBody.replace(/\r?\n/g, "\r\n"))}`);
  }
  const recipients = joinRecipients(to);
  return params.length > 0 ? `mailto:${recipients}?${params.join("&")}` : `mailto:${recipients}`;
}

export const DEFAULT_WHATSAPP_COUNTRY_CODE = "44";

/**
 * wa.me wants the number in international form without "+" or spaces.
 * A national number with a leading 0 gets the default country code.
 */
export function buildWhatsappUrl(
  number: string | null | undefined,
  text: string | null | undefined,
  options?: { defaultCountryCode?: string },
): string | null {
  let digits = (number ?? "").replace(/\D+/g, "");
  if (!digits) return null;
  if (digits.startsWith("0")) {
    const countryCode = (options?.defaultCountryCode ?? DEFAULT_WHATSAPP_COUNTRY_CODE).replace(/\D+/g, "");
    digits = `${countryCode}${digits.slice(1)}`;
  }
  const message = typeof text === "string" ? text.trim() : "";
  return message
    ? `https://wa.me/${digits}?text=${encodeURIComponent(message)}`
    : `https://wa.me/${digits}`;
}

export function buildTelUrl(phone: string | null | undefined): string | null {
  const trimmed = (phone ?? "").trim();
  if (!trimmed) return null;
  const dialable = trimmed.replace(/[^\d+]/g, "");
  return dialable ? `tel:${dialable}` : null;
}
