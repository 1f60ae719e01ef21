// src/util/phone.ts

export const normalizePhone = (raw?: string | null): string | null => {
  if (!raw) return null;
  const digits = String(raw).trim().replace(/[^\d]/g, "");
  // require at least 7 digits to consider it phone-like
  return digits.length >= 7 ? digits : null;
};

export function buildWaMeLink(phone: string, text?: string) {
  const digits = String(phone).replace(/[^\d]/g, ""); // wa.me takes digits only
  if (!text) return `https://wa.me/${digits}`;
  return `https://wa.me/${digits}?text=${encodeURIComponent(text)}`;
}
