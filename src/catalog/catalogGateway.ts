// src/catalog/catalogGateway.ts
import type { CatalogOffer } from "../types";

export type QueryOptions = {
  signal?: AbortSignal;
};

/**
 * Read-only access to vendor offers.
 *
 * `query` returns every offer whose category (or item name) contains the
 * hint, restricted by `specification` when given. Matching is
 * case-insensitive and ignores accents.
 */
export interface CatalogGateway {
  query(categoryHint: string, specification?: string | null, opts?: QueryOptions): Promise<CatalogOffer[]>;
  listCategories(opts?: QueryOptions): Promise<string[]>;
  getVendorPhone(vendorId: string, opts?: QueryOptions): Promise<string | null>;
}

// ─────────────────────────────
// Matching helpers (shared by every gateway)
// ─────────────────────────────

export function normalizeText(text: string | null | undefined): string {
  if (!text) return "";
  return String(text)
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim();
}

export function matchesCategory(offer: CatalogOffer, categoryHint: string): boolean {
  const hint = normalizeText(categoryHint);
  if (!hint) return false;
  return normalizeText(offer.category).includes(hint) || normalizeText(offer.item_name).includes(hint);
}

export function hasExactTag(offer: CatalogOffer, specification: string): boolean {
  const spec = normalizeText(specification);
  return offer.specification_tags.some((t) => normalizeText(t) === spec);
}

export function matchesSpecification(offer: CatalogOffer, specification: string): boolean {
  const spec = normalizeText(specification);
  if (!spec) return true;
  if (normalizeText(offer.item_name).includes(spec)) return true;
  return offer.specification_tags.some((t) => normalizeText(t).includes(spec));
}

/**
 * Specification filter: exact tag matches win over substring matches, so
 * "CP-II" does not also pull in "CP-III" offers.
 */
export function filterBySpecification(offers: CatalogOffer[], specification?: string | null): CatalogOffer[] {
  if (!specification || !normalizeText(specification)) return offers;
  const exact = offers.filter((o) => hasExactTag(o, specification));
  if (exact.length) return exact;
  return offers.filter((o) => matchesSpecification(o, specification));
}
