// src/budget/priceComparator.ts
import type { Basket, CatalogOffer, Quote, QuoteLine, VendorQuote } from "../types";
import { isBasketComplete } from "./disambiguationEngine";
import { fromCents, toCents } from "./money";

type VendorAccumulator = {
  vendor_id: string;
  vendor_name: string;
  vendor_phone: string | null;
  total_cents: number;
  lines: QuoteLine[];
};

function cheapestPerVendor(offers: CatalogOffer[]): Map<string, CatalogOffer> {
  const best = new Map<string, CatalogOffer>();
  for (const offer of offers) {
    const prev = best.get(offer.vendor_id);
    if (!prev || toCents(offer.unit_price) < toCents(prev.unit_price)) {
      best.set(offer.vendor_id, offer);
    }
  }
  return best;
}

/**
 * Ranks the vendors that can supply every resolved line of a complete basket.
 * A vendor missing any line is left out entirely. Pure.
 */
export function compare(basket: Basket): Quote {
  if (!isBasketComplete(basket)) {
    throw new Error("compare: basket has unresolved lines");
  }

  const lines = Array.from(basket.lines.values());
  let eligible: Map<string, VendorAccumulator> | null = null;
  let currency = "BRL";

  for (const line of lines) {
    const perVendor = cheapestPerVendor(line.matched_offers);
    const next = new Map<string, VendorAccumulator>();

    for (const [vendorId, offer] of perVendor) {
      const acc: VendorAccumulator | undefined = eligible
        ? eligible.get(vendorId)
        : {
            vendor_id: offer.vendor_id,
            vendor_name: offer.vendor_name,
            vendor_phone: offer.vendor_phone ?? null,
            total_cents: 0,
            lines: [],
          };
      if (!acc) continue; // vendor already missed an earlier line

      const subtotalCents = toCents(offer.unit_price) * line.quantity;
      next.set(vendorId, {
        ...acc,
        total_cents: acc.total_cents + subtotalCents,
        lines: [
          ...acc.lines,
          {
            category: line.category,
            item_name: offer.item_name,
            unit_price: offer.unit_price,
            quantity: line.quantity,
            subtotal: fromCents(subtotalCents),
          },
        ],
      });
      currency = offer.currency;
    }
    eligible = next;
  }

  const ranked = Array.from(eligible?.values() ?? []).sort(
    (a, b) => a.total_cents - b.total_cents || (a.vendor_id < b.vendor_id ? -1 : a.vendor_id > b.vendor_id ? 1 : 0)
  );

  const per_vendor_totals: VendorQuote[] = ranked.map((acc) => ({
    vendor_id: acc.vendor_id,
    vendor_name: acc.vendor_name,
    vendor_phone: acc.vendor_phone,
    total: fromCents(acc.total_cents),
    lines: acc.lines,
  }));

  const first = ranked[0];
  const second = ranked[1];

  return {
    per_vendor_totals,
    cheapest_vendor: per_vendor_totals[0] ?? null,
    savings_vs_next: first && second ? fromCents(second.total_cents - first.total_cents) : null,
    currency,
  };
}
