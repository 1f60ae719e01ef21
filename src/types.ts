// src/types.ts

// ─────────────────────────────
// Conversation turns
// ─────────────────────────────
export type TurnRole = "user" | "assistant";

export type Turn = {
  user_id: string;
  role: TurnRole;
  content: string;
  created_at: Date;
};

// ─────────────────────────────
// Extraction output (one requested item)
// ─────────────────────────────
export type ItemRequest = {
  raw_mention: string;
  category_hint: string;
  specification?: string | null;
  quantity?: number; // defaults to 1
};

// ─────────────────────────────
// Catalog
// ─────────────────────────────
export type CatalogOffer = {
  vendor_id: string;
  vendor_name: string;
  vendor_phone?: string | null;
  item_name: string;
  category: string;
  specification_tags: string[];
  unit_price: number;
  currency: string;
};

// ─────────────────────────────
// Basket (owned by the disambiguation engine)
// ─────────────────────────────
export type BasketLineStatus = "resolved" | "needs_clarification";

export type BasketLine = {
  category: string;
  raw_mention: string;
  quantity: number;
  requested_specification: string | null;
  status: BasketLineStatus;
  chosen_offer: CatalogOffer | null;
  // one representative (cheapest) offer per specification group, for the question
  candidate_offers: CatalogOffer[];
  // every offer that satisfied the resolution, across vendors
  matched_offers: CatalogOffer[];
  // specification the user asked for that matched nothing (re-asked)
  unmatched_specification: string | null;
};

export type Basket = {
  user_id: string;
  lines: Map<string, BasketLine>; // category key → line, insertion = first-requested order
  created_at: Date;
  updated_at: Date;
};

// ─────────────────────────────
// Quote (price comparator output)
// ─────────────────────────────
export type QuoteLine = {
  category: string;
  item_name: string;
  unit_price: number;
  quantity: number;
  subtotal: number;
};

export type VendorQuote = {
  vendor_id: string;
  vendor_name: string;
  vendor_phone: string | null;
  total: number;
  lines: QuoteLine[];
};

export type Quote = {
  per_vendor_totals: VendorQuote[]; // ranked, cheapest first
  cheapest_vendor: VendorQuote | null;
  savings_vs_next: number | null; // null = fewer than two eligible vendors
  currency: string;
};

// ─────────────────────────────
// Quote session (owned by the budget state machine)
// ─────────────────────────────
export type QuotePhase =
  | "collecting"
  | "quote_shown"
  | "best_detail_shown"
  | "all_detail_shown"
  | "finalized";

export type QuoteSession = {
  user_id: string;
  phase: QuotePhase;
  last_quote: Quote | null;
  last_activity_at: Date;
};
