// src/budget/disambiguationEngine.ts
import {
  CatalogGateway,
  QueryOptions,
  normalizeText,
} from "../catalog/catalogGateway";
import type { Basket, BasketLine, CatalogOffer, ItemRequest } from "../types";
import type { Clock } from "../util/clock";
import type { KeyedStore } from "./keyedStore";
import { toCents } from "./money";

export type ResolveOutcome = {
  basket: Basket;
  newly_resolved: BasketLine[];
  open_line: BasketLine | null;
  complete: boolean;
};

export type ClarificationAnswer = {
  text: string;
  // what the extractor made of the same answer (may be empty)
  requests: ItemRequest[];
};

// ─────────────────────────────────────────────
// Pure helpers
// ─────────────────────────────────────────────

export function lineKey(categoryHint: string): string {
  return normalizeText(categoryHint);
}

/** Cheapest first; ties by vendor_name, then vendor_id (plain code-unit order). */
export function compareOffers(a: CatalogOffer, b: CatalogOffer): number {
  const byPrice = toCents(a.unit_price) - toCents(b.unit_price);
  if (byPrice !== 0) return byPrice;
  if (a.vendor_name !== b.vendor_name) return a.vendor_name < b.vendor_name ? -1 : 1;
  if (a.vendor_id !== b.vendor_id) return a.vendor_id < b.vendor_id ? -1 : 1;
  return 0;
}

export function cheapestOffer(offers: CatalogOffer[]): CatalogOffer | null {
  if (!offers.length) return null;
  return offers.slice().sort(compareOffers)[0] ?? null;
}

export function specificationSignature(offer: CatalogOffer): string {
  return offer.specification_tags
    .map(normalizeText)
    .filter(Boolean)
    .sort()
    .join("|");
}

export type SpecificationGroup = {
  signature: string;
  offers: CatalogOffer[];
  representative: CatalogOffer; // cheapest in the group
};

/** Groups by distinct tag signature, ordered by each group's cheapest offer. */
export function groupBySpecification(offers: CatalogOffer[]): SpecificationGroup[] {
  const bySig = new Map<string, CatalogOffer[]>();
  for (const offer of offers) {
    const sig = specificationSignature(offer);
    const list = bySig.get(sig) ?? [];
    list.push(offer);
    bySig.set(sig, list);
  }

  const groups: SpecificationGroup[] = [];
  for (const [signature, list] of bySig) {
    const representative = cheapestOffer(list);
    if (representative) groups.push({ signature, offers: list, representative });
  }
  return groups.sort((a, b) => compareOffers(a.representative, b.representative));
}

export function isBasketComplete(basket: Basket): boolean {
  if (basket.lines.size === 0) return false;
  for (const line of basket.lines.values()) {
    if (line.status !== "resolved") return false;
  }
  return true;
}

/** First unresolved line in first-requested order. */
export function openClarification(basket: Basket): BasketLine | null {
  for (const line of basket.lines.values()) {
    if (line.status === "needs_clarification") return line;
  }
  return null;
}

const KEYCAP_DIGITS: Record<string, string> = {
  "1️⃣": "1", "2️⃣": "2", "3️⃣": "3", "4️⃣": "4", "5️⃣": "5",
  "6️⃣": "6", "7️⃣": "7", "8️⃣": "8", "9️⃣": "9",
};

/**
 * Which candidate the reply picks: "2" → index 1, or the exact item name of
 * a candidate. Returns the 0-based index, or null when the reply is free text.
 */
export function pickCandidateIndex(text: string, line: BasketLine): number | null {
  const raw = String(text || "").trim();
  const candidates = line.candidate_offers;
  if (!raw || !candidates.length) return null;

  const digits = KEYCAP_DIGITS[raw] ?? raw;
  if (/^\d+$/.test(digits)) {
    const num = Number(digits);
    return num >= 1 && num <= candidates.length ? num - 1 : null;
  }

  const lower = normalizeText(raw);
  const idx = candidates.findIndex((c) => normalizeText(c.item_name) === lower);
  return idx >= 0 ? idx : null;
}

function cloneBasket(basket: Basket): Basket {
  return { ...basket, lines: new Map(basket.lines) };
}

type LineBase = Pick<BasketLine, "category" | "raw_mention" | "quantity" | "requested_specification">;

function baseOf(line: BasketLine, requestedSpecification: string | null): LineBase {
  return {
    category: line.category,
    raw_mention: line.raw_mention,
    quantity: line.quantity,
    requested_specification: requestedSpecification,
  };
}

function resolvedLine(base: LineBase, matched: CatalogOffer[]): BasketLine {
  return {
    ...base,
    status: "resolved",
    chosen_offer: cheapestOffer(matched),
    candidate_offers: [],
    matched_offers: matched,
    unmatched_specification: null,
  };
}

// ─────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────

/**
 * Builds each user's basket one item request at a time: auto-selects an offer
 * when the request pins down a single variation, otherwise leaves the line
 * open with one candidate per specification group.
 *
 * Every call works on a copy of the basket and only stores it once all
 * catalog queries succeeded, so a catalog failure leaves the basket as it was.
 */
export class DisambiguationEngine {
  constructor(
    private readonly catalog: CatalogGateway,
    private readonly baskets: KeyedStore<Basket>,
    private readonly clock: Clock
  ) {}

  current(userId: string): Basket | null {
    return this.baskets.get(userId) ?? null;
  }

  discard(userId: string): void {
    if (this.baskets.delete(userId)) {
      console.log("[DISAMB] basket discarded", { userId });
    }
  }

  async resolve(userId: string, requests: ItemRequest[], opts: QueryOptions = {}): Promise<ResolveOutcome> {
    const work = this.workingCopy(userId);
    const newlyResolved: BasketLine[] = [];

    for (const request of requests) {
      const key = lineKey(request.category_hint);
      if (!key) {
        console.warn("[DISAMB] request without category, skipped", { userId, raw: request.raw_mention });
        continue;
      }

      const existing = work.lines.get(key);
      if (existing?.status === "resolved") {
        console.log("[DISAMB] already resolved, untouched", { userId, key });
        continue;
      }
      if (existing && !request.specification) continue;

      const line = await this.resolveLine(
        {
          category: existing?.category ?? request.category_hint.trim(),
          raw_mention: existing?.raw_mention ?? request.raw_mention,
          quantity: existing?.quantity ?? normalizeQuantity(request.quantity),
          requested_specification: request.specification?.trim() || null,
        },
        opts
      );
      work.lines.set(key, line);
      if (line.status === "resolved") newlyResolved.push(line);
    }

    return this.commit(userId, work, newlyResolved);
  }

  /**
   * Applies a reply to the open question. Only the open line changes; when
   * the extractor also found other categories alongside a same-category
   * answer, those are merged as new requests. A reply that names only other
   * categories is a new request and the open line is asked again.
   */
  async answerClarification(userId: string, answer: ClarificationAnswer, opts: QueryOptions = {}): Promise<ResolveOutcome> {
    const basket = this.current(userId);
    const open = basket ? openClarification(basket) : null;
    if (!basket || !open) return this.resolve(userId, answer.requests, opts);

    const openKey = lineKey(open.category);
    const pick = pickCandidateIndex(answer.text, open);

    const namesOpenCategory = answer.requests.some((r) => lineKey(r.category_hint) === openKey);
    if (pick === null && answer.requests.length && !namesOpenCategory) {
      console.log("[DISAMB] answer names other categories, open line kept", { userId, category: open.category });
      return this.resolve(userId, answer.requests, opts);
    }

    const work = cloneBasket(basket);
    const newlyResolved: BasketLine[] = [];
    let others: ItemRequest[] = [];
    let line: BasketLine;

    if (pick !== null) {
      line = await this.resolvePickedGroup(open, pick, opts);
    } else {
      const sameCategory = answer.requests.find(
        (r) => lineKey(r.category_hint) === openKey && !!r.specification?.trim()
      );
      if (sameCategory) {
        others = answer.requests.filter((r) => r !== sameCategory && lineKey(r.category_hint) !== openKey);
      }
      const specification = sameCategory?.specification?.trim() || answer.text.trim();
      line = await this.resolveLine(baseOf(open, specification), opts);
    }

    work.lines.set(openKey, line);
    if (line.status === "resolved") newlyResolved.push(line);
    console.log("[DISAMB] clarification answered", { userId, category: open.category, status: line.status });

    if (others.length) {
      this.baskets.set(userId, work);
      try {
        const merged = await this.resolve(userId, others, opts);
        return { ...merged, newly_resolved: [...newlyResolved, ...merged.newly_resolved] };
      } catch (e) {
        this.baskets.set(userId, basket);
        throw e;
      }
    }

    return this.commit(userId, work, newlyResolved);
  }

  /** Removes the open line at the user's explicit request. */
  dropOpenLine(userId: string): { removed: BasketLine | null; outcome: ResolveOutcome | null } {
    const basket = this.current(userId);
    const open = basket ? openClarification(basket) : null;
    if (!basket || !open) return { removed: null, outcome: null };

    const work = cloneBasket(basket);
    work.lines.delete(lineKey(open.category));
    console.log("[DISAMB] open line dropped", { userId, category: open.category });

    if (work.lines.size === 0) {
      this.discard(userId);
      return { removed: open, outcome: null };
    }
    return { removed: open, outcome: this.commit(userId, work, []) };
  }

  // ───────────────────────────── internals

  private workingCopy(userId: string): Basket {
    const existing = this.current(userId);
    if (existing) return cloneBasket(existing);
    const now = this.clock.now();
    return { user_id: userId, lines: new Map(), created_at: now, updated_at: now };
  }

  private commit(userId: string, work: Basket, newlyResolved: BasketLine[]): ResolveOutcome {
    if (work.lines.size === 0) {
      return { basket: work, newly_resolved: [], open_line: null, complete: false };
    }
    work.updated_at = this.clock.now();
    this.baskets.set(userId, work);

    const complete = isBasketComplete(work);
    return {
      basket: work,
      newly_resolved: newlyResolved,
      open_line: complete ? null : openClarification(work),
      complete,
    };
  }

  private async resolveLine(base: LineBase, opts: QueryOptions): Promise<BasketLine> {
    const spec = base.requested_specification;

    if (spec) {
      const matches = await this.catalog.query(base.category, spec, opts);
      if (matches.length) return resolvedLine(base, matches);
    }

    const groups = groupBySpecification(await this.catalog.query(base.category, null, opts));

    if (!spec && groups.length === 1) {
      const only = groups[0];
      if (only) return resolvedLine(base, only.offers);
    }

    if (!groups.length) {
      console.warn("[DISAMB] no offers for category", { category: base.category });
    }

    return {
      ...base,
      status: "needs_clarification",
      chosen_offer: null,
      candidate_offers: groups.map((g) => g.representative),
      matched_offers: [],
      unmatched_specification: spec,
    };
  }

  private async resolvePickedGroup(open: BasketLine, index: number, opts: QueryOptions): Promise<BasketLine> {
    const candidate = open.candidate_offers[index];
    if (!candidate) return open;

    const signature = specificationSignature(candidate);
    const offers = await this.catalog.query(open.category, null, opts);
    const group = offers.filter((o) => specificationSignature(o) === signature);

    // catalog changed under us → ask again with fresh candidates
    if (!group.length) return this.resolveLine(baseOf(open, null), opts);

    return resolvedLine(baseOf(open, candidate.specification_tags.join(" ") || candidate.item_name), group);
  }
}

function normalizeQuantity(q: number | undefined): number {
  if (q === undefined || !Number.isFinite(q)) return 1;
  return Math.max(1, Math.floor(q));
}
