// src/budget/budgetStateMachine.ts
import type { ItemExtractor } from "../ai/itemExtractor";
import type { CatalogGateway, QueryOptions } from "../catalog/catalogGateway";
import { normalizeText } from "../catalog/catalogGateway";
import { CatalogUnavailableError, ExtractionEmptyError, InvalidMenuReplyError, errorMessage } from "../errors";
import type { Quote, QuotePhase, QuoteSession, Turn } from "../types";
import {
  formatAdded,
  formatAllDetails,
  formatBestDetail,
  formatCatalogDegraded,
  formatClarification,
  formatEmptyExtraction,
  formatLineDropped,
  formatNoEligibleVendor,
  formatQuoteSummary,
} from "./budgetFormatter";
import {
  DisambiguationEngine,
  ResolveOutcome,
  openClarification,
  pickCandidateIndex,
} from "./disambiguationEngine";
import type { KeyedStore } from "./keyedStore";
import { MenuKind, classifyMenuReply } from "./menuClassifier";
import { compare } from "./priceComparator";
import type { PurchaseFinalizer } from "./purchaseFinalizer";

// ─────────────────────────────────────────────
// Transition table
// ─────────────────────────────────────────────

type QuoteViewPhase = Exclude<QuotePhase, "collecting" | "finalized">;

type MenuAction =
  | "finalize"
  | "show_summary"
  | "show_best"
  | "show_all"
  | "invalid" // re-render the current view
  | "new_request";

export const MENU_TRANSITIONS: Record<QuoteViewPhase, Record<MenuKind, MenuAction>> = {
  quote_shown: {
    finalize: "finalize",
    show_best: "show_best",
    show_all: "show_all",
    back: "invalid",
    new_request: "new_request",
  },
  best_detail_shown: {
    finalize: "finalize",
    show_best: "invalid",
    show_all: "invalid",
    back: "show_summary",
    new_request: "new_request",
  },
  all_detail_shown: {
    finalize: "finalize",
    show_best: "invalid",
    show_all: "invalid",
    back: "show_summary",
    new_request: "new_request",
  },
};

const VIEW_RENDERERS: Record<QuoteViewPhase, (quote: Quote) => string> = {
  quote_shown: formatQuoteSummary,
  best_detail_shown: formatBestDetail,
  all_detail_shown: formatAllDetails,
};

const SKIP_WORDS = new Set(["pular", "remover", "pula", "remove"]);

function isQuoteView(phase: QuotePhase): phase is QuoteViewPhase {
  return phase === "quote_shown" || phase === "best_detail_shown" || phase === "all_detail_shown";
}

// ─────────────────────────────────────────────
// Machine
// ─────────────────────────────────────────────

export type TurnInput = {
  now: Date;
  recent: Turn[]; // newest first
  signal?: AbortSignal;
};

export type TurnResult = {
  replies: string[];
  // "finalized" is reported for the turn that closed the purchase; the stored
  // session is already back in "collecting"
  phase: QuotePhase;
};

export type BudgetStateMachineDeps = {
  engine: DisambiguationEngine;
  extractor: ItemExtractor;
  catalog: CatalogGateway;
  finalizer: PurchaseFinalizer;
  sessions: KeyedStore<QuoteSession>;
  quoteTtlMs: number;
};

export class BudgetStateMachine {
  constructor(private readonly deps: BudgetStateMachineDeps) {}

  phaseOf(userId: string): QuotePhase {
    return this.deps.sessions.get(userId)?.phase ?? "collecting";
  }

  isExpired(session: QuoteSession, now: Date): boolean {
    return now.getTime() - session.last_activity_at.getTime() > this.deps.quoteTtlMs;
  }

  /** Users whose session has been idle past the TTL. */
  expiredUsers(now: Date): string[] {
    return this.deps.sessions.keys().filter((userId) => {
      const s = this.deps.sessions.get(userId);
      return !!s && this.isExpired(s, now);
    });
  }

  /** Drops the session and basket if still expired at `now`. Run on the user's lane. */
  expire(userId: string, now: Date): boolean {
    const s = this.deps.sessions.get(userId);
    if (!s || !this.isExpired(s, now)) return false;
    this.reset(userId);
    console.log("[BUDGET] session expired", { userId, phase: s.phase });
    return true;
  }

  purgeExpired(now: Date): number {
    return this.expiredUsers(now).filter((userId) => this.expire(userId, now)).length;
  }

  async handleTurn(userId: string, text: string, input: TurnInput): Promise<TurnResult> {
    const { now } = input;
    this.expire(userId, now);

    const session: QuoteSession = this.deps.sessions.get(userId) ?? {
      user_id: userId,
      phase: "collecting",
      last_quote: null,
      last_activity_at: now,
    };

    const result = await this.dispatch(session, text, input);

    if (result.phase === "finalized") {
      this.reset(userId);
    } else {
      this.deps.sessions.set(userId, { ...session, last_activity_at: now });
    }
    console.log("[BUDGET] phase", { userId, from: session.phase, to: result.phase });
    return result;
  }

  // ───────────────────────────── internals

  private reset(userId: string): void {
    this.deps.engine.discard(userId);
    this.deps.sessions.delete(userId);
  }

  private async dispatch(session: QuoteSession, text: string, input: TurnInput): Promise<TurnResult> {
    const { phase, last_quote } = session;
    if (!isQuoteView(phase) || !last_quote) {
      return this.collect(session, text, input);
    }

    const reply = classifyMenuReply(text);
    const action = MENU_TRANSITIONS[phase][reply.kind];

    switch (action) {
      case "finalize": {
        const done = await this.deps.finalizer.finalize(session.user_id, last_quote, input.now, {
          signal: input.signal,
        });
        return { replies: [done.customer_message], phase: "finalized" };
      }
      case "show_summary":
        return this.showView(session, "quote_shown", last_quote);
      case "show_best":
        return this.showView(session, "best_detail_shown", last_quote);
      case "show_all":
        return this.showView(session, "all_detail_shown", last_quote);
      case "invalid": {
        const err = new InvalidMenuReplyError(text, phase);
        console.warn("[BUDGET] invalid menu reply", { userId: session.user_id, error: err.message });
        return this.showView(session, phase, last_quote);
      }
      case "new_request": {
        console.log("[BUDGET] new request while quote open, starting over", { userId: session.user_id });
        this.reset(session.user_id);
        session.phase = "collecting";
        session.last_quote = null;
        return this.collect(session, text, input);
      }
      default: {
        const unreachable: never = action;
        throw new Error(`unhandled menu action ${String(unreachable)}`);
      }
    }
  }

  private showView(session: QuoteSession, phase: QuoteViewPhase, quote: Quote): TurnResult {
    session.phase = phase;
    return { replies: [VIEW_RENDERERS[phase](quote)], phase };
  }

  /** Collecting phase: build the basket until it is complete, then quote. */
  private async collect(session: QuoteSession, text: string, input: TurnInput): Promise<TurnResult> {
    const userId = session.user_id;
    const opts: QueryOptions = { signal: input.signal };
    session.phase = "collecting";

    try {
      const basket = this.deps.engine.current(userId);
      const open = basket ? openClarification(basket) : null;

      if (open && SKIP_WORDS.has(normalizeText(text))) {
        const { removed, outcome } = this.deps.engine.dropOpenLine(userId);
        const replies = removed ? [formatLineDropped(removed)] : [];
        if (!outcome) return { replies, phase: "collecting" };
        return this.afterResolve(session, outcome, replies);
      }

      // a bare candidate number needs no extraction
      if (open && pickCandidateIndex(text, open) !== null) {
        const outcome = await this.deps.engine.answerClarification(userId, { text, requests: [] }, opts);
        return this.afterResolve(session, outcome, []);
      }

      const categories = await this.deps.catalog.listCategories(opts);
      const requests = await this.deps.extractor.extract(text, { recent: input.recent, categories });

      if (open) {
        const outcome = await this.deps.engine.answerClarification(userId, { text, requests }, opts);
        return this.afterResolve(session, outcome, []);
      }

      if (!requests.length) {
        const err = new ExtractionEmptyError(text);
        console.log("[BUDGET] nothing extracted", { userId, error: err.message });
        return { replies: [formatEmptyExtraction()], phase: "collecting" };
      }

      const outcome = await this.deps.engine.resolve(userId, requests, opts);
      return this.afterResolve(session, outcome, []);
    } catch (e) {
      if (e instanceof CatalogUnavailableError) {
        console.error("[BUDGET] catalog unavailable, basket unchanged", { userId, error: errorMessage(e) });
        return { replies: [formatCatalogDegraded()], phase: "collecting" };
      }
      throw e;
    }
  }

  private afterResolve(session: QuoteSession, outcome: ResolveOutcome, replies: string[]): TurnResult {
    const userId = session.user_id;
    const out = [...replies];
    const added = formatAdded(outcome.newly_resolved);
    if (added) out.push(added);

    if (outcome.complete) {
      const quote = compare(outcome.basket);
      if (!quote.cheapest_vendor) {
        console.warn("[BUDGET] no vendor supplies every line, basket discarded", { userId });
        this.deps.engine.discard(userId);
        out.push(formatNoEligibleVendor());
        return { replies: out, phase: "collecting" };
      }
      session.phase = "quote_shown";
      session.last_quote = quote;
      out.push(formatQuoteSummary(quote));
      return { replies: out, phase: "quote_shown" };
    }

    if (outcome.open_line) {
      out.push(formatClarification(outcome.open_line));
    } else if (!out.length) {
      out.push(formatEmptyExtraction());
    }
    return { replies: out, phase: "collecting" };
  }
}
