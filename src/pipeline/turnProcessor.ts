// src/pipeline/turnProcessor.ts
import type { BudgetStateMachine } from "../budget/budgetStateMachine";
import { GREETING, formatApology } from "../budget/budgetFormatter";
import { errorMessage } from "../errors";
import type { SettledTurn } from "../ingest/messageDebouncer";
import type { StoreOptions, TurnStore } from "../session/turnStore";
import type { Turn, TurnRole } from "../types";
import type { Clock } from "../util/clock";
import type { MessageTransport } from "../whatsapp/evolution";

export type TurnProcessorDeps = {
  turns: TurnStore;
  machine: BudgetStateMachine;
  transport: MessageTransport;
  clock: Clock;
  timezone: string;
  contextLimit: number;
  // shutdown signal handed to catalog queries and the turn store
  signal?: AbortSignal;
};

export type ProcessedTurn = {
  user_id: string;
  replies: string[];
  greeted: boolean;
  failed: boolean;
};

/**
 * Runs one settled turn end to end. Must be called from the user's lane.
 * Turn-store failures degrade to "no history" for this turn; anything else
 * that escapes the machine becomes an apology.
 */
export class TurnProcessor {
  constructor(private readonly deps: TurnProcessorDeps) {}

  async process(turn: SettledTurn): Promise<ProcessedTurn> {
    const { turns, clock, timezone, contextLimit } = this.deps;
    const userId = turn.user_id;
    const now = clock.now();
    const store: StoreOptions = { signal: this.deps.signal };

    // both read before this turn is stored: one burst greets once, and the
    // context holds only earlier turns
    const greeted = await this.safely("isFirstToday", false, () => turns.isFirstToday(userId, now, timezone, store));
    const recent = await this.safely<Turn[]>("recent", [], () => turns.recent(userId, contextLimit, store));
    await this.safely<Turn | null>("append user", null, () => turns.append(userId, "user", turn.content, now, store));

    let replies: string[];
    let failed = false;
    try {
      const result = await this.deps.machine.handleTurn(userId, turn.content, {
        now,
        recent,
        signal: this.deps.signal,
      });
      replies = result.replies;
    } catch (e) {
      console.error("[TURN] processing failed", { userId, error: errorMessage(e) });
      replies = [formatApology()];
      failed = true;
    }

    const outgoing = greeted ? [GREETING, ...replies] : replies;
    for (const text of outgoing) {
      await this.deliver(userId, text);
    }

    return { user_id: userId, replies: outgoing, greeted, failed };
  }

  private async deliver(userId: string, text: string): Promise<void> {
    try {
      await this.deps.transport.sendText(userId, text);
    } catch (e) {
      console.error("[TURN][send err]", { userId, error: errorMessage(e) });
    }
    await this.safely<Turn | null>("append assistant", null, () => this.record(userId, "assistant", text));
  }

  private record(userId: string, role: TurnRole, content: string): Promise<Turn> {
    return this.deps.turns.append(userId, role, content, this.deps.clock.now(), { signal: this.deps.signal });
  }

  private async safely<T>(operation: string, fallback: T, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (e) {
      console.error(`[TURNS][${operation} err]`, errorMessage(e));
      return fallback;
    }
  }
}
