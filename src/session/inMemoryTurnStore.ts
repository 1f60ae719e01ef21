// src/session/inMemoryTurnStore.ts
import type { Turn, TurnRole } from "../types";
import type { Clock } from "../util/clock";
import {
  DEFAULT_RECENT_LIMIT,
  retentionCutoff,
  startOfLocalDay,
  StoreOptions,
  TurnStore,
} from "./turnStore";

export class InMemoryTurnStore implements TurnStore {
  // per user, kept in append order
  private readonly turns = new Map<string, Turn[]>();

  constructor(
    private readonly clock: Clock,
    private readonly retentionMs: number
  ) {}

  async append(userId: string, role: TurnRole, content: string, createdAt?: Date, opts: StoreOptions = {}): Promise<Turn> {
    opts.signal?.throwIfAborted();
    const turn: Turn = Object.freeze({
      user_id: userId,
      role,
      content,
      created_at: createdAt ?? this.clock.now(),
    });
    const list = this.turns.get(userId) ?? [];
    list.push(turn);
    this.turns.set(userId, list);
    return turn;
  }

  async isFirstToday(userId: string, referenceTime: Date, timezone: string, opts: StoreOptions = {}): Promise<boolean> {
    opts.signal?.throwIfAborted();
    const since = startOfLocalDay(referenceTime, timezone).getTime();
    const list = this.turns.get(userId) ?? [];
    return !list.some((t) => t.role === "user" && t.created_at.getTime() >= since);
  }

  async recent(userId: string, limit = DEFAULT_RECENT_LIMIT, opts: StoreOptions = {}): Promise<Turn[]> {
    opts.signal?.throwIfAborted();
    const list = this.turns.get(userId) ?? [];
    // stable: equal timestamps keep append order, newest append wins
    return list
      .map((turn, idx) => ({ turn, idx }))
      .sort((a, b) => b.turn.created_at.getTime() - a.turn.created_at.getTime() || b.idx - a.idx)
      .slice(0, Math.max(0, limit))
      .map((x) => x.turn);
  }

  async sweep(now: Date, opts: StoreOptions = {}): Promise<number> {
    opts.signal?.throwIfAborted();
    const cutoff = retentionCutoff(now, this.retentionMs).getTime();
    let removed = 0;
    for (const [userId, list] of this.turns) {
      const kept = list.filter((t) => t.created_at.getTime() >= cutoff);
      removed += list.length - kept.length;
      if (kept.length) this.turns.set(userId, kept);
      else this.turns.delete(userId);
    }
    return removed;
  }
}
