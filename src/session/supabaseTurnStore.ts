// src/session/supabaseTurnStore.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { SessionStoreUnavailableError, errorMessage } from "../errors";
import type { Turn, TurnRole } from "../types";
import type { Clock } from "../util/clock";
import {
  DEFAULT_RECENT_LIMIT,
  retentionCutoff,
  startOfLocalDay,
  StoreOptions,
  TurnStore,
} from "./turnStore";

/**
 * Table (see sql/conversation_context.sql):
 *
 *  conversation_context(
 *    id uuid pk, user_id varchar(50), role varchar(20) in ('user','assistant'),
 *    content text, created_at timestamptz
 *  )
 *  index (user_id, created_at desc), index (created_at)
 */
const TABLE = "conversation_context";

const TurnRowSchema = z.object({
  user_id: z.string(),
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  created_at: z.string(),
});

export function turnFromRow(row: unknown): Turn {
  const r = TurnRowSchema.parse(row);
  return {
    user_id: r.user_id,
    role: r.role,
    content: r.content,
    created_at: new Date(r.created_at),
  };
}

export class SupabaseTurnStore implements TurnStore {
  constructor(
    private readonly supa: SupabaseClient,
    private readonly clock: Clock,
    private readonly retentionMs: number
  ) {}

  async append(userId: string, role: TurnRole, content: string, createdAt?: Date, opts: StoreOptions = {}): Promise<Turn> {
    const created_at = (createdAt ?? this.clock.now()).toISOString();
    const { data, error } = await this.guard("append", () => {
      let req = this.supa
        .from(TABLE)
        .insert({ user_id: userId, role, content, created_at })
        .select("user_id, role, content, created_at");
      if (opts.signal) req = req.abortSignal(opts.signal);
      return req.single();
    });

    if (error) {
      console.error("[TURNS][append err]", { userId, role, error: error.message });
      throw new SessionStoreUnavailableError("append", { cause: error });
    }
    return turnFromRow(data);
  }

  async isFirstToday(userId: string, referenceTime: Date, timezone: string, opts: StoreOptions = {}): Promise<boolean> {
    const since = startOfLocalDay(referenceTime, timezone).toISOString();
    const { count, error } = await this.guard("isFirstToday", () => {
      let req = this.supa
        .from(TABLE)
        .select("user_id", { count: "exact", head: true })
        .eq("user_id", userId)
        .eq("role", "user")
        .gte("created_at", since);
      if (opts.signal) req = req.abortSignal(opts.signal);
      return req;
    });

    if (error) {
      console.error("[TURNS][isFirstToday err]", { userId, error: error.message });
      throw new SessionStoreUnavailableError("isFirstToday", { cause: error });
    }
    return (count ?? 0) === 0;
  }

  async recent(userId: string, limit = DEFAULT_RECENT_LIMIT, opts: StoreOptions = {}): Promise<Turn[]> {
    const { data, error } = await this.guard("recent", () => {
      let req = this.supa
        .from(TABLE)
        .select("user_id, role, content, created_at")
        .eq("user_id", userId)
        .order("created_at", { ascending: false })
        .limit(limit);
      if (opts.signal) req = req.abortSignal(opts.signal);
      return req;
    });

    if (error) {
      console.error("[TURNS][recent err]", { userId, error: error.message });
      throw new SessionStoreUnavailableError("recent", { cause: error });
    }
    return (data ?? []).map(turnFromRow);
  }

  async sweep(now: Date, opts: StoreOptions = {}): Promise<number> {
    // cutoff is fixed before the delete, later appends are never touched
    const cutoff = retentionCutoff(now, this.retentionMs).toISOString();
    const { count, error } = await this.guard("sweep", () => {
      let req = this.supa.from(TABLE).delete({ count: "exact" }).lt("created_at", cutoff);
      if (opts.signal) req = req.abortSignal(opts.signal);
      return req;
    });

    if (error) {
      console.error("[TURNS][sweep err]", { cutoff, error: error.message });
      throw new SessionStoreUnavailableError("sweep", { cause: error });
    }
    return count ?? 0;
  }

  // network-level throws become the same error type as PostgREST errors
  private async guard<T>(operation: string, run: () => PromiseLike<T>): Promise<T> {
    try {
      return await run();
    } catch (e) {
      console.error(`[TURNS][${operation} threw]`, errorMessage(e));
      throw new SessionStoreUnavailableError(operation, { cause: e });
    }
  }
}
