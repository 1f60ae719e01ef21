// src/session/turnStore.ts
import { DateTime } from "luxon";
import type { Turn, TurnRole } from "../types";

/**
 * Append-only log of conversation turns per user, kept for a fixed
 * retention horizon (24h by default). Used for dialogue context and for
 * "first message of the day" detection.
 *
 * Every method rejects with SessionStoreUnavailableError when the backing
 * store fails, and gives up once `opts.signal` aborts.
 */
export interface TurnStore {
  append(userId: string, role: TurnRole, content: string, createdAt?: Date, opts?: StoreOptions): Promise<Turn>;
  isFirstToday(userId: string, referenceTime: Date, timezone: string, opts?: StoreOptions): Promise<boolean>;
  /** Most recent turns, newest first. */
  recent(userId: string, limit?: number, opts?: StoreOptions): Promise<Turn[]>;
  /** Deletes turns older than `now - retention`; returns how many went. */
  sweep(now: Date, opts?: StoreOptions): Promise<number>;
}

export type StoreOptions = { signal?: AbortSignal };

export const DEFAULT_RECENT_LIMIT = 10;

/** Local midnight of `reference` in `timezone`, as an absolute instant. */
export function startOfLocalDay(reference: Date, timezone: string): Date {
  const local = DateTime.fromJSDate(reference, { zone: timezone });
  if (!local.isValid) {
    throw new Error(`invalid timezone "${timezone}": ${local.invalidExplanation ?? "unknown"}`);
  }
  return local.startOf("day").toJSDate();
}

export function retentionCutoff(now: Date, retentionMs: number): Date {
  return new Date(now.getTime() - retentionMs);
}
