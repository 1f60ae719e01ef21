// src/ingest/messageDebouncer.ts
import type { CancelTimer, Clock, Scheduler } from "../util/clock";

// Extraction splits the merged turn on this
export const TURN_DELIMITER = "\n";

export type SettledTurn = {
  user_id: string;
  content: string; // buffered contents joined with TURN_DELIMITER
  parts: string[];
  first_seen_at: Date;
  last_seen_at: Date;
};

type PendingTurn = {
  user_id: string;
  buffered_contents: string[];
  message_ids: Set<string>;
  first_seen_at: Date;
  last_seen_at: Date;
  cancel_timer: CancelTimer;
};

export type DebouncerOptions = {
  windowMs: number;
  clock: Clock;
  scheduler: Scheduler;
  onSettle: (turn: SettledTurn) => void;
};

export type IngestMeta = {
  arrivedAt?: Date;
  messageId?: string | null;
};

/**
 * Coalesces a user's rapid-fire messages into one turn.
 *
 * The quiescence window runs from the LAST arrival: every new message
 * cancels the user's timer and starts a new one. Users never share a timer.
 */
export class MessageDebouncer {
  private readonly pending = new Map<string, PendingTurn>();
  private closed = false;

  constructor(private readonly opts: DebouncerOptions) {}

  ingest(userId: string, content: string, meta: IngestMeta = {}): "buffered" | "duplicate" | "ignored" {
    const text = String(content || "").trim();
    if (this.closed || !userId || !text) return "ignored";

    const arrivedAt = meta.arrivedAt ?? this.opts.clock.now();
    const messageId = meta.messageId ? String(meta.messageId) : null;

    let entry = this.pending.get(userId);
    if (entry && messageId && entry.message_ids.has(messageId)) {
      console.log("[DEBOUNCE] duplicate message ignored", { userId, messageId });
      return "duplicate";
    }

    if (entry) {
      entry.cancel_timer();
      entry.buffered_contents.push(text);
      entry.last_seen_at = arrivedAt;
    } else {
      entry = {
        user_id: userId,
        buffered_contents: [text],
        message_ids: new Set<string>(),
        first_seen_at: arrivedAt,
        last_seen_at: arrivedAt,
        cancel_timer: () => undefined,
      };
      this.pending.set(userId, entry);
    }

    if (messageId) entry.message_ids.add(messageId);
    entry.cancel_timer = this.opts.scheduler.setTimer(this.opts.windowMs, () => this.settle(userId));

    console.log("[DEBOUNCE] buffered", {
      userId,
      count: entry.buffered_contents.length,
      windowMs: this.opts.windowMs,
    });
    return "buffered";
  }

  /** Settle a user's pending turn right away (no-op when nothing is buffered). */
  flush(userId: string): boolean {
    const entry = this.pending.get(userId);
    if (!entry) return false;
    entry.cancel_timer();
    this.settle(userId);
    return true;
  }

  pendingUsers(): string[] {
    return Array.from(this.pending.keys());
  }

  /** Stop accepting messages; pending turns are either settled now or dropped. */
  close(opts: { flush: boolean }): void {
    this.closed = true;
    for (const userId of this.pendingUsers()) {
      if (opts.flush) {
        this.flush(userId);
      } else {
        this.pending.get(userId)?.cancel_timer();
        this.pending.delete(userId);
      }
    }
  }

  private settle(userId: string): void {
    const entry = this.pending.get(userId);
    if (!entry) return;
    this.pending.delete(userId);

    const turn: SettledTurn = {
      user_id: userId,
      content: entry.buffered_contents.join(TURN_DELIMITER),
      parts: entry.buffered_contents.slice(),
      first_seen_at: entry.first_seen_at,
      last_seen_at: entry.last_seen_at,
    };

    console.log("[DEBOUNCE] settled", { userId, parts: turn.parts.length });
    this.opts.onSettle(turn);
  }
}
