// src/session/sweeper.ts
import type { BudgetStateMachine } from "../budget/budgetStateMachine";
import { errorMessage } from "../errors";
import type { UserLanes } from "../ingest/userLanes";
import type { CancelTimer, Clock, Scheduler } from "../util/clock";
import type { TurnStore } from "./turnStore";

export type SweepReport = {
  turns_removed: number;
  sessions_expired: number;
};

export type SweeperDeps = {
  turns: TurnStore;
  machine: BudgetStateMachine;
  lanes: UserLanes;
  clock: Clock;
  scheduler: Scheduler;
  intervalMs: number;
};

/**
 * Periodic cleanup: turns past the retention horizon and quote sessions idle
 * past their TTL. Session expiry goes through each user's lane so it never
 * races a turn in flight.
 */
export class Sweeper {
  private cancel: CancelTimer | null = null;
  private running: Promise<SweepReport> | null = null;

  constructor(private readonly deps: SweeperDeps) {}

  async runOnce(now: Date = this.deps.clock.now()): Promise<SweepReport> {
    const { turns, machine, lanes } = this.deps;

    let turnsRemoved = 0;
    try {
      turnsRemoved = await turns.sweep(now);
    } catch (e) {
      console.error("[SWEEP][turns err]", errorMessage(e));
    }

    const expired = await Promise.all(
      machine.expiredUsers(now).map((userId) => lanes.run(userId, async () => machine.expire(userId, now)))
    );
    const report = { turns_removed: turnsRemoved, sessions_expired: expired.filter(Boolean).length };

    if (report.turns_removed || report.sessions_expired) {
      console.log("[SWEEP] done", report);
    }
    return report;
  }

  start(): void {
    if (this.cancel) return;
    this.cancel = this.deps.scheduler.setRepeating(this.deps.intervalMs, () => {
      if (this.running) return; // previous sweep still going
      this.running = this.runOnce()
        .catch((e: unknown): SweepReport => {
          console.error("[SWEEP] failed", errorMessage(e));
          return { turns_removed: 0, sessions_expired: 0 };
        })
        .finally(() => {
          this.running = null;
        });
    });
    console.log("[SWEEP] started", { intervalMs: this.deps.intervalMs });
  }

  async stop(): Promise<void> {
    this.cancel?.();
    this.cancel = null;
    if (this.running) await this.running;
  }
}
