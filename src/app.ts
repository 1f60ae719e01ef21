// src/app.ts
import express from "express";
import type { ItemExtractor } from "./ai/itemExtractor";
import { BudgetStateMachine } from "./budget/budgetStateMachine";
import { DisambiguationEngine } from "./budget/disambiguationEngine";
import { KeyedStore } from "./budget/keyedStore";
import { PurchaseFinalizer } from "./budget/purchaseFinalizer";
import type { CatalogGateway } from "./catalog/catalogGateway";
import { RetryingCatalogGateway } from "./catalog/retryingCatalog";
import type { AppConfig } from "./config";
import { errorMessage } from "./errors";
import { MessageDebouncer } from "./ingest/messageDebouncer";
import { UserLanes } from "./ingest/userLanes";
import { TurnProcessor } from "./pipeline/turnProcessor";
import { createWebhookRouter } from "./routes/webhook";
import { Sweeper } from "./session/sweeper";
import type { TurnStore } from "./session/turnStore";
import type { Basket, QuoteSession } from "./types";
import type { Clock, Scheduler } from "./util/clock";
import type { MessageTransport } from "./whatsapp/evolution";

export type AppServices = {
  config: AppConfig;
  turns: TurnStore;
  catalog: CatalogGateway; // raw gateway; retries are added here
  extractor: ItemExtractor;
  transport: MessageTransport;
  clock: Clock;
  scheduler: Scheduler;
};

export type Runtime = {
  debouncer: MessageDebouncer;
  lanes: UserLanes;
  machine: BudgetStateMachine;
  processor: TurnProcessor;
  sweeper: Sweeper;
  shutdown(graceMs: number): Promise<void>;
};

/** Wires every component; one instance per process (or per test). */
export function buildRuntime(services: AppServices): Runtime {
  const { config, turns, extractor, transport, clock, scheduler } = services;
  const abort = new AbortController();

  const catalog = new RetryingCatalogGateway(services.catalog, {
    backoffMs: config.catalogRetryBackoffMs,
    scheduler,
    signal: abort.signal,
  });

  const engine = new DisambiguationEngine(catalog, new KeyedStore<Basket>(), clock);
  const machine = new BudgetStateMachine({
    engine,
    extractor,
    catalog,
    finalizer: new PurchaseFinalizer(catalog, config.storeTimezone),
    sessions: new KeyedStore<QuoteSession>(),
    quoteTtlMs: config.quoteTtlMs,
  });

  const processor = new TurnProcessor({
    turns,
    machine,
    transport,
    clock,
    timezone: config.storeTimezone,
    contextLimit: config.contextLimit,
    signal: abort.signal,
  });

  const lanes = new UserLanes();
  const debouncer = new MessageDebouncer({
    windowMs: config.debounceMs,
    clock,
    scheduler,
    onSettle: (turn) => {
      lanes.run(turn.user_id, () => processor.process(turn)).catch((e: unknown) => {
        console.error("[LANE] turn failed", { userId: turn.user_id, error: errorMessage(e) });
      });
    },
  });

  const sweeper = new Sweeper({
    turns,
    machine,
    lanes,
    clock,
    scheduler,
    intervalMs: config.sweepIntervalMs,
  });

  async function shutdown(graceMs: number): Promise<void> {
    debouncer.close({ flush: true });
    const cancelAbort = scheduler.setTimer(graceMs, () => {
      console.warn("[SHUTDOWN] grace period over, aborting catalog calls");
      abort.abort(new Error("shutting down"));
    });
    try {
      await lanes.drain();
    } finally {
      cancelAbort();
      await sweeper.stop();
    }
  }

  return { debouncer, lanes, machine, processor, sweeper, shutdown };
}

export function createApp(runtime: Runtime) {
  const app = express();

  app.use("/webhook", express.json({ limit: "1mb" }), createWebhookRouter(runtime.debouncer));

  app.get("/health", (_req, res) =>
    res.json({
      ok: true,
      pending_turns: runtime.debouncer.pendingUsers().length,
      active_lanes: runtime.lanes.activeLanes(),
    })
  );

  return app;
}
