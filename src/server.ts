// src/server.ts
import OpenAI from "openai";
import path from "path";
import { ItemExtractor, OpenAIItemExtractor, RuleItemExtractor, openAIExtractionCall } from "./ai/itemExtractor";
import { buildRuntime, createApp } from "./app";
import type { CatalogGateway } from "./catalog/catalogGateway";
import { InMemoryCatalogGateway, loadCatalogSeedFile } from "./catalog/inMemoryCatalog";
import { SupabaseCatalogGateway } from "./catalog/supabaseCatalog";
import { loadConfig } from "./config";
import { createSupabase } from "./db";
import { errorMessage } from "./errors";
import { InMemoryTurnStore } from "./session/inMemoryTurnStore";
import { SupabaseTurnStore } from "./session/supabaseTurnStore";
import type { TurnStore } from "./session/turnStore";
import { systemClock, systemScheduler } from "./util/clock";
import { EvolutionTransport, LogTransport, MessageTransport } from "./whatsapp/evolution";

const SHUTDOWN_GRACE_MS = 10_000;
const SEED_PATH = path.join(process.cwd(), "data", "catalog.seed.json");

const config = loadConfig();

// ─────────────────────────────
// Boot diagnostics
// ─────────────────────────────
console.log("[BOOT] SUPABASE configured?", !!config.supabase);
console.log("[AI] OPENAI_API_KEY present?", !!config.openai, "model:", config.openai?.model ?? "(rules only)");
console.log("[BOOT] EVOLUTION configured?", !!config.evolution);
console.log("[BOOT] debounce", config.debounceMs, "ms · timezone", config.storeTimezone);

const supa = createSupabase(config);

const turns: TurnStore = supa
  ? new SupabaseTurnStore(supa, systemClock, config.turnRetentionMs)
  : new InMemoryTurnStore(systemClock, config.turnRetentionMs);

let catalog: CatalogGateway;
if (supa) {
  catalog = new SupabaseCatalogGateway(supa);
} else {
  console.log("[CATALOG] loading seed from", SEED_PATH);
  catalog = new InMemoryCatalogGateway(loadCatalogSeedFile(SEED_PATH));
}

const extractor: ItemExtractor = config.openai
  ? new OpenAIItemExtractor(
      openAIExtractionCall(new OpenAI({ apiKey: config.openai.apiKey }), config.openai.model),
      new RuleItemExtractor()
    )
  : new RuleItemExtractor();

const transport: MessageTransport = config.evolution
  ? new EvolutionTransport(config.evolution)
  : new LogTransport();

const runtime = buildRuntime({
  config,
  turns,
  catalog,
  extractor,
  transport,
  clock: systemClock,
  scheduler: systemScheduler,
});

const app = createApp(runtime);
runtime.sweeper.start();

const server = app.listen(config.port, () => {
  console.log(`[BOOT] listening on :${config.port}`);
});

// ─────────────────────────────
// Graceful shutdown
// ─────────────────────────────
let stopping = false;

async function stop(signal: string) {
  if (stopping) return;
  stopping = true;
  console.log(`[SHUTDOWN] ${signal} received`);

  await new Promise<void>((resolve) => {
    server.close((err) => {
      if (err) console.error("[SHUTDOWN] server close err", errorMessage(err));
      resolve();
    });
  });
  await runtime.shutdown(SHUTDOWN_GRACE_MS);
  console.log("[SHUTDOWN] done");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    stop(signal)
      .then(() => process.exit(0))
      .catch((e: unknown) => {
        console.error("[SHUTDOWN] failed", errorMessage(e));
        process.exit(1);
      });
  });
}
