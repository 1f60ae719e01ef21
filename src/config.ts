// src/config.ts
import "dotenv/config";
import { IANAZone } from "luxon";
import { z } from "zod";

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8787),

  // Supabase (optional → in-memory stores)
  SUPABASE_URL: optionalString,
  SUPABASE_SERVICE_ROLE: optionalString, // MUST be service role (not anon)

  // Extraction oracle
  OPENAI_API_KEY: optionalString,
  AI_MODEL: z.string().trim().min(1).default("gpt-4.1-mini"),

  // Evolution API gateway (optional → replies only logged)
  EVOLUTION_API_URL: optionalString,
  EVOLUTION_API_KEY: optionalString,
  EVOLUTION_INSTANCE: optionalString,

  // Timing knobs
  DEBOUNCE_MS: z.coerce.number().int().min(0).default(15_000),
  QUOTE_TTL_MINUTES: z.coerce.number().positive().default(30),
  TURN_RETENTION_HOURS: z.coerce.number().positive().default(24),
  CONTEXT_LIMIT: z.coerce.number().int().positive().default(10),
  STORE_TIMEZONE: z
    .string()
    .trim()
    .min(1)
    .refine((zone) => IANAZone.isValidZone(zone), "unknown IANA time zone")
    .default("America/Sao_Paulo"),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  CATALOG_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
});

export type AppConfig = Readonly<{
  port: number;
  supabase: { url: string; serviceRole: string } | null;
  openai: { apiKey: string; model: string } | null;
  evolution: { baseUrl: string; apiKey: string; instance: string } | null;
  debounceMs: number;
  quoteTtlMs: number;
  turnRetentionMs: number;
  contextLimit: number;
  storeTimezone: string;
  sweepIntervalMs: number;
  catalogRetryBackoffMs: number;
}>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE
        ? { url: e.SUPABASE_URL, serviceRole: e.SUPABASE_SERVICE_ROLE }
        : null,
    openai: e.OPENAI_API_KEY ? { apiKey: e.OPENAI_API_KEY, model: e.AI_MODEL } : null,
    evolution:
      e.EVOLUTION_API_URL && e.EVOLUTION_API_KEY && e.EVOLUTION_INSTANCE
        ? {
            baseUrl: e.EVOLUTION_API_URL.replace(/\/+$/, ""),
            apiKey: e.EVOLUTION_API_KEY,
            instance: e.EVOLUTION_INSTANCE,
          }
        : null,
    debounceMs: e.DEBOUNCE_MS,
    quoteTtlMs: e.QUOTE_TTL_MINUTES * 60 * 1000,
    turnRetentionMs: e.TURN_RETENTION_HOURS * 60 * 60 * 1000,
    contextLimit: e.CONTEXT_LIMIT,
    storeTimezone: e.STORE_TIMEZONE,
    sweepIntervalMs: e.SWEEP_INTERVAL_MS,
    catalogRetryBackoffMs: e.CATALOG_RETRY_BACKOFF_MS,
  });
}
