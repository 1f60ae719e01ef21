// src/db.ts
import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "./config";

export function createSupabase(config: AppConfig): SupabaseClient | null {
  if (!config.supabase) {
    console.warn("[DB] SUPABASE_URL / SUPABASE_SERVICE_ROLE missing → in-memory stores");
    return null;
  }
  console.log("[DB] SUPABASE_SERVICE_ROLE len", config.supabase.serviceRole.length);
  return createClient(config.supabase.url, config.supabase.serviceRole, {
    auth: { persistSession: false },
  });
}
