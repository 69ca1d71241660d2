import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "./config.js";

/** Cliente service-role. null si Supabase no esta configurado (modo dev con store en memoria). */
export function createDb(
  config: Pick<AppConfig, "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY">,
): SupabaseClient | null {
  const url = config.SUPABASE_URL;
  const key = config.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) return null;
  return createClient(url, key, { auth: { persistSession: false } });
}
