import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface SupabaseSettings {
  url?: string;
  key?: string;
}

/** A client when both url and key are set, otherwise undefined (callers fall back). */
export function createSupabase(settings: SupabaseSettings): SupabaseClient | undefined {
  if (!settings.url || !settings.key) return undefined;
  return createClient(settings.url, settings.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
