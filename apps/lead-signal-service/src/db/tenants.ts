import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { config } from "../config";
import { Tenant } from "../types/tenant";

const TENANTS_TABLE = "tenants";

// PostgREST "no rows" for .single()
const NO_ROWS = "PGRST116";

const tenantRow = z.object({
  id: z.string(),
  name: z.string(),
  api_key: z.string(),
  is_active: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

let supabaseInstance: SupabaseClient | null = null;

/**
 * Tenant lookups need Supabase; without it the service runs in development mode.
 */
export function isSupabaseConfigured(): boolean {
  return !!(config.supabaseUrl && config.supabaseServiceKey);
}

function getSupabase(): SupabaseClient | null {
  if (!isSupabaseConfigured()) return null;

  if (!supabaseInstance) {
    supabaseInstance = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: { persistSession: false },
    });
  }
  return supabaseInstance;
}

/**
 * Get an active tenant by API key (for auth). Null when no row matches.
 */
export async function getTenantByApiKey(apiKey: string): Promise<Tenant | null> {
  const supabase = getSupabase();
  if (!supabase) return null;

  const { data, error } = await supabase
    .from(TENANTS_TABLE)
    .select("id, name, api_key, is_active, created_at, updated_at")
    .eq("api_key", apiKey)
    .eq("is_active", true)
    .single();

  if (error) {
    if (error.code === NO_ROWS) return null;
    throw new Error(`Failed to get tenant: ${error.message}`);
  }

  const parsed = tenantRow.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Malformed tenant row: ${parsed.error.issues.map(i => i.message).join("; ")}`);
  }
  return parsed.data;
}
