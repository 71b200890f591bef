import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export type SupabaseSettings = {
  url: string;
  serviceRoleKey: string;
};

export function createDbClient(
  settings: SupabaseSettings,
  fetchImpl?: typeof fetch
): SupabaseClient {
  if (!settings.url || !settings.serviceRoleKey) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required");
  }
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}

export async function dbInsert<T>(
  client: SupabaseClient,
  table: string,
  values: T
): Promise<void> {
  const { error } = await client.from(table).insert(values);
  if (error) throw new Error(`${table} insert failed: ${error.message}`);
}
