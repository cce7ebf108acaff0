import { createClient, type SupabaseClient } from '@supabase/supabase-js';

// Server-side client; the engine runs with the service role and no user session.
export function createSupabaseClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url.trim(), serviceKey.trim(), {
    auth: { persistSession: false, autoRefreshToken: false }
  });
}
