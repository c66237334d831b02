/**
 * Supabase Client Configuration
 * The service runs server-side only, so it uses the service-role key
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Create a Supabase admin client that bypasses RLS
 * NEVER expose this to user-facing code
 */
export function createSupabaseAdmin(config: {
  url: string;
  serviceKey: string;
}): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
