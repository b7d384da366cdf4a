import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getSupabaseAnonKey, getSupabaseUrl, isSupabaseConfigured } from '../../lib/supabaseEnv';

let _client: SupabaseClient | null = null;

/** Lazy-initialized Supabase client so a missing environment only fails the call that needs it */
export function getSupabaseClient(): SupabaseClient {
  if (_client) return _client;
  if (!isSupabaseConfigured()) {
    throw new Error(
      'Supabase is not configured. Set SUPABASE_URL (https://<project-ref>.supabase.co) and SUPABASE_ANON_KEY.'
    );
  }
  try {
    _client = createClient(getSupabaseUrl(), getSupabaseAnonKey(), {
      auth: { persistSession: false },
    });
    return _client;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(
      `Supabase connection failed: ${msg}. Remove any quotes around SUPABASE_URL and SUPABASE_ANON_KEY and use the project's anon key.`
    );
  }
}
