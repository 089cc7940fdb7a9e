/**
 * Supabase client for the job ledger. Optional: without SUPABASE_URL and
 * SUPABASE_SERVICE_KEY there is no client and the ledger is a no-op.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config.js';

let _supabase: SupabaseClient | null = null;

export function getSupabase(): SupabaseClient | undefined {
  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_KEY) return undefined;
  if (!_supabase) {
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}
