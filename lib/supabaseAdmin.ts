import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getOptionalEnv } from './env';

let supabaseAdminInstance: SupabaseClient | null = null;

/**
 * Service-role client, created on first use.
 * Returns null when Supabase is not configured so callers can fall back to memory stores.
 */
export function getSupabaseAdmin(): SupabaseClient | null {
  if (supabaseAdminInstance) return supabaseAdminInstance;

  const supabaseUrl = getOptionalEnv('NEXT_PUBLIC_SUPABASE_URL');
  const supabaseServiceKey = getOptionalEnv('SUPABASE_SERVICE_ROLE_KEY');
  if (!supabaseUrl || !supabaseServiceKey) return null;

  supabaseAdminInstance = createClient(supabaseUrl, supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    }
  });
  return supabaseAdminInstance;
}
