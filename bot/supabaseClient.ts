import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logAppState } from './utils/logger.js';

// Service role client for bot operations; no user session to persist
export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  const supabase = createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    }
  });

  logAppState('CONFIG', { message: 'Supabase client initialized for bot operations' });
  return supabase;
}
