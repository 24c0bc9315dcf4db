/**
 * Herald: Supabase Client
 *
 * Service-role client for the table-backed seen store. Created only when
 * STORE_BACKEND=supabase; the file backend never touches this module's
 * network path.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Admin client for the polling service. Bypasses Row Level Security,
 * so the key must stay server-side.
 */
export function createServiceClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown): Error {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new Error(`Supabase error: ${error.message}${code ? ` (code: ${code})` : ''}`);
  }
  return new Error('Unknown Supabase error');
}
