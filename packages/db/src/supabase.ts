/**
 * Supabase Client
 * Singleton client for database operations
 */

import { createClient, type PostgrestError, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, DatabaseError, getBaseConfig } from "@trend-evidence/core";

let supabaseInstance: SupabaseClient | null = null;

/**
 * Get the Supabase client instance
 * Lazy-loaded singleton
 */
export function getSupabase(): SupabaseClient {
  if (!supabaseInstance) {
    const config = getBaseConfig().supabase;

    if (!config) {
      throw new ConfigError(
        "Missing Supabase configuration. Set SUPABASE_URL and SUPABASE_KEY environment variables."
      );
    }

    supabaseInstance = createClient(config.url, config.key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}

/**
 * Check if Supabase is configured
 */
export function isSupabaseConfigured(): boolean {
  return getBaseConfig().supabase !== undefined;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}

/**
 * Wrap a PostgREST error with the table and operation it came from
 */
export function toDatabaseError(
  table: string,
  operation: string,
  error: PostgrestError
): DatabaseError {
  return new DatabaseError(`${table} ${operation} failed: ${error.message}`, table, operation, {
    context: { code: error.code, details: error.details, hint: error.hint },
  });
}
