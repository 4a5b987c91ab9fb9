import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { StoreConfig } from './config.js'

/** Service-role client for the crawler; no session persistence */
export function createSupabase(config: StoreConfig): SupabaseClient {
  return createClient(config.url, config.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  })
}
