import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import ws from 'ws';

let serviceRoleClient: SupabaseClient | null = null;

/**
 * Server-side client with the service role key, created once.
 * Returns null when storage is not configured so callers can fall back
 * to returning images inline.
 */
export function createServiceRoleClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient | null {
  if (serviceRoleClient) {
    return serviceRoleClient;
  }

  const supabaseUrl = env.SUPABASE_URL || env.NEXT_PUBLIC_SUPABASE_URL;
  const supabaseSecretKey = env.SUPABASE_SECRET_KEY;

  if (!supabaseUrl || !supabaseSecretKey) {
    console.warn('Missing Supabase environment variables. Mockups will be returned inline.');
    return null;
  }

  serviceRoleClient = createClient(supabaseUrl, supabaseSecretKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false
    },
    // Node 20 has no global WebSocket.
    realtime: {
      transport: ws
    }
  });

  return serviceRoleClient;
}
