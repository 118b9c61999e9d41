import { createClient as createSupabaseClient, type SupabaseClient } from '@supabase/supabase-js';

let supabase: SupabaseClient | null = null;

/** Returns null when Supabase isn't configured; callers fall back to the in-process store. */
export function createClient(
    url = process.env.NEXT_PUBLIC_SUPABASE_URL,
    serviceKey = process.env.SUPABASE_SERVICE_ROLE_KEY
): SupabaseClient | null {
    if (!supabase && url && serviceKey) {
        supabase = createSupabaseClient(url, serviceKey, {
            auth: { persistSession: false },
        });
    }
    return supabase;
}
