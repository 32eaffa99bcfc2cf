import { SupabaseClient, createClient } from '@supabase/supabase-js';
import { env } from '../config/env';

if (!env.SUPABASE_URL || !env.SUPABASE_KEY) {
    console.warn('[Supabase] Credentials missing. Vault falls back to local storage and knowledgebase lookups are disabled.');
}

export const supabase: SupabaseClient | null = (env.SUPABASE_URL && env.SUPABASE_KEY)
    ? createClient(env.SUPABASE_URL, env.SUPABASE_KEY)
    : null;
