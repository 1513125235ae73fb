import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigError } from '../helper/errors';
import type { AppConfig } from '../utils/config';

/**
 * Create a Supabase client for one store session.
 * Each sync sub-task opens its own; none is shared across tasks.
 */
export function createSupabaseClient(config: Pick<AppConfig, 'SUPABASE_PROJECT_URL' | 'SUPABASE_SERVICE_KEY'>): SupabaseClient {
    const supabase_project_url = config.SUPABASE_PROJECT_URL;
    const supabase_service_key = config.SUPABASE_SERVICE_KEY;

    if (!supabase_project_url || !supabase_service_key) {
        throw new ConfigError('Supabase Project URL/ Service Key not found in .env');
    }

    return createClient(supabase_project_url, supabase_service_key, {
        auth: { persistSession: false, autoRefreshToken: false }
    });
}
