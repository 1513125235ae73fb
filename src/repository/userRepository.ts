import type { SupabaseClient } from '@supabase/supabase-js';
import { UserDBSchema, type UserDB, type UserDBUpdate } from '../models/database/UserDBModel';

const USER_COLUMNS = 'user_id, steam_id, sync_enabled, last_sync, steam_auth_code, last_match_sharecode';

export async function getUserById(supabase: SupabaseClient, user_id: number): Promise<UserDB | null> {
    const { data, error } = await supabase
        .from('users')
        .select(USER_COLUMNS)
        .eq('user_id', user_id)
        .maybeSingle();

    if (error) {
        throw new Error(`Error fetching user ${user_id}: ${error.message}`);
    }

    return data ? UserDBSchema.parse(data) : null;
}

/**
 * Update sync watermark or credential columns
 */
export async function updateUser(supabase: SupabaseClient, user_id: number, fields: UserDBUpdate): Promise<void> {
    const { error } = await supabase
        .from('users')
        .update(fields)
        .eq('user_id', user_id);

    if (error) {
        throw new Error(`Error updating user ${user_id}: ${error.message}`);
    }
}

/**
 * Get every user with sync enabled, used by the periodic all-users sync
 */
export async function getSyncEnabledUsers(supabase: SupabaseClient): Promise<UserDB[]> {
    const { data, error } = await supabase
        .from('users')
        .select(USER_COLUMNS)
        .eq('sync_enabled', true)
        .order('user_id', { ascending: true });

    if (error) {
        throw new Error(`Error fetching sync-enabled users: ${error.message}`);
    }

    return (data ?? []).map(row => UserDBSchema.parse(row));
}
