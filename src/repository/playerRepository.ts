import type { SupabaseClient } from '@supabase/supabase-js';
import { PlayerDBSchema, type PlayerDB } from '../models/database/PlayerDBModel';

export async function getPlayerBySteamId(supabase: SupabaseClient, steam_id: string): Promise<PlayerDB | null> {
    const { data, error } = await supabase
        .from('players')
        .select('steam_id, current_name')
        .eq('steam_id', steam_id)
        .maybeSingle();

    if (error) {
        throw new Error(`Error fetching player ${steam_id}: ${error.message}`);
    }

    return data ? PlayerDBSchema.parse(data) : null;
}

/**
 * Insert a player if unseen.
 * Uses ignoreDuplicates so concurrent sub-tasks never create two rows for one steam_id.
 */
export async function insertPlayer(supabase: SupabaseClient, player: PlayerDB): Promise<void> {
    const validated_player = PlayerDBSchema.parse(player);

    const { error } = await supabase
        .from('players')
        .upsert(validated_player, {
            onConflict: 'steam_id',
            ignoreDuplicates: true
        });

    if (error) {
        throw new Error(`Error inserting player: ${error.message} - ${error.details}`);
    }
}

export async function updatePlayer(
    supabase: SupabaseClient,
    steam_id: string,
    fields: Partial<Omit<PlayerDB, 'steam_id'>>
): Promise<void> {
    const { error } = await supabase
        .from('players')
        .update(fields)
        .eq('steam_id', steam_id);

    if (error) {
        throw new Error(`Error updating player ${steam_id}: ${error.message}`);
    }
}

/**
 * Create or increment teammate rows for a user.
 * Runs the record_teammates stored procedure so all rows change in one statement.
 */
export async function recordTeammates(
    supabase: SupabaseClient,
    user_id: number,
    steam_ids: string[],
    seen_at: string
): Promise<void> {
    if (steam_ids.length === 0) return;

    const { error } = await supabase.rpc('record_teammates', {
        p_user_id: user_id,
        p_steam_ids: steam_ids,
        p_seen_at: seen_at
    });

    if (error) {
        throw new Error(`Error recording teammates for user ${user_id}: ${error.message}`);
    }
}
