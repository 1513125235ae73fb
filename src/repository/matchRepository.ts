import type { SupabaseClient } from '@supabase/supabase-js';
import { DuplicateRecordError } from '../helper/errors';
import { MatchDBSchema, type MatchDB, MatchPlayerDBSchema, type MatchPlayerDB } from '../models/database/MatchDBModel';

const UNIQUE_VIOLATION = '23505';

/**
 * Get a stored match by its id
 *
 * @returns Match row, or null when not stored yet
 */
export async function getMatchById(supabase: SupabaseClient, match_id: string): Promise<MatchDB | null> {
    const { data, error } = await supabase
        .from('matches')
        .select('*')
        .eq('match_id', match_id)
        .maybeSingle();

    if (error) {
        throw new Error(`Error fetching match ${match_id}: ${error.message} - ${error.details}`);
    }

    return data ? MatchDBSchema.parse(data) : null;
}

/**
 * Insert a new match.
 * Plain insert (not upsert): match_id is the dedup gate, so the second writer must fail.
 *
 * @throws DuplicateRecordError when match_id already exists
 */
export async function insertMatch(supabase: SupabaseClient, match_data: MatchDB): Promise<MatchDB> {
    const validated_match = MatchDBSchema.parse(match_data);

    const { error } = await supabase
        .from('matches')
        .insert(validated_match);

    if (error) {
        if (error.code === UNIQUE_VIOLATION) {
            throw new DuplicateRecordError('matches', validated_match.match_id);
        }
        throw new Error(`Error inserting match: ${error.message} - ${error.details}`);
    }

    return validated_match;
}

/**
 * Delete a match together with its player rows
 */
export async function deleteMatch(supabase: SupabaseClient, match_id: string): Promise<void> {
    const { error: players_error } = await supabase
        .from('match_players')
        .delete()
        .eq('match_id', match_id);

    if (players_error) {
        throw new Error(`Error deleting players of match ${match_id}: ${players_error.message}`);
    }

    const { error } = await supabase
        .from('matches')
        .delete()
        .eq('match_id', match_id);

    if (error) {
        throw new Error(`Error deleting match ${match_id}: ${error.message}`);
    }
}

/**
 * Insert one player's stats for a match
 */
export async function insertMatchPlayer(supabase: SupabaseClient, row: MatchPlayerDB): Promise<void> {
    const validated_row = MatchPlayerDBSchema.parse(row);

    const { error } = await supabase
        .from('match_players')
        .insert(validated_row);

    if (error) {
        if (error.code === UNIQUE_VIOLATION) {
            throw new DuplicateRecordError('match_players', `${row.match_id}/${row.steam_id}`);
        }
        throw new Error(`Error inserting match player: ${error.message} - ${error.details}`);
    }
}
