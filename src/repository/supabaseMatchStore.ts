import type { SupabaseClient } from '@supabase/supabase-js';
import { createSupabaseClient } from '../database/supabaseClient';
import * as matchRepository from './matchRepository';
import * as playerRepository from './playerRepository';
import * as userRepository from './userRepository';
import type { MatchStore, MatchStoreFactory } from './matchStore';
import type { MatchDB, MatchPlayerDB } from '../models/database/MatchDBModel';
import type { PlayerDB } from '../models/database/PlayerDBModel';
import type { UserDB, UserDBUpdate } from '../models/database/UserDBModel';
import type { AppConfig } from '../utils/config';

/**
 * MatchStore session backed by its own Supabase client
 */
export class SupabaseMatchStore implements MatchStore {
    constructor(private readonly supabase: SupabaseClient) {}

    getMatchById(match_id: string): Promise<MatchDB | null> {
        return matchRepository.getMatchById(this.supabase, match_id);
    }

    createMatch(match: MatchDB): Promise<MatchDB> {
        return matchRepository.insertMatch(this.supabase, match);
    }

    deleteMatch(match_id: string): Promise<void> {
        return matchRepository.deleteMatch(this.supabase, match_id);
    }

    createMatchPlayer(row: MatchPlayerDB): Promise<void> {
        return matchRepository.insertMatchPlayer(this.supabase, row);
    }

    getPlayerBySteamId(steam_id: string): Promise<PlayerDB | null> {
        return playerRepository.getPlayerBySteamId(this.supabase, steam_id);
    }

    createPlayer(player: PlayerDB): Promise<void> {
        return playerRepository.insertPlayer(this.supabase, player);
    }

    updatePlayer(steam_id: string, fields: Partial<Omit<PlayerDB, 'steam_id'>>): Promise<void> {
        return playerRepository.updatePlayer(this.supabase, steam_id, fields);
    }

    getUserById(user_id: number): Promise<UserDB | null> {
        return userRepository.getUserById(this.supabase, user_id);
    }

    updateUser(user_id: number, fields: UserDBUpdate): Promise<void> {
        return userRepository.updateUser(this.supabase, user_id, fields);
    }

    listSyncEnabledUsers(): Promise<UserDB[]> {
        return userRepository.getSyncEnabledUsers(this.supabase);
    }

    recordTeammates(user_id: number, steam_ids: string[], seen_at: string): Promise<void> {
        return playerRepository.recordTeammates(this.supabase, user_id, steam_ids, seen_at);
    }

    async close(): Promise<void> {
        await this.supabase.removeAllChannels();
    }
}

export function createSupabaseStoreFactory(config: AppConfig): MatchStoreFactory {
    return () => new SupabaseMatchStore(createSupabaseClient(config));
}
