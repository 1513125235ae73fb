import type { MatchDB, MatchPlayerDB } from '../models/database/MatchDBModel';
import type { PlayerDB } from '../models/database/PlayerDBModel';
import type { UserDB, UserDBUpdate } from '../models/database/UserDBModel';

/**
 * Persistence operations used by the sync path.
 * One instance is one session: open it per sub-task and close it when done.
 */
export interface MatchStore {
    getMatchById(match_id: string): Promise<MatchDB | null>;
    /** @throws DuplicateRecordError when match_id already exists */
    createMatch(match: MatchDB): Promise<MatchDB>;
    /** Removes a match and its match_players rows */
    deleteMatch(match_id: string): Promise<void>;
    createMatchPlayer(row: MatchPlayerDB): Promise<void>;

    getPlayerBySteamId(steam_id: string): Promise<PlayerDB | null>;
    /** Inserting an existing steam_id leaves the stored row untouched */
    createPlayer(player: PlayerDB): Promise<void>;
    updatePlayer(steam_id: string, fields: Partial<Omit<PlayerDB, 'steam_id'>>): Promise<void>;

    getUserById(user_id: number): Promise<UserDB | null>;
    updateUser(user_id: number, fields: UserDBUpdate): Promise<void>;
    listSyncEnabledUsers(): Promise<UserDB[]>;

    /** Create or increment one teammate row per steam id, all or nothing */
    recordTeammates(user_id: number, steam_ids: string[], seen_at: string): Promise<void>;

    close(): Promise<void>;
}

export type MatchStoreFactory = () => MatchStore;
