import { DuplicateRecordError } from '../helper/errors';
import { MatchDBSchema, MatchPlayerDBSchema, type MatchDB, type MatchPlayerDB } from '../models/database/MatchDBModel';
import { PlayerDBSchema, type PlayerDB, type UserTeammateDB } from '../models/database/PlayerDBModel';
import { UserDBSchema, type UserDB, type UserDBUpdate } from '../models/database/UserDBModel';
import type { MatchStore, MatchStoreFactory } from './matchStore';

/**
 * Process-local tables shared by every MemoryMatchStore session.
 * Used with STORE_DRIVER=memory and by the tests.
 */
export class MemoryDatabase {
    readonly matches = new Map<string, MatchDB>();
    readonly matchPlayers = new Map<string, MatchPlayerDB>();
    readonly players = new Map<string, PlayerDB>();
    readonly users = new Map<number, UserDB>();
    readonly teammates = new Map<string, UserTeammateDB>();
    sessionsOpened = 0;
    sessionsClosed = 0;

    addUser(user: UserDB): void {
        this.users.set(user.user_id, UserDBSchema.parse(user));
    }

    getTeammate(user_id: number, steam_id: string): UserTeammateDB | undefined {
        return this.teammates.get(`${user_id}:${steam_id}`);
    }

    getMatchPlayers(match_id: string): MatchPlayerDB[] {
        return [...this.matchPlayers.values()].filter(row => row.match_id === match_id);
    }
}

/**
 * One session over a MemoryDatabase.
 * Every check-then-write happens within a single tick, so the first writer wins.
 */
export class MemoryMatchStore implements MatchStore {
    private closed = false;

    constructor(private readonly db: MemoryDatabase) {
        db.sessionsOpened++;
    }

    private ensureOpen(): void {
        if (this.closed) throw new Error('Store session is closed');
    }

    async getMatchById(match_id: string): Promise<MatchDB | null> {
        this.ensureOpen();
        return this.db.matches.get(match_id) ?? null;
    }

    async createMatch(match: MatchDB): Promise<MatchDB> {
        this.ensureOpen();
        const validated_match = MatchDBSchema.parse(match);
        if (this.db.matches.has(validated_match.match_id)) {
            throw new DuplicateRecordError('matches', validated_match.match_id);
        }
        this.db.matches.set(validated_match.match_id, validated_match);
        return validated_match;
    }

    async deleteMatch(match_id: string): Promise<void> {
        this.ensureOpen();
        for (const [key, row] of this.db.matchPlayers) {
            if (row.match_id === match_id) this.db.matchPlayers.delete(key);
        }
        this.db.matches.delete(match_id);
    }

    async createMatchPlayer(row: MatchPlayerDB): Promise<void> {
        this.ensureOpen();
        const validated_row = MatchPlayerDBSchema.parse(row);
        const key = `${validated_row.match_id}/${validated_row.steam_id}`;
        if (this.db.matchPlayers.has(key)) {
            throw new DuplicateRecordError('match_players', key);
        }
        this.db.matchPlayers.set(key, validated_row);
    }

    async getPlayerBySteamId(steam_id: string): Promise<PlayerDB | null> {
        this.ensureOpen();
        return this.db.players.get(steam_id) ?? null;
    }

    async createPlayer(player: PlayerDB): Promise<void> {
        this.ensureOpen();
        const validated_player = PlayerDBSchema.parse(player);
        if (!this.db.players.has(validated_player.steam_id)) {
            this.db.players.set(validated_player.steam_id, validated_player);
        }
    }

    async updatePlayer(steam_id: string, fields: Partial<Omit<PlayerDB, 'steam_id'>>): Promise<void> {
        this.ensureOpen();
        const existing = this.db.players.get(steam_id);
        if (existing) this.db.players.set(steam_id, { ...existing, ...fields });
    }

    async getUserById(user_id: number): Promise<UserDB | null> {
        this.ensureOpen();
        return this.db.users.get(user_id) ?? null;
    }

    async updateUser(user_id: number, fields: UserDBUpdate): Promise<void> {
        this.ensureOpen();
        const existing = this.db.users.get(user_id);
        if (existing) this.db.users.set(user_id, { ...existing, ...fields });
    }

    async listSyncEnabledUsers(): Promise<UserDB[]> {
        this.ensureOpen();
        return [...this.db.users.values()]
            .filter(user => user.sync_enabled)
            .sort((a, b) => a.user_id - b.user_id);
    }

    async recordTeammates(user_id: number, steam_ids: string[], seen_at: string): Promise<void> {
        this.ensureOpen();
        for (const steam_id of new Set(steam_ids)) {
            const key = `${user_id}:${steam_id}`;
            const existing = this.db.teammates.get(key);
            this.db.teammates.set(key, existing
                ? { ...existing, matches_together: existing.matches_together + 1, last_seen: seen_at }
                : { user_id, player_steam_id: steam_id, matches_together: 1, first_seen: seen_at, last_seen: seen_at });
        }
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.db.sessionsClosed++;
    }
}

export function createMemoryStoreFactory(db: MemoryDatabase): MatchStoreFactory {
    return () => new MemoryMatchStore(db);
}
