import { type AxiosInstance, type AxiosResponse, type CreateAxiosDefaults, isAxiosError } from 'axios';
import { createLeetifyApi } from '../../utils/api';
import { retryOnRateLimit, describeError } from '../../helper/helper';
import { LEETIFY_PAGE_SIZE } from '../../utils/constant';
import {
    LeetifyGameListSchema,
    LeetifyGameSchema,
    LeetifyTokenResponseSchema
} from '../../models/leetify/LeetifyGameModels';
import type { MatchDetails, MatchSummary, PlayerPerformance } from '../../models/provider/ProviderModels';
import { mapLeetifyGameToSummary, mapLeetifyPlayer } from '../../mappers/LeetifyMapper';
import { linkAbortSignal, type MatchDataProvider } from './matchDataProvider';

export interface LeetifyProviderOptions {
    baseUrl: string;
    apiKey?: string;
    signal?: AbortSignal;
    http?: CreateAxiosDefaults;
}

/**
 * Leetify adapter: bearer token from /api/auth/token, paginated games list,
 * per-game details with player box scores.
 */
export class LeetifyProvider implements MatchDataProvider {
    readonly source = 'leetify' as const;

    private readonly api: AxiosInstance;
    private readonly controller = new AbortController();
    private access_token: string | null = null;
    private closed = false;

    constructor(options: LeetifyProviderOptions) {
        this.api = createLeetifyApi(options.baseUrl, options.apiKey, options.http);
        linkAbortSignal(this.controller, options.signal);
    }

    unavailableReason(): string | undefined {
        return undefined;
    }

    private ensureOpen(): void {
        if (this.closed) throw new Error('[Leetify] Provider is closed');
    }

    private authHeaders(): Record<string, string> {
        if (!this.access_token) {
            throw new Error('[Leetify] Not authenticated');
        }
        return { Authorization: `Bearer ${this.access_token}` };
    }

    async authenticate(steam_id: string): Promise<boolean> {
        this.ensureOpen();
        try {
            const response = await retryOnRateLimit(() =>
                this.api.post('/api/auth/token', { steam_id }, { signal: this.controller.signal }), 'Leetify');

            const parsed = LeetifyTokenResponseSchema.safeParse(response.data);
            if (!parsed.success) {
                console.error(`(ERROR) [Leetify] Token response for ${steam_id} has no access_token`);
                return false;
            }

            this.access_token = parsed.data.access_token;
            console.log(`(OK) [Leetify] Authenticated ${steam_id}`);
            return true;
        } catch (error) {
            console.error(`(ERROR) [Leetify] Authentication failed for ${steam_id}: ${describeError(error)}`);
            return false;
        }
    }

    /**
     * Page through the games list until `limit` games were collected or a short page arrives
     */
    async getRecentMatches(steam_id: string, limit: number): Promise<MatchSummary[]> {
        this.ensureOpen();
        const matches: MatchSummary[] = [];
        let offset = 0;

        while (matches.length < limit) {
            const page_size = Math.min(LEETIFY_PAGE_SIZE, limit - matches.length);
            const response = await retryOnRateLimit(() =>
                this.api.get(`/api/profile/${steam_id}/games`, {
                    params: { limit: page_size, offset },
                    headers: this.authHeaders(),
                    signal: this.controller.signal
                }), 'Leetify');

            const page = LeetifyGameListSchema.parse(response.data);
            page.games.slice(0, page_size).forEach(game => matches.push(mapLeetifyGameToSummary(game)));

            if (page.games.length < page_size) break;
            offset += page_size;
        }

        console.log(`(INFO) [Leetify] Found ${matches.length} matches for ${steam_id}`);
        return matches;
    }

    async getMatchDetails(match_id: string, _steam_id: string): Promise<MatchDetails | null> {
        this.ensureOpen();
        let response: AxiosResponse<unknown>;
        try {
            response = await retryOnRateLimit(() =>
                this.api.get(`/api/games/${match_id}`, {
                    headers: this.authHeaders(),
                    signal: this.controller.signal
                }), 'Leetify');
        } catch (error) {
            if (isAxiosError(error) && error.response?.status === 404) {
                console.warn(`(WARNING) [Leetify] Match ${match_id} not found`);
                return null;
            }
            throw error;
        }

        const game = LeetifyGameSchema.parse(response.data);
        const players: PlayerPerformance[] = [];
        for (const player of game.players ?? []) {
            try {
                players.push(mapLeetifyPlayer(player));
            } catch (error) {
                console.warn(`(WARNING) [Leetify] Skipping player ${player.steamId} in ${match_id}: ${describeError(error)}`);
            }
        }

        return { match: mapLeetifyGameToSummary(game), players };
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.access_token = null;
        this.controller.abort();
    }
}
