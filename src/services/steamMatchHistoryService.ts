import { type AxiosInstance, type AxiosResponse, type CreateAxiosDefaults, isAxiosError } from 'axios';
import { createSteamApi } from '../utils/api';
import { retryOnRateLimit, describeError } from '../helper/helper';
import { SteamApiError } from '../helper/errors';
import { decodeShareCode } from './sharecodeService';
import { demoUrl } from './demoLocatorService';
import { SteamNextShareCodeResponseSchema } from '../models/steam/SteamMatchHistoryModels';
import type { MatchReference } from '../models/sharecode/ShareCodeModels';
import {
    DEFAULT_REPLAY_SERVER,
    STEAM_API_URL,
    STEAM_NO_MORE_MATCHES,
    type ShareCodeByteOrder
} from '../utils/constant';

/**
 * Remote "get next sharecode" operation used by the walker
 */
export interface NextShareCodeSource {
    /**
     * @returns The sharecode following `known_code`, or null when there is none
     */
    getNextShareCode(steam_id: string, auth_code: string, known_code: string): Promise<string | null>;
}

/**
 * Client for the Steam Web API match sharing code endpoint.
 * One instance per sync sub-task; close() aborts in-flight requests.
 */
export class SteamMatchHistoryClient implements NextShareCodeSource {
    private readonly api: AxiosInstance;
    private readonly controller = new AbortController();
    private closed = false;

    constructor(
        private readonly api_key: string,
        base_url: string = STEAM_API_URL,
        http_overrides: CreateAxiosDefaults = {}
    ) {
        this.api = createSteamApi(base_url, http_overrides);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    async getNextShareCode(steam_id: string, auth_code: string, known_code: string): Promise<string | null> {
        if (this.closed) {
            throw new SteamApiError('Steam match history client is closed');
        }

        let response: AxiosResponse<unknown>;
        try {
            response = await retryOnRateLimit(() =>
                this.api.get('/ICSGOPlayers_730/GetNextMatchSharingCode/v1', {
                    params: {
                        key: this.api_key,
                        steamid: steam_id,
                        steamidkey: auth_code,
                        knowncode: known_code
                    },
                    signal: this.controller.signal
                }), 'Steam');
        } catch (error) {
            if (isAxiosError(error) && error.response) {
                throw new SteamApiError(`Steam API returned HTTP ${error.response.status}`, error.response.status);
            }
            throw error;
        }

        const parsed = SteamNextShareCodeResponseSchema.safeParse(response.data);
        const next_code = parsed.success ? parsed.data.result.nextcode : undefined;

        if (next_code === STEAM_NO_MORE_MATCHES) return null;
        if (response.status !== 200) {
            throw new SteamApiError(`Steam API returned HTTP ${response.status}`, response.status);
        }
        if (!parsed.success) {
            throw new SteamApiError('Unexpected Steam API response shape');
        }
        return next_code ?? null;
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.controller.abort();
    }
}

export interface MatchHistoryWalkParams {
    steamId: string;
    authCode: string;
    startShareCode: string;
    maxMatches: number;
    client: NextShareCodeSource;
    replayServer?: number;
    byteOrder?: ShareCodeByteOrder;
    signal?: AbortSignal;
}

/**
 * Walk the next-sharecode chain starting after `startShareCode`.
 * Lazy and single-use: every call starts again from the supplied code.
 *
 * Stops (Exhausted) when `maxMatches` entries were produced, the remote has no
 * next code, a returned code does not decode, a code repeats, or a remote call
 * fails. Remote failures are logged and end the walk with what was collected.
 */
export async function* walkMatchHistory(params: MatchHistoryWalkParams): AsyncGenerator<MatchReference, void, undefined> {
    const byte_order = params.byteOrder ?? 'reversed';
    const replay_server = params.replayServer ?? DEFAULT_REPLAY_SERVER;
    const seen_codes = new Set<string>([params.startShareCode]);
    let known_code = params.startShareCode;
    let produced = 0;

    while (produced < params.maxMatches) {
        if (params.signal?.aborted) {
            console.warn(`(WARNING) [Steam] Match history walk aborted after ${produced} matches`);
            return;
        }

        let next_code: string | null;
        try {
            next_code = await params.client.getNextShareCode(params.steamId, params.authCode, known_code);
        } catch (error) {
            console.warn(`(WARNING) [Steam] Failed to fetch next sharecode after ${known_code}: ${describeError(error)}`);
            return;
        }

        if (!next_code) {
            console.log(`(INFO) [Steam] No more matches after ${known_code}`);
            return;
        }
        if (seen_codes.has(next_code)) {
            console.warn(`(WARNING) [Steam] Sharecode ${next_code} repeated, stopping walk`);
            return;
        }

        const decoded = decodeShareCode(next_code, byte_order);
        if (!decoded) {
            console.warn(`(WARNING) [Steam] Received undecodable sharecode: ${next_code}`);
            return;
        }

        produced++;
        seen_codes.add(next_code);
        known_code = next_code;

        yield {
            shareCode: next_code,
            matchId: decoded.matchId,
            outcomeId: decoded.outcomeId,
            tokenId: decoded.tokenId,
            demoUrl: demoUrl(decoded.matchId, decoded.outcomeId, decoded.tokenId, replay_server)
        };
    }
}

/**
 * Collect a full walk into an array
 */
export async function fetchMatchHistory(params: MatchHistoryWalkParams): Promise<MatchReference[]> {
    const references: MatchReference[] = [];
    for await (const reference of walkMatchHistory(params)) {
        references.push(reference);
    }
    console.log(`(OK) [Steam] Walked ${references.length} matches from ${params.startShareCode}`);
    return references;
}
