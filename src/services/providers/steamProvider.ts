import { validateShareCode, decodeShareCode } from '../sharecodeService';
import { demoUrl } from '../demoLocatorService';
import { fetchMatchHistory, type NextShareCodeSource } from '../steamMatchHistoryService';
import { mapMatchReferenceToSummary } from '../../mappers/SteamMapper';
import type { MatchDetails, MatchSummary } from '../../models/provider/ProviderModels';
import type { MatchStore } from '../../repository/matchStore';
import { STEAM_API_KEY_PLACEHOLDER, type ShareCodeByteOrder } from '../../utils/constant';
import type { DemoAnalyzer, MatchDataProvider } from './matchDataProvider';

export type ClosableShareCodeSource = NextShareCodeSource & { close(): void };

export interface SteamProviderOptions {
    apiKey: string | undefined;
    authCode: string | null;
    startShareCode: string | null;
    store: MatchStore;
    /** Created by the factory only when an API key is configured */
    historyClient: ClosableShareCodeSource | null;
    replayServer: number;
    byteOrder: ShareCodeByteOrder;
    demoAnalyzer?: DemoAnalyzer;
    signal?: AbortSignal;
}

/**
 * Steam adapter: lists matches by walking the user's sharecode chain.
 * Needs the Steam Web API key plus the user's game auth code and a starting sharecode.
 */
export class SteamProvider implements MatchDataProvider {
    readonly source = 'steam' as const;

    private authenticated = false;
    private closed = false;
    /** Matches returned by the last listing, by match id */
    private readonly listed = new Map<string, MatchSummary>();

    constructor(private readonly options: SteamProviderOptions) {
        const { signal, historyClient } = options;
        if (signal && historyClient) {
            signal.addEventListener('abort', () => historyClient.close(), { once: true });
        }
    }

    unavailableReason(): string | undefined {
        const api_key = this.options.apiKey;
        if (!api_key || api_key === STEAM_API_KEY_PLACEHOLDER || !this.options.historyClient) {
            return 'Steam API key not configured';
        }
        if (!this.options.authCode || !this.options.startShareCode) {
            return 'Steam auth code or starting sharecode not configured';
        }
        return undefined;
    }

    /**
     * No remote call: checks that every credential is present and the sharecode is well formed
     */
    async authenticate(steam_id: string): Promise<boolean> {
        if (this.closed) throw new Error('[Steam] Provider is closed');

        const reason = this.unavailableReason();
        if (reason) {
            console.warn(`(WARNING) [Steam] Cannot authenticate ${steam_id}: ${reason}`);
            return false;
        }
        if (!validateShareCode(this.options.startShareCode)) {
            console.error(`(ERROR) [Steam] Invalid starting sharecode for ${steam_id}: ${this.options.startShareCode}`);
            return false;
        }

        this.authenticated = true;
        return true;
    }

    async getRecentMatches(steam_id: string, limit: number): Promise<MatchSummary[]> {
        const { authCode, startShareCode, historyClient } = this.options;
        if (this.closed) throw new Error('[Steam] Provider is closed');
        if (!this.authenticated || !authCode || !startShareCode || !historyClient) {
            throw new Error('[Steam] Not authenticated');
        }

        const references = await fetchMatchHistory({
            steamId: steam_id,
            authCode,
            startShareCode,
            maxMatches: limit,
            client: historyClient,
            replayServer: this.options.replayServer,
            byteOrder: this.options.byteOrder,
            signal: this.options.signal
        });

        const summaries = references.map(mapMatchReferenceToSummary);
        for (const summary of summaries) this.listed.set(summary.matchId, summary);
        return summaries;
    }

    /**
     * Details come from demo analysis of the match's sharecode, taken from the last
     * listing or else from the stored match. Without a demo analyzer this is always null
     * and the sync stores the match without players.
     */
    async getMatchDetails(match_id: string, steam_id: string): Promise<MatchDetails | null> {
        const { demoAnalyzer } = this.options;
        if (!demoAnalyzer) return null;

        const listed = this.listed.get(match_id);
        const stored = listed ? null : await this.options.store.getMatchById(match_id);
        const share_code = listed?.shareCode ?? stored?.sharing_code ?? null;
        if (!share_code) {
            console.warn(`(WARNING) [Steam] No sharecode known for match ${match_id}`);
            return null;
        }

        const decoded = decodeShareCode(share_code, this.options.byteOrder);
        if (!decoded) {
            console.warn(`(WARNING) [Steam] Sharecode for match ${match_id} does not decode: ${share_code}`);
            return null;
        }

        return demoAnalyzer.analyze({
            matchId: match_id,
            shareCode: share_code,
            demoUrl: listed?.demoUrl ?? stored?.demo_url ??
                demoUrl(decoded.matchId, decoded.outcomeId, decoded.tokenId, this.options.replayServer),
            steamId: steam_id
        });
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.authenticated = false;
        this.listed.clear();
        this.options.historyClient?.close();
    }
}
