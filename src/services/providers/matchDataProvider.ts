import type { MatchDetails, MatchSummary } from '../../models/provider/ProviderModels';
import type { UserDB } from '../../models/database/UserDBModel';
import type { MatchStore } from '../../repository/matchStore';
import type { MatchSource } from '../../utils/constant';

/**
 * Capability set every match data source implements.
 * An instance serves one sync sub-task: it owns its HTTP client and auth state,
 * and close() releases both.
 */
export interface MatchDataProvider {
    readonly source: MatchSource;

    /**
     * Reason this provider cannot run for the user, decided without any network call.
     * Sub-tasks with a reason report `skipped`.
     */
    unavailableReason(): string | undefined;

    authenticate(steam_id: string): Promise<boolean>;

    /** @throws when the listing call fails */
    getRecentMatches(steam_id: string, limit: number): Promise<MatchSummary[]>;

    /** @returns null when the provider has no details for the match */
    getMatchDetails(match_id: string, steam_id: string): Promise<MatchDetails | null>;

    close(): Promise<void>;
}

/**
 * Per sub-task inputs handed to a provider
 */
export interface ProviderContext {
    user: UserDB;
    store: MatchStore;
    signal?: AbortSignal;
}

export type ProviderFactory = (source: MatchSource, context: ProviderContext) => MatchDataProvider;

/**
 * Demo parsing boundary: turns a replay into full match details
 */
export interface DemoAnalyzer {
    analyze(demo: { matchId: string; shareCode: string; demoUrl: string; steamId: string }): Promise<MatchDetails | null>;
}

/**
 * Abort `controller` when the outer signal aborts
 */
export function linkAbortSignal(controller: AbortController, signal: AbortSignal | undefined): void {
    if (!signal) return;
    if (signal.aborted) {
        controller.abort();
        return;
    }
    signal.addEventListener('abort', () => controller.abort(), { once: true });
}
