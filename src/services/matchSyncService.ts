import { describeError } from '../helper/helper';
import { DuplicateRecordError, SyncTimeoutError } from '../helper/errors';
import { mapPerformanceToMatchPlayerDB, mapSummaryToMatchDB } from '../mappers/MatchMapper';
import type { MatchSummary, PlayerPerformance } from '../models/provider/ProviderModels';
import type { UserDB } from '../models/database/UserDBModel';
import type { ProviderSyncResult, SourceSyncResult, UserSyncResult } from '../models/sync/SyncModels';
import type { MatchStore, MatchStoreFactory } from '../repository/matchStore';
import type { MatchDataProvider, ProviderFactory } from './providers/matchDataProvider';
import { DEFAULT_SYNC_LIMIT, SYNC_TIMEOUT_MS, type MatchSource } from '../utils/constant';

export interface SyncDependencies {
    storeFactory: MatchStoreFactory;
    providerFactory: ProviderFactory;
    sources: readonly MatchSource[];
    timeoutMs?: number;
    now?: () => Date;
}

function sourceLabel(source: MatchSource): string {
    return source.charAt(0).toUpperCase() + source.slice(1);
}

/**
 * Create the player if unseen, refresh the display name if it changed
 */
async function savePlayer(store: MatchStore, player: PlayerPerformance): Promise<void> {
    const existing = await store.getPlayerBySteamId(player.steamId);
    if (!existing) {
        await store.createPlayer({ steam_id: player.steamId, current_name: player.playerName });
    } else if (existing.current_name !== player.playerName) {
        await store.updatePlayer(player.steamId, { current_name: player.playerName });
    }
}

/**
 * Fetch details for one new match and store it with its players and teammates.
 * When anything after the match insert fails, the match rows are removed again.
 *
 * @returns false when the match was skipped (no details and nothing to enrich later)
 * @throws DuplicateRecordError when another writer stored the match first
 */
async function saveNewMatch(
    provider: MatchDataProvider,
    store: MatchStore,
    user: UserDB,
    summary: MatchSummary,
    seen_at: Date
): Promise<boolean> {
    const label = sourceLabel(provider.source);
    const details = await provider.getMatchDetails(summary.matchId, user.steam_id);

    if (!details) {
        if (!summary.shareCode) {
            console.warn(`(WARNING) [${label}] No details for match ${summary.matchId}. Skipping.`);
            return false;
        }
        // Stored without players; demo enrichment picks it up through the sharecode
        await store.createMatch(mapSummaryToMatchDB(summary, user.user_id, null, false));
        return true;
    }

    const match: MatchSummary = {
        ...details.match,
        matchId: summary.matchId,
        shareCode: details.match.shareCode ?? summary.shareCode,
        demoUrl: details.match.demoUrl ?? summary.demoUrl
    };
    const user_team = details.players.find(player => player.steamId === user.steam_id)?.team ?? null;

    await store.createMatch(mapSummaryToMatchDB(match, user.user_id, user_team, true));

    try {
        for (const player of details.players) {
            await savePlayer(store, player);
            await store.createMatchPlayer(mapPerformanceToMatchPlayerDB(match.matchId, player));
        }

        if (user_team !== null) {
            const teammate_ids = details.players
                .filter(player => player.team === user_team && player.steamId !== user.steam_id)
                .map(player => player.steamId);
            await store.recordTeammates(user.user_id, teammate_ids, seen_at.toISOString());
        }
    } catch (error) {
        try {
            await store.deleteMatch(match.matchId);
        } catch (rollback_error) {
            console.error(`(ERROR) [${label}] Rollback of match ${match.matchId} failed: ${describeError(rollback_error)}`);
        }
        throw error;
    }

    return true;
}

/**
 * One provider sub-task: authenticate, list, then store every match not stored yet.
 * Per-match failures are logged and skipped; auth and listing failures end the sub-task.
 * latest_share_code never moves past the first match that failed to store,
 * so the next walk fetches that match again.
 */
export async function syncProviderMatches(
    provider: MatchDataProvider,
    store: MatchStore,
    user: UserDB,
    limit: number,
    signal?: AbortSignal,
    now: () => Date = () => new Date()
): Promise<ProviderSyncResult> {
    const source = provider.source;
    const label = sourceLabel(source);

    const reason = provider.unavailableReason();
    if (reason) {
        console.log(`(INFO) [${label}] Skipping user ${user.user_id}: ${reason}`);
        return { source, status: 'skipped', matches_found: 0, new_matches: 0, message: reason };
    }

    if (!await provider.authenticate(user.steam_id)) {
        return { source, status: 'error', matches_found: 0, new_matches: 0, message: 'Authentication failed' };
    }

    let summaries: MatchSummary[];
    try {
        summaries = await provider.getRecentMatches(user.steam_id, limit);
    } catch (error) {
        console.error(`(ERROR) [${label}] Failed to list matches for user ${user.user_id}: ${describeError(error)}`);
        return { source, status: 'error', matches_found: 0, new_matches: 0, message: `Failed to list matches: ${describeError(error)}` };
    }

    let new_matches = 0;
    let latest_share_code: string | undefined;
    let watermark_blocked = false;

    for (const summary of summaries) {
        if (signal?.aborted) {
            console.warn(`(WARNING) [${label}] Sync for user ${user.user_id} aborted`);
            break;
        }

        try {
            const existing = await store.getMatchById(summary.matchId);
            if (existing) {
                if (summary.shareCode && !watermark_blocked) latest_share_code = summary.shareCode;
                continue;
            }

            if (await saveNewMatch(provider, store, user, summary, now())) {
                new_matches++;
                if (summary.shareCode && !watermark_blocked) latest_share_code = summary.shareCode;
                console.log(`(OK) [${label}] Stored match ${summary.matchId}`);
            }
        } catch (error) {
            if (error instanceof DuplicateRecordError && error.table === 'matches') {
                console.log(`(INFO) [${label}] Match ${summary.matchId} already stored. Skipping.`);
                if (summary.shareCode && !watermark_blocked) latest_share_code = summary.shareCode;
                continue;
            }
            console.error(`(ERROR) [${label}] Failed to store match ${summary.matchId}: ${describeError(error)}`);
            watermark_blocked = true;
        }
    }

    console.log(`(OK) [${label}] User ${user.user_id}: ${summaries.length} found, ${new_matches} new`);

    const result: ProviderSyncResult = { source, status: 'completed', matches_found: summaries.length, new_matches };
    if (latest_share_code) result.latest_share_code = latest_share_code;
    return result;
}

/**
 * Run a sub-task with its own store session and provider, releasing both afterwards
 */
async function runSubTask(
    source: MatchSource,
    user: UserDB,
    limit: number,
    deps: SyncDependencies,
    signal: AbortSignal,
    now: () => Date
): Promise<ProviderSyncResult> {
    const store = deps.storeFactory();
    let provider: MatchDataProvider | undefined;
    try {
        provider = deps.providerFactory(source, { user, store, signal });
        return await syncProviderMatches(provider, store, user, limit, signal, now);
    } finally {
        try {
            await provider?.close();
        } catch (error) {
            console.warn(`(WARNING) [${sourceLabel(source)}] Failed to close provider: ${describeError(error)}`);
        }
        await store.close();
    }
}

/**
 * Resolve with `join`, or reject with `on_timeout()` once `timeout_ms` passes first
 */
async function joinWithTimeout<T>(join: Promise<T>, timeout_ms: number, on_timeout: () => Error): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(on_timeout()), timeout_ms);
    });

    try {
        return await Promise.race([join, deadline]);
    } finally {
        clearTimeout(timer);
    }
}

function publicResult(result: ProviderSyncResult): SourceSyncResult {
    const { source, status, matches_found, new_matches, message } = result;
    return message === undefined
        ? { source, status, matches_found, new_matches }
        : { source, status, matches_found, new_matches, message };
}

function emptyResult(status: UserSyncResult['status'], user_id: number, message: string): UserSyncResult {
    return { status, user_id, total_matches_found: 0, total_new_matches: 0, sources: [], message };
}

/**
 * Sync one user's matches from every configured source.
 *
 * Sub-tasks run concurrently and are joined under one deadline. On timeout they
 * are aborted and SyncTimeoutError is thrown for the job-level retry; matches
 * already stored by then stay stored. Otherwise last_sync is always advanced,
 * and last_match_sharecode moves to the newest sharecode up to which every
 * listed match is stored.
 *
 * @throws SyncTimeoutError when the joined sub-tasks exceed the deadline
 */
export async function syncUserMatches(
    user_id: number,
    limit: number = DEFAULT_SYNC_LIMIT,
    deps: SyncDependencies
): Promise<UserSyncResult> {
    const now = deps.now ?? (() => new Date());
    const timeout_ms = deps.timeoutMs ?? SYNC_TIMEOUT_MS;
    const store = deps.storeFactory();

    try {
        const user = await store.getUserById(user_id);
        if (!user) {
            console.error(`(ERROR) User ${user_id} not found`);
            return emptyResult('error', user_id, 'User not found');
        }
        if (!user.sync_enabled) {
            console.log(`(INFO) Sync disabled for user ${user_id}. Skipping.`);
            return emptyResult('skipped', user_id, 'Sync disabled for user');
        }

        console.log(`(INFO) Syncing user ${user_id} from ${deps.sources.join(', ')} (limit ${limit})`);

        const controller = new AbortController();
        const sub_tasks = deps.sources.map(source => runSubTask(source, user, limit, deps, controller.signal, now));

        const settled = await joinWithTimeout(Promise.allSettled(sub_tasks), timeout_ms, () => {
            controller.abort();
            return new SyncTimeoutError(user_id, timeout_ms);
        });

        const results = settled.map((outcome, index): ProviderSyncResult => {
            if (outcome.status === 'fulfilled') return outcome.value;
            const source = deps.sources[index];
            console.error(`(ERROR) [${sourceLabel(source)}] Sub-task failed: ${describeError(outcome.reason)}`);
            return { source, status: 'error', matches_found: 0, new_matches: 0, message: describeError(outcome.reason) };
        });

        const latest_share_code = results.find(result => result.latest_share_code)?.latest_share_code;
        const sources = results.map(publicResult);

        const completed = sources.filter(result => result.status === 'completed');
        const total_matches_found = completed.reduce((sum, result) => sum + result.matches_found, 0);
        const total_new_matches = completed.reduce((sum, result) => sum + result.new_matches, 0);

        await store.updateUser(user_id, {
            last_sync: now().toISOString(),
            ...(latest_share_code ? { last_match_sharecode: latest_share_code } : {})
        });

        const status = completed.length > 0
            ? 'completed'
            : sources.some(result => result.status === 'error') ? 'error' : 'skipped';

        console.log(`(OK) User ${user_id} sync ${status}: ${total_matches_found} found, ${total_new_matches} new`);

        return { status, user_id, total_matches_found, total_new_matches, sources };
    } finally {
        await store.close();
    }
}
