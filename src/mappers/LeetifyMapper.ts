import type { LeetifyGame, LeetifyPlayer } from '../models/leetify/LeetifyGameModels';
import {
    MatchSummarySchema,
    PlayerPerformanceSchema,
    type MatchSummary,
    type PlayerPerformance
} from '../models/provider/ProviderModels';

/**
 * Mapper for converting Leetify API models to provider-independent models
 */

/**
 * Leetify labels teams "A"/"B"; anything else falls back to team 1
 */
export function mapLeetifyTeam(label: string | null | undefined): 1 | 2 {
    return label === 'B' ? 2 : 1;
}

function toDate(epoch_ms: number | null | undefined): Date | null {
    return epoch_ms ? new Date(epoch_ms) : null;
}

/**
 * Map a Leetify game (list or detail payload) to a MatchSummary
 *
 * @throws ZodError if validation fails
 */
export function mapLeetifyGameToSummary(game: LeetifyGame): MatchSummary {
    return MatchSummarySchema.parse({
        matchId: game.matchId,
        source: 'leetify',
        mapName: game.map ?? 'Unknown',
        startedAt: toDate(game.startTime),
        finishedAt: toDate(game.endTime),
        scoreTeam1: game.teamAScore ?? 0,
        scoreTeam2: game.teamBScore ?? 0,
        gameType: game.gameType ?? 'competitive',
        demoUrl: game.demoUrl ?? null,
        shareCode: null,
        leetifyMatchId: game.matchId
    });
}

/**
 * Map a Leetify player entry to a PlayerPerformance
 *
 * @throws ZodError if validation fails
 */
export function mapLeetifyPlayer(player: LeetifyPlayer): PlayerPerformance {
    return PlayerPerformanceSchema.parse({
        steamId: player.steamId,
        playerName: player.name ?? 'Unknown',
        team: mapLeetifyTeam(player.team),
        kills: player.kills ?? 0,
        deaths: player.deaths ?? 0,
        assists: player.assists ?? 0,
        adr: player.adr ?? 0,
        rating: player.rating ?? 0,
        headshots: player.headshots ?? 0,
        mvps: player.mvps ?? 0
    });
}
