import { MatchDBSchema, MatchPlayerDBSchema, type MatchDB, type MatchPlayerDB } from '../models/database/MatchDBModel';
import type { MatchSummary, PlayerPerformance } from '../models/provider/ProviderModels';

/**
 * Mapper for converting provider models to database rows
 */

/**
 * Headshot kills as a percentage of kills, 0 when there are no kills
 */
export function headshotPercentage(kills: number, headshots: number): number {
    if (kills <= 0) return 0;
    return (headshots / kills) * 100;
}

/**
 * Map a match to its matches row
 *
 * @param summary - Match data from the provider
 * @param user_id - Requesting user
 * @param user_team - Team the user played on, null when unknown
 * @param processed - True when player rows are stored with the match
 */
export function mapSummaryToMatchDB(
    summary: MatchSummary,
    user_id: number,
    user_team: number | null,
    processed: boolean
): MatchDB {
    const match_date = summary.startedAt ?? summary.finishedAt;

    return MatchDBSchema.parse({
        match_id: summary.matchId,
        user_id,
        source: summary.source,
        match_date: match_date ? match_date.toISOString() : null,
        map: summary.mapName,
        score_team1: summary.scoreTeam1,
        score_team2: summary.scoreTeam2,
        user_team,
        sharing_code: summary.shareCode,
        leetify_match_id: summary.leetifyMatchId,
        demo_url: summary.demoUrl,
        processed
    });
}

export function mapPerformanceToMatchPlayerDB(match_id: string, player: PlayerPerformance): MatchPlayerDB {
    if (player.headshots > player.kills) {
        console.warn(`(WARNING) Match ${match_id}: player ${player.steamId} has ${player.headshots} headshots but ${player.kills} kills`);
    }

    return MatchPlayerDBSchema.parse({
        match_id,
        steam_id: player.steamId,
        team: player.team,
        kills: player.kills,
        deaths: player.deaths,
        assists: player.assists,
        headshot_percentage: headshotPercentage(player.kills, player.headshots)
    });
}
