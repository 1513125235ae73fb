import type { MatchReference } from '../models/sharecode/ShareCodeModels';
import { MatchSummarySchema, type MatchSummary } from '../models/provider/ProviderModels';

/**
 * Map a walked sharecode to a MatchSummary.
 * The Steam listing has no box score: map, scores and dates stay null until the demo is parsed.
 */
export function mapMatchReferenceToSummary(reference: MatchReference): MatchSummary {
    return MatchSummarySchema.parse({
        matchId: reference.matchId.toString(),
        source: 'steam',
        mapName: null,
        startedAt: null,
        finishedAt: null,
        scoreTeam1: null,
        scoreTeam2: null,
        gameType: 'competitive',
        demoUrl: reference.demoUrl,
        shareCode: reference.shareCode,
        leetifyMatchId: null
    });
}
