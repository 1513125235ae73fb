import { z } from 'zod';

export const MatchSourceSchema = z.enum(['leetify', 'steam']);

/**
 * Provider-independent match listing entry.
 * Steam listings only know the sharecode; map, scores and dates stay null.
 */
export const MatchSummarySchema = z.object({
    matchId: z.string().min(1),
    source: MatchSourceSchema,
    mapName: z.string().nullable(),
    startedAt: z.date().nullable(),
    finishedAt: z.date().nullable(),
    scoreTeam1: z.number().int().nullable(),
    scoreTeam2: z.number().int().nullable(),
    gameType: z.string(),
    demoUrl: z.string().nullable(),
    shareCode: z.string().nullable(),
    leetifyMatchId: z.string().nullable()
});

export type MatchSummary = z.infer<typeof MatchSummarySchema>;

/**
 * One player's box score in a match. team is 1 or 2.
 */
export const PlayerPerformanceSchema = z.object({
    steamId: z.string().min(1),
    playerName: z.string(),
    team: z.union([z.literal(1), z.literal(2)]),
    kills: z.number().int().nonnegative(),
    deaths: z.number().int().nonnegative(),
    assists: z.number().int().nonnegative(),
    adr: z.number(),
    rating: z.number(),
    headshots: z.number().int().nonnegative(),
    mvps: z.number().int().nonnegative()
});

export type PlayerPerformance = z.infer<typeof PlayerPerformanceSchema>;

export const MatchDetailsSchema = z.object({
    match: MatchSummarySchema,
    players: z.array(PlayerPerformanceSchema)
});

export type MatchDetails = z.infer<typeof MatchDetailsSchema>;
