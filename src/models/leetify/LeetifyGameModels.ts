import { z } from 'zod';

// --- Leetify API models ---

export const LeetifyTokenResponseSchema = z.object({
    access_token: z.string().min(1)
});

export type LeetifyTokenResponse = z.infer<typeof LeetifyTokenResponseSchema>;

export const LeetifyPlayerSchema = z.object({
    steamId: z.string(),
    name: z.string().nullish(),
    team: z.string().nullish(), // "A" | "B"
    kills: z.number().int().nullish(),
    deaths: z.number().int().nullish(),
    assists: z.number().int().nullish(),
    adr: z.number().nullish(),
    rating: z.number().nullish(),
    headshots: z.number().int().nullish(),
    mvps: z.number().int().nullish()
});

export type LeetifyPlayer = z.infer<typeof LeetifyPlayerSchema>;

/**
 * Game as returned by both the games list and the game detail endpoint.
 * Timestamps are epoch milliseconds.
 */
export const LeetifyGameSchema = z.object({
    matchId: z.string(),
    map: z.string().nullish(),
    startTime: z.number().nullish(),
    endTime: z.number().nullish(),
    teamAScore: z.number().int().nullish(),
    teamBScore: z.number().int().nullish(),
    gameType: z.string().nullish(),
    demoUrl: z.string().nullish(),
    players: z.array(LeetifyPlayerSchema).optional()
});

export type LeetifyGame = z.infer<typeof LeetifyGameSchema>;

export const LeetifyGameListSchema = z.object({
    games: z.array(LeetifyGameSchema).default([])
});

export type LeetifyGameList = z.infer<typeof LeetifyGameListSchema>;
