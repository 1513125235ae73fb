import { z } from 'zod';

/**
 * Database model for matches table
 * Snake_case naming to match PostgreSQL conventions
 */
export const MatchDBSchema = z.object({
    match_id: z.string().min(1),
    user_id: z.number().int(),
    source: z.enum(['leetify', 'steam']),
    match_date: z.string().datetime({ offset: true }).nullable(), // ISO timestamp
    map: z.string().nullable(),
    score_team1: z.number().int().nullable(),
    score_team2: z.number().int().nullable(),
    user_team: z.number().int().nullable(),
    sharing_code: z.string().nullable(),
    leetify_match_id: z.string().nullable(),
    demo_url: z.string().nullable(),
    processed: z.boolean().default(false)
});

export type MatchDB = z.infer<typeof MatchDBSchema>;

/**
 * One player's stats in one match, keyed by (match_id, steam_id)
 */
export const MatchPlayerDBSchema = z.object({
    match_id: z.string().min(1),
    steam_id: z.string().min(1),
    team: z.number().int(),
    kills: z.number().int(),
    deaths: z.number().int(),
    assists: z.number().int(),
    headshot_percentage: z.number().min(0)
});

export type MatchPlayerDB = z.infer<typeof MatchPlayerDBSchema>;
