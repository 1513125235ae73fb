import { z } from 'zod';

/**
 * Database model for players table (canonical Steam identity)
 */
export const PlayerDBSchema = z.object({
    steam_id: z.string().min(1),
    current_name: z.string().nullable()
});

export type PlayerDB = z.infer<typeof PlayerDBSchema>;

/**
 * How often a user shared a team with another player
 */
export const UserTeammateDBSchema = z.object({
    user_id: z.number().int(),
    player_steam_id: z.string().min(1),
    matches_together: z.number().int().nonnegative(),
    first_seen: z.string().datetime({ offset: true }),
    last_seen: z.string().datetime({ offset: true })
});

export type UserTeammateDB = z.infer<typeof UserTeammateDBSchema>;
