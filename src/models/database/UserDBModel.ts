import { z } from 'zod';

/**
 * Sync-related columns of the users table.
 * last_sync and last_match_sharecode form the user's sync watermark.
 */
export const UserDBSchema = z.object({
    user_id: z.number().int(),
    steam_id: z.string().min(1),
    sync_enabled: z.boolean(),
    last_sync: z.string().datetime({ offset: true }).nullable(),
    steam_auth_code: z.string().nullable(),
    last_match_sharecode: z.string().nullable()
});

export type UserDB = z.infer<typeof UserDBSchema>;

export type UserDBUpdate = Partial<Pick<UserDB, 'last_sync' | 'last_match_sharecode' | 'steam_auth_code' | 'sync_enabled'>>;
