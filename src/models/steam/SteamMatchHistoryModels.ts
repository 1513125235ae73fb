import { z } from 'zod';

/**
 * Response of ICSGOPlayers_730/GetNextMatchSharingCode/v1
 * nextcode is "n/a" (or missing) when no newer match exists.
 */
export const SteamNextShareCodeResponseSchema = z.object({
    result: z.object({
        nextcode: z.string().nullish()
    })
});

export type SteamNextShareCodeResponse = z.infer<typeof SteamNextShareCodeResponseSchema>;
