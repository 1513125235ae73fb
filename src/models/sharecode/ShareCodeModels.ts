import { z } from 'zod';

/**
 * Fields packed into a match sharecode.
 * matchId and outcomeId are uint64, kept as bigint to avoid precision loss.
 */
export const DecodedShareCodeSchema = z.object({
    matchId: z.bigint().nonnegative(),
    outcomeId: z.bigint().nonnegative(),
    tokenId: z.number().int().min(0).max(0xffff)
});

export type DecodedShareCode = z.infer<typeof DecodedShareCodeSchema>;

/**
 * One entry produced by the match history walker
 */
export const MatchReferenceSchema = DecodedShareCodeSchema.extend({
    shareCode: z.string(),
    demoUrl: z.string().url()
});

export type MatchReference = z.infer<typeof MatchReferenceSchema>;
