import { z } from 'zod';
import { matchSchema } from './catalog';

/**
 * Per-user dialogue state. Absence of a stored entry is `idle`.
 */
export const conversationStateSchema = z.discriminatedUnion('state', [
  z.object({ state: z.literal('idle') }),
  z.object({ state: z.literal('select_sport') }),
  z.object({ state: z.literal('select_tournament'), sport: z.string() }),
  z.object({
    state: z.literal('select_match'),
    sport: z.string(),
    tournament: z.string(),
    matches: z.array(matchSchema),
  }),
  z.object({
    state: z.literal('place_bet'),
    sport: z.string(),
    tournament: z.string(),
    match: matchSchema,
  }),
]);

export type ConversationState = z.infer<typeof conversationStateSchema>;

export const IDLE: ConversationState = { state: 'idle' };
