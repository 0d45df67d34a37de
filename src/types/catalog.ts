/**
 * Sports catalog and match payloads served by the data gateway.
 *
 * The schemas double as the runtime validation of gateway responses and
 * of match snapshots read back from the conversation store.
 */

import { z } from 'zod';

export const tournamentSchema = z.object({
  title: z.string(),
  key: z.string(),
  active: z.boolean().default(false),
});

export const catalogSchema = z.record(z.string(), z.array(z.unknown()));

export const outcomeSchema = z.object({
  name: z.string(),
  price: z.number(),
});

export const matchSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  home_team: z.string(),
  away_team: z.string(),
  commence_time: z.string(),
  sport_key: z.string().optional(),
  odds: z
    .object({
      outcomes: z.array(outcomeSchema).default([]),
    })
    .default({ outcomes: [] }),
});

export type Tournament = z.infer<typeof tournamentSchema>;
export type Outcome = z.infer<typeof outcomeSchema>;
export type Match = z.infer<typeof matchSchema>;

/** Sport key → tournaments, in provider order. */
export type Catalog = Record<string, Tournament[]>;
