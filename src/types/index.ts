/**
 * Types barrel export
 */

export type { Account, Bet, BetHistory, BetStatus, NewBet, Wager, PlaceBetResult } from './account';
export { BET_STATUSES } from './account';
export type { Catalog, Tournament, Match, Outcome } from './catalog';
export { catalogSchema, tournamentSchema, matchSchema, outcomeSchema } from './catalog';
export type { ConversationState } from './conversation';
export { conversationStateSchema, IDLE } from './conversation';
