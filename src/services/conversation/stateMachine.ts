/**
 * Conversation State Machine
 *
 *   idle ──start──▶ select_sport ──pick──▶ select_tournament ──pick──▶ select_match ──pick──▶ place_bet
 *     ▲                                                                                          │
 *     └──────────────────────────────── bet placed / exit ───────────────────────────────────────┘
 *
 * `decide` reads only: the catalog snapshot, the account, and two read ports
 * (live match fetch, bet history). A bet is returned as a `wager` decision
 * and committed by the caller together with the state write.
 */

import { ACCOUNT_COMMAND, BET_COMMAND, EXIT_COMMAND, START_COMMAND } from '../../constants/betting';
import type { Account, BetHistory, Catalog, ConversationState, Match, Outcome, Wager } from '../../types';
import { IDLE } from '../../types';
import { createLogger } from '../../utils/logger';
import { activeTournaments, listSports, toEventKey } from '../catalog/catalogSnapshot';
import { isInRange, parseSelection } from './formatters';
import * as copy from './messages';

const logger = createLogger('conversationStateMachine');

const BET_AMOUNT_PATTERN = /^\d+$/;

export type PlaceBetState = Extract<ConversationState, { state: 'place_bet' }>;

export interface ConversationContext {
  account: Account;
  catalog: Readonly<Catalog>;
  betCost: number;
  recentBetsLimit: number;
  fetchMatches(eventKey: string): Promise<Match[]>;
  loadBetHistory(limit: number): Promise<BetHistory>;
}

export type Decision =
  | { kind: 'reply'; next: ConversationState; reply: string }
  | { kind: 'wager'; wager: Wager; outcome: Outcome; stay: PlaceBetState };

function reply(next: ConversationState, text: string): Decision {
  return { kind: 'reply', next, reply: text };
}

/** Trim and lower-case before any comparison. */
export function normalizeInput(raw: string): string {
  return raw.trim().toLowerCase();
}

export async function decide(
  state: ConversationState,
  rawText: string,
  ctx: ConversationContext,
): Promise<Decision> {
  const text = normalizeInput(rawText);
  const user = ctx.account.whatsapp_number;

  if (text === EXIT_COMMAND && state.state !== 'idle') {
    logger.info({ user, from: state.state }, 'conversation exited');
    return reply(IDLE, copy.exitMessage());
  }

  switch (state.state) {
    case 'idle':
      return onIdle(text, ctx);
    case 'select_sport':
      return onSelectSport(state, text, ctx);
    case 'select_tournament':
      return onSelectTournament(state, text, ctx);
    case 'select_match':
      return onSelectMatch(state, text, ctx);
    case 'place_bet':
      return onPlaceBet(state, text, ctx);
    default: {
      const exhaustive: never = state;
      throw new Error(`Unhandled conversation state: ${JSON.stringify(exhaustive)}`);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Per-state handlers
// ─────────────────────────────────────────────────────────────────────────────

async function onIdle(text: string, ctx: ConversationContext): Promise<Decision> {
  const user = ctx.account.whatsapp_number;

  if (text === START_COMMAND) {
    const sports = listSports(ctx.catalog);
    if (!sports.length) {
      logger.warn({ user }, 'start requested but the catalog is empty');
      return reply(IDLE, copy.sportsUnavailableMessage());
    }
    logger.debug({ user, sports: sports.length }, 'idle → select_sport');
    return reply({ state: 'select_sport' }, copy.sportListMessage(sports));
  }

  if (text === ACCOUNT_COMMAND) {
    const history = await ctx.loadBetHistory(ctx.recentBetsLimit);
    return reply(IDLE, copy.accountSummaryMessage(ctx.account, history.recent, history.total));
  }

  logger.debug({ user, text }, 'unrecognised command while idle');
  return reply(IDLE, copy.helpMessage());
}

function onSelectSport(
  state: Extract<ConversationState, { state: 'select_sport' }>,
  text: string,
  ctx: ConversationContext,
): Decision {
  const user = ctx.account.whatsapp_number;
  const sports = listSports(ctx.catalog);

  let sport = sports.find((candidate) => candidate.toLowerCase() === text);
  if (sport === undefined) {
    const index = parseSelection(text);
    if (index !== null && isInRange(index, sports.length)) {
      sport = sports[index];
    }
  }

  if (sport === undefined) {
    logger.warn({ user, text }, 'invalid sport selection');
    return reply(state, copy.invalidSportMessage(sports));
  }

  const tournaments = activeTournaments(ctx.catalog, sport);
  if (!tournaments.length) {
    logger.info({ user, sport }, 'no active tournaments — back to idle');
    return reply(IDLE, copy.noTournamentsMessage(sport));
  }

  logger.debug({ user, sport }, 'select_sport → select_tournament');
  return reply({ state: 'select_tournament', sport }, copy.tournamentListMessage(sport, tournaments));
}

async function onSelectTournament(
  state: Extract<ConversationState, { state: 'select_tournament' }>,
  text: string,
  ctx: ConversationContext,
): Promise<Decision> {
  const user = ctx.account.whatsapp_number;
  const index = parseSelection(text);
  if (index === null) {
    logger.warn({ user, text }, 'non-numeric tournament selection');
    return reply(state, copy.invalidNumberMessage());
  }

  const tournaments = activeTournaments(ctx.catalog, state.sport);
  if (!isInRange(index, tournaments.length)) {
    logger.warn({ user, index }, 'tournament selection out of range');
    return reply(state, copy.invalidTournamentSelectionMessage());
  }

  const tournament = tournaments[index];
  const matches = await ctx.fetchMatches(toEventKey(tournament.key));
  if (!matches.length) {
    logger.info({ user, tournament: tournament.key }, 'no matches available — back to idle');
    return reply(IDLE, copy.noMatchesMessage(tournament.title));
  }

  logger.debug({ user, tournament: tournament.key, matches: matches.length }, 'select_tournament → select_match');
  return reply(
    { state: 'select_match', sport: state.sport, tournament: tournament.title, matches },
    copy.matchListMessage(tournament.title, matches),
  );
}

function onSelectMatch(
  state: Extract<ConversationState, { state: 'select_match' }>,
  text: string,
  ctx: ConversationContext,
): Decision {
  const user = ctx.account.whatsapp_number;
  const index = parseSelection(text);
  if (index === null) {
    logger.warn({ user, text }, 'non-numeric match selection');
    return reply(state, copy.invalidNumberMessage());
  }
  if (!isInRange(index, state.matches.length)) {
    logger.warn({ user, index }, 'match selection out of range');
    return reply(state, copy.invalidMatchSelectionMessage());
  }

  const match = state.matches[index];
  if (!match.odds.outcomes.length) {
    logger.info({ user, matchId: match.id }, 'match has no outcomes — back to idle');
    return reply(IDLE, copy.noOutcomesMessage(match));
  }

  logger.debug({ user, matchId: match.id }, 'select_match → place_bet');
  return reply(
    { state: 'place_bet', sport: state.sport, tournament: state.tournament, match },
    copy.outcomeListMessage(match),
  );
}

function onPlaceBet(state: PlaceBetState, text: string, ctx: ConversationContext): Decision {
  const user = ctx.account.whatsapp_number;

  if (!text.startsWith(BET_COMMAND)) {
    logger.warn({ user, text }, 'unrecognised command while placing a bet');
    return reply(state, copy.invalidBetCommandMessage());
  }

  const tokens = text.split(/\s+/);
  if (tokens.length !== 2 || tokens[0] !== BET_COMMAND || !BET_AMOUNT_PATTERN.test(tokens[1])) {
    logger.warn({ user, text }, 'malformed bet command');
    return reply(state, copy.invalidBetFormatMessage());
  }

  const outcomes = state.match.odds.outcomes;
  const index = Number.parseInt(tokens[1], 10) - 1;
  if (!isInRange(index, outcomes.length)) {
    logger.warn({ user, index }, 'outcome selection out of range');
    return reply(state, copy.invalidOutcomeSelectionMessage());
  }

  if (ctx.account.coins_balance < ctx.betCost) {
    logger.info({ user, balance: ctx.account.coins_balance, cost: ctx.betCost }, 'insufficient balance');
    return reply(state, copy.insufficientBalanceMessage(ctx.account.coins_balance, ctx.betCost));
  }

  const { match } = state;
  const outcome = outcomes[index];
  return {
    kind: 'wager',
    outcome,
    stay: state,
    wager: {
      userId: ctx.account.user_id,
      sportKey: match.sport_key ?? state.sport,
      eventName: `${match.home_team} vs ${match.away_team}`,
      matchId: match.id,
      cost: ctx.betCost,
    },
  };
}
