/**
 * Chat copy sent back over WhatsApp.
 *
 * Kept separate from the state machine so wording changes never touch the
 * transition logic. WhatsApp renders `*text*` as bold.
 */

import type { Account, Bet, BetStatus, Match, Outcome, Tournament } from '../../types';
import { capitalize, formatKickoff, numbered } from './formatters';

const STATUS_BADGES: Record<BetStatus, string> = {
  pending: '⚪',
  placed: '🔵',
  won: '🟢',
  lost: '🔴',
};

// ─────────────────────────────────────────────────────────────────────────────
// Onboarding / navigation
// ─────────────────────────────────────────────────────────────────────────────

export function welcomeMessage(balance: number): string {
  return [
    '🎉 *Welcome to the Betting Bot!*',
    `💰 Your account has been created with *${balance} coins*.`,
    '',
    "⚽ Type *'start'* to browse sports and place a bet.",
    "📊 Type *'my account'* to check your balance and bet history.",
  ].join('\n');
}

export function helpMessage(): string {
  return [
    '❓ *Invalid command.*',
    "✅ Type *'start'* to place a bet.",
    "📊 Type *'my account'* to view your balance.",
    "🚪 Type *'exit'* at any time to cancel.",
  ].join('\n');
}

export function exitMessage(): string {
  return "👋 You have exited the betting process. Type *'start'* to begin again.";
}

export function sportsUnavailableMessage(): string {
  return '⚠️ Sports are unavailable right now. Please try again later.';
}

export function somethingWentWrongMessage(): string {
  return '⚠️ Something went wrong on our side. Please try again in a moment.';
}

// ─────────────────────────────────────────────────────────────────────────────
// Selection lists
// ─────────────────────────────────────────────────────────────────────────────

export function sportListMessage(sports: readonly string[]): string {
  return [
    '🏆 *Select a Sport:*',
    ...numbered(sports, (sport) => sport),
    '',
    '✍️ Reply with the number or the name of the sport.',
  ].join('\n');
}

export function invalidSportMessage(sports: readonly string[]): string {
  return ['❌ Invalid sport selection. Please choose from the list.', '', sportListMessage(sports)].join('\n');
}

export function tournamentListMessage(sport: string, tournaments: readonly Tournament[]): string {
  return [
    `🏅 *${sport} Tournaments:*`,
    ...numbered(tournaments, (tournament) => tournament.title),
    '',
    '✍️ Reply with the number of the tournament.',
  ].join('\n');
}

export function noTournamentsMessage(sport: string): string {
  return `⚠️ No active tournaments for ${sport} right now. Type *'start'* to pick another sport.`;
}

export function matchListMessage(tournament: string, matches: readonly Match[]): string {
  return [
    `⚽ *${tournament} Matches:*`,
    ...numbered(
      matches,
      (match) => `${match.home_team} vs ${match.away_team} at ${formatKickoff(match.commence_time)}`,
    ),
    '',
    '✍️ Reply with the number of the match.',
  ].join('\n');
}

export function noMatchesMessage(tournament: string): string {
  return `⚠️ No matches available right now for ${tournament}. Type *'start'* to try again.`;
}

export function outcomeListMessage(match: Match): string {
  return [
    `✅ *Match Selected:* ${match.home_team} vs ${match.away_team}`,
    `🕒 ${formatKickoff(match.commence_time)}`,
    '',
    '📈 *Available Odds:*',
    ...numbered(match.odds.outcomes, (outcome) => `${outcome.name}: ${outcome.price}`),
    '',
    "✍️ Type *'bet <number>'* to place your bet (e.g. *bet 1*).",
  ].join('\n');
}

export function noOutcomesMessage(match: Match): string {
  return `⚠️ No odds are available for ${match.home_team} vs ${match.away_team}. Type *'start'* to choose another match.`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Invalid input
// ─────────────────────────────────────────────────────────────────────────────

export function invalidNumberMessage(): string {
  return '❌ Invalid input. Please reply with a number from the list.';
}

export function invalidTournamentSelectionMessage(): string {
  return '❌ Invalid tournament selection. Please choose a number from the list.';
}

export function invalidMatchSelectionMessage(): string {
  return '❌ Invalid match selection. Please choose a number from the list.';
}

export function invalidBetFormatMessage(): string {
  return "❌ Invalid bet format. Use *'bet <number>'*, for example *bet 1*.";
}

export function invalidOutcomeSelectionMessage(): string {
  return '❌ Invalid choice. Please pick one of the listed odds.';
}

export function invalidBetCommandMessage(): string {
  return "❓ Type *'bet <number>'* to place your bet or *'exit'* to cancel.";
}

// ─────────────────────────────────────────────────────────────────────────────
// Betting / account
// ─────────────────────────────────────────────────────────────────────────────

export function insufficientBalanceMessage(balance: number, cost: number): string {
  return `❌ Insufficient balance. A bet costs ${cost} coins and you have ${balance} coins.`;
}

export function betFailedMessage(): string {
  return '⚠️ Your bet could not be placed. Please try again.';
}

export function betPlacedMessage(outcome: Outcome, cost: number, balance: number): string {
  return [
    '✅ *Bet Placed!*',
    `🏟️ *Team:* ${outcome.name}`,
    `📈 *Odds:* ${outcome.price}`,
    `💸 *Cost:* ${cost} coins`,
    `💰 *Remaining Balance:* ${balance} coins`,
    '',
    "⚽ Type *'start'* to place another bet.",
  ].join('\n');
}

export function accountSummaryMessage(account: Account, recent: readonly Bet[], total: number): string {
  const lines = [
    '💰 *Your Account Details:*',
    `🔹 Balance: ${account.coins_balance} coins`,
    `🔹 Referral Code: ${account.referral_code}`,
    '',
  ];

  if (!recent.length) {
    lines.push('📜 No bets placed yet.');
  } else {
    lines.push('📜 *Your Recent Bet History:*');
    recent.forEach((bet, idx) => {
      lines.push(
        `${idx + 1}. *Event:* ${bet.event_name}`,
        `   *Match ID:* ${bet.match_id ?? 'N/A'}`,
        `   *Cost:* ${bet.cost} coins`,
        `   *Status:* ${STATUS_BADGES[bet.status]} ${capitalize(bet.status)}`,
      );
    });
    if (total > recent.length) {
      lines.push('', `...and ${total - recent.length} more bets.`);
    }
  }

  lines.push('', "⚽ Type *'start'* to place a new bet.");
  return lines.join('\n');
}
