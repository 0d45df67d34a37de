import { describe, it, expect } from 'vitest';
import {
  accountSummaryMessage,
  betPlacedMessage,
  matchListMessage,
  outcomeListMessage,
  sportListMessage,
  tournamentListMessage,
} from '../../../src/services/conversation/messages';
import type { Bet } from '../../../src/types';
import { createAccount, createMatch, createOutcome, createTournament } from '../../fixtures/factories';

function numberedLines(message: string): string[] {
  return message.split('\n').filter((line) => /^\d+\. /.test(line));
}

function createBet(overrides: Partial<Bet> = {}): Bet {
  return {
    bet_id: 1,
    user_id: 1,
    sport_key: 'soccer_epl',
    event_name: 'Arsenal vs Chelsea',
    match_id: 'match-1',
    status: 'placed',
    cost: 10,
    ...overrides,
  };
}

describe('chat messages', () => {
  it('numbers the sport list from 1 with one line per sport', () => {
    const message = sportListMessage(['soccer', 'basketball', 'tennis']);

    expect(message.split('\n')[0]).toBe('🏆 *Select a Sport:*');
    expect(numberedLines(message)).toEqual(['1. soccer', '2. basketball', '3. tennis']);
  });

  it('lists tournaments by title', () => {
    const message = tournamentListMessage('soccer', [
      createTournament({ title: 'Premier League' }),
      createTournament({ title: 'La Liga' }),
    ]);

    expect(message.split('\n')[0]).toBe('🏅 *soccer Tournaments:*');
    expect(numberedLines(message)).toEqual(['1. Premier League', '2. La Liga']);
  });

  it('lists matches with the formatted kickoff', () => {
    const message = matchListMessage('Premier League', [
      createMatch(),
      createMatch({ id: 'match-2', home_team: 'Leeds', away_team: 'Fulham', commence_time: 'TBD' }),
    ]);

    expect(numberedLines(message)).toEqual([
      '1. Arsenal vs Chelsea at March 05, 2025 at 14:30 UTC',
      '2. Leeds vs Fulham at TBD',
    ]);
  });

  it('lists outcomes with their prices', () => {
    const message = outcomeListMessage(createMatch());

    expect(numberedLines(message)).toEqual(['1. Arsenal: 2.1', '2. Draw: 3.4', '3. Chelsea: 3.2']);
  });

  it('confirms a bet with team, odds, cost and the new balance', () => {
    const lines = betPlacedMessage(createOutcome({ name: 'Draw', price: 3.4 }), 10, 490).split('\n');

    expect(lines).toContain('🏟️ *Team:* Draw');
    expect(lines).toContain('📈 *Odds:* 3.4');
    expect(lines).toContain('💸 *Cost:* 10 coins');
    expect(lines).toContain('💰 *Remaining Balance:* 490 coins');
  });

  describe('accountSummaryMessage', () => {
    it('shows balance, referral code and status badges', () => {
      const message = accountSummaryMessage(
        createAccount({ coins_balance: 470, referral_code: 'FEED1234' }),
        [createBet({ bet_id: 3, status: 'won' }), createBet({ bet_id: 2, status: 'lost', match_id: null })],
        2,
      );
      const lines = message.split('\n');

      expect(lines).toContain('🔹 Balance: 470 coins');
      expect(lines).toContain('🔹 Referral Code: FEED1234');
      expect(lines).toContain('   *Status:* 🟢 Won');
      expect(lines).toContain('   *Status:* 🔴 Lost');
      expect(lines).toContain('   *Match ID:* N/A');
      expect(numberedLines(message)).toHaveLength(2);
      expect(message).not.toContain('more bets');
    });

    it('mentions how many older bets are not shown', () => {
      const message = accountSummaryMessage(createAccount(), [createBet()], 6);

      expect(message.split('\n')).toContain('...and 5 more bets.');
    });

    it('says so when there is no history', () => {
      const message = accountSummaryMessage(createAccount(), [], 0);

      expect(message.split('\n')).toContain('📜 No bets placed yet.');
      expect(numberedLines(message)).toEqual([]);
    });
  });
});
