/**
 * Unit Tests: Account Repository
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AccountRepository } from '../../../src/repositories/AccountRepository';
import { DuplicateAccountError, RepositoryError } from '../../../src/repositories';
import { MockSupabaseClient, asMockSupabase } from '../../helpers/mockSupabase';
import { createAccount } from '../../fixtures/factories';
import type { NewBet } from '../../../src/types';

const USER = 'whatsapp:+15551230001';

const placedBetRow = {
  bet_id: 41,
  user_id: 1,
  sport_key: 'soccer_epl',
  event_name: 'Arsenal vs Chelsea',
  match_id: 'match-1',
  status: 'placed',
  cost: 10,
};

describe('AccountRepository', () => {
  let mockSupabase: MockSupabaseClient;
  let repo: AccountRepository;

  beforeEach(() => {
    mockSupabase = new MockSupabaseClient();
    repo = new AccountRepository(asMockSupabase(mockSupabase));
  });

  describe('findByIdentifier', () => {
    it('returns the account when found', async () => {
      const account = createAccount();
      mockSupabase.mockTable('users').setSingleResult(account);

      await expect(repo.findByIdentifier(USER)).resolves.toEqual(account);
      expect(mockSupabase.callsTo('eq')[0].args).toEqual(['whatsapp_number', USER]);
    });

    it('returns null when there is no row', async () => {
      mockSupabase.mockTable('users').setSingleResult(null);

      await expect(repo.findByIdentifier(USER)).resolves.toBeNull();
    });

    it('wraps database errors', async () => {
      mockSupabase.mockTable('users').setSingleResult(null, { message: 'connection reset', code: '08006' });

      await expect(repo.findByIdentifier(USER)).rejects.toBeInstanceOf(RepositoryError);
    });

    it('rejects rows of the wrong shape', async () => {
      mockSupabase.mockTable('users').setSingleResult({ user_id: 'one' });

      await expect(repo.findByIdentifier(USER)).rejects.toThrow('Unexpected row shape returned by database');
    });
  });

  describe('create', () => {
    it('inserts the account row', async () => {
      const account = createAccount();
      mockSupabase.mockTable('users').setSingleResult(account);

      await expect(repo.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 })).resolves.toEqual(account);
      expect(mockSupabase.callsTo('insert')[0].args).toEqual([
        [{ whatsapp_number: USER, coins_balance: 500, referral_code: 'ABCD1234' }],
      ]);
    });

    it('maps a referral code unique violation', async () => {
      mockSupabase.mockTable('users').setSingleResult(null, {
        message: 'duplicate key value violates unique constraint "users_referral_code_key"',
        code: '23505',
      });

      const attempt = repo.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });

      await expect(attempt).rejects.toBeInstanceOf(DuplicateAccountError);
      await expect(attempt).rejects.toMatchObject({ field: 'referral_code' });
    });

    it('maps an identifier unique violation', async () => {
      mockSupabase.mockTable('users').setSingleResult(null, {
        message: 'duplicate key value violates unique constraint "users_whatsapp_number_key"',
        code: '23505',
      });

      await expect(repo.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 })).rejects.toMatchObject({
        field: 'identifier',
      });
    });
  });

  describe('appendBets', () => {
    const pending: NewBet = {
      user_id: null,
      sport_key: 'soccer_epl',
      event_name: 'Premier League',
      match_id: null,
      status: 'pending',
      cost: 10,
    };

    it('inserts all rows in a single call', async () => {
      const second: NewBet = { ...pending, sport_key: 'soccer_spain_la_liga', event_name: 'La Liga' };
      mockSupabase.mockTable('bets').setResult([
        { ...pending, bet_id: 1 },
        { ...second, bet_id: 2 },
      ]);

      const bets = await repo.appendBets([pending, second]);

      expect(bets.map((bet) => bet.bet_id)).toEqual([1, 2]);
      expect(mockSupabase.callsTo('insert')).toHaveLength(1);
      expect(mockSupabase.callsTo('insert')[0].args).toEqual([[pending, second]]);
    });

    it('wraps insert errors', async () => {
      mockSupabase.mockTable('bets').setResult(null, { message: 'insert failed', code: '42P01' });

      await expect(repo.appendBets([pending])).rejects.toBeInstanceOf(RepositoryError);
    });
  });

  describe('recentBets', () => {
    it('orders by newest bet and applies the limit', async () => {
      mockSupabase.mockTable('bets').setResult([placedBetRow]);

      await expect(repo.recentBets(1, 5)).resolves.toEqual([placedBetRow]);
      expect(mockSupabase.callsTo('order')[0].args).toEqual(['bet_id', { ascending: false }]);
      expect(mockSupabase.callsTo('limit')[0].args).toEqual([5]);
    });
  });

  describe('countBets', () => {
    it('returns the exact count', async () => {
      mockSupabase.mockTable('bets').setResult(null, null, 7);

      await expect(repo.countBets(1)).resolves.toBe(7);
      expect(mockSupabase.callsTo('select')[0].args).toEqual(['bet_id', { count: 'exact', head: true }]);
    });

    it('treats a missing count as zero', async () => {
      mockSupabase.mockTable('bets').setResult(null);

      await expect(repo.countAllBets()).resolves.toBe(0);
    });
  });

  describe('placeBet', () => {
    const wager = { userId: 1, sportKey: 'soccer_epl', eventName: 'Arsenal vs Chelsea', matchId: 'match-1', cost: 10 };

    it('calls the place_bet function with the wager', async () => {
      mockSupabase.mockRpc('place_bet', { data: { status: 'placed', balance: 490, bet: placedBetRow } });

      await expect(repo.placeBet(wager)).resolves.toEqual({ status: 'placed', balance: 490, bet: placedBetRow });
      expect(mockSupabase.callsTo('rpc')[0].args).toEqual([
        'place_bet',
        { p_user_id: 1, p_sport_key: 'soccer_epl', p_event_name: 'Arsenal vs Chelsea', p_match_id: 'match-1', p_cost: 10 },
      ]);
    });

    it('passes through an insufficient balance', async () => {
      mockSupabase.mockRpc('place_bet', { data: { status: 'insufficient_balance', balance: 4 } });

      await expect(repo.placeBet(wager)).resolves.toEqual({ status: 'insufficient_balance', balance: 4 });
    });

    it('wraps RPC errors', async () => {
      mockSupabase.mockRpc('place_bet', { data: null, error: { message: 'user 1 does not exist', code: 'P0001' } });

      await expect(repo.placeBet(wager)).rejects.toThrow('place_bet RPC failed: user 1 does not exist');
    });
  });
});
