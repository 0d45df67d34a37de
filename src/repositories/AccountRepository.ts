/**
 * Account Repository
 *
 * Supabase-backed AccountStore over the `users` and `bets` tables.
 * Bet placement goes through the `place_bet` PL/pgSQL function so the
 * balance decrement and the ledger insert share one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { BaseRepository, UNIQUE_VIOLATION } from './BaseRepository';
import { DuplicateAccountError, type AccountStore, type CreateAccountInput } from './AccountStore';
import { BET_STATUSES, type Account, type Bet, type NewBet, type PlaceBetResult, type Wager } from '../types';

// ─────────────────────────────────────────────────────────────────────────────
// Row shapes
// ─────────────────────────────────────────────────────────────────────────────

const ACCOUNT_COLUMNS = 'user_id, whatsapp_number, coins_balance, referral_code';
const BET_COLUMNS = 'bet_id, user_id, sport_key, event_name, match_id, status, cost';

const accountRowSchema = z.object({
  user_id: z.number().int(),
  whatsapp_number: z.string(),
  coins_balance: z.number().int(),
  referral_code: z.string(),
});

const betRowSchema = z.object({
  bet_id: z.number().int(),
  user_id: z.number().int().nullable(),
  sport_key: z.string(),
  event_name: z.string(),
  match_id: z.string().nullable(),
  status: z.enum(BET_STATUSES),
  cost: z.number().int(),
});

const placeBetRpcSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('placed'), balance: z.number().int(), bet: betRowSchema }),
  z.object({ status: z.literal('insufficient_balance'), balance: z.number().int() }),
]);

// ─────────────────────────────────────────────────────────────────────────────
// Repository
// ─────────────────────────────────────────────────────────────────────────────

export class AccountRepository extends BaseRepository implements AccountStore {
  constructor(supabase: SupabaseClient) {
    super(supabase, 'accountRepository');
  }

  async findByIdentifier(identifier: string): Promise<Account | null> {
    const { data, error } = await this.supabase
      .from('users')
      .select(ACCOUNT_COLUMNS)
      .eq('whatsapp_number', identifier)
      .maybeSingle();

    if (error) {
      throw this.wrapError('findByIdentifier query error', error, { identifier });
    }

    return data ? this.parseRow(accountRowSchema, data, { identifier }) : null;
  }

  async create(input: CreateAccountInput): Promise<Account> {
    const { data, error } = await this.supabase
      .from('users')
      .insert([
        {
          whatsapp_number: input.identifier,
          coins_balance: input.balance,
          referral_code: input.referralCode,
        },
      ])
      .select(ACCOUNT_COLUMNS)
      .single();

    if (error) {
      if (error.code === UNIQUE_VIOLATION) {
        const field = error.message.includes('referral_code') ? 'referral_code' : 'identifier';
        throw new DuplicateAccountError(field, error.message);
      }
      throw this.wrapError('create account error', error, { identifier: input.identifier });
    }

    return this.parseRow(accountRowSchema, data, { identifier: input.identifier });
  }

  async save(account: Account): Promise<void> {
    const { error } = await this.supabase
      .from('users')
      .update({ coins_balance: account.coins_balance })
      .eq('user_id', account.user_id);

    if (error) {
      throw this.wrapError('save account error', error, { userId: account.user_id });
    }
  }

  async appendBets(bets: NewBet[]): Promise<Bet[]> {
    const { data, error } = await this.supabase
      .from('bets')
      .insert(bets)
      .select(BET_COLUMNS);

    if (error) {
      throw this.wrapError('appendBets error', error, { count: bets.length });
    }

    return this.parseRows(betRowSchema, data, { count: bets.length });
  }

  async recentBets(userId: number, limit: number): Promise<Bet[]> {
    const { data, error } = await this.supabase
      .from('bets')
      .select(BET_COLUMNS)
      .eq('user_id', userId)
      .order('bet_id', { ascending: false })
      .limit(limit);

    if (error) {
      throw this.wrapError('recentBets query error', error, { userId, limit });
    }

    return this.parseRows(betRowSchema, data, { userId });
  }

  async countBets(userId: number): Promise<number> {
    const { count, error } = await this.supabase
      .from('bets')
      .select('bet_id', { count: 'exact', head: true })
      .eq('user_id', userId);

    if (error) {
      throw this.wrapError('countBets query error', error, { userId });
    }

    return count ?? 0;
  }

  async countAllBets(): Promise<number> {
    const { count, error } = await this.supabase
      .from('bets')
      .select('bet_id', { count: 'exact', head: true });

    if (error) {
      throw this.wrapError('countAllBets query error', error);
    }

    return count ?? 0;
  }

  async placeBet(wager: Wager): Promise<PlaceBetResult> {
    const { data, error } = await this.supabase.rpc('place_bet', {
      p_user_id: wager.userId,
      p_sport_key: wager.sportKey,
      p_event_name: wager.eventName,
      p_match_id: wager.matchId,
      p_cost: wager.cost,
    });

    if (error) {
      throw this.wrapError('place_bet RPC failed', error, { userId: wager.userId, matchId: wager.matchId });
    }

    const result = this.parseRow(placeBetRpcSchema, data, { userId: wager.userId });
    if (result.status === 'placed') {
      this.logger.info({ userId: wager.userId, betId: result.bet.bet_id, balance: result.balance }, 'bet placed');
    }
    return result;
  }
}
