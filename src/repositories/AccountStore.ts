/**
 * Account Store
 *
 * Storage contract consumed by the conversation flow. Implemented by the
 * Supabase repository in production and by an in-memory store for local
 * runs and tests.
 */

import type { Account, Bet, NewBet, PlaceBetResult, Wager } from '../types';

export interface CreateAccountInput {
  identifier: string;
  referralCode: string;
  balance: number;
}

export interface AccountStore {
  findByIdentifier(identifier: string): Promise<Account | null>;
  /** Throws `DuplicateAccountError` when the identifier or referral code is taken. */
  create(input: CreateAccountInput): Promise<Account>;
  save(account: Account): Promise<void>;
  /** Inserts every row in one write. */
  appendBets(bets: NewBet[]): Promise<Bet[]>;
  /** Most recent first (descending bet id). */
  recentBets(userId: number, limit: number): Promise<Bet[]>;
  countBets(userId: number): Promise<number>;
  countAllBets(): Promise<number>;
  /**
   * Re-check the balance, decrement it and append a `placed` bet as one unit.
   * Either both writes happen or neither does.
   */
  placeBet(wager: Wager): Promise<PlaceBetResult>;
}

export class DuplicateAccountError extends Error {
  constructor(
    public readonly field: 'identifier' | 'referral_code',
    message = `Duplicate ${field}`,
  ) {
    super(message);
    this.name = 'DuplicateAccountError';
  }
}
