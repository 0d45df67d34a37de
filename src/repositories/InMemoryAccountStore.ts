/**
 * In-memory AccountStore for local runs without Supabase and for tests.
 *
 * Every mutation runs synchronously between awaits, so the balance check in
 * `placeBet` cannot interleave with another placement in the same process.
 */

import { DuplicateAccountError, type AccountStore, type CreateAccountInput } from './AccountStore';
import type { Account, Bet, NewBet, PlaceBetResult, Wager } from '../types';

export class InMemoryAccountStore implements AccountStore {
  private readonly accounts = new Map<string, Account>();
  private readonly ledger: Bet[] = [];
  private nextUserId = 1;
  private nextBetId = 1;

  async findByIdentifier(identifier: string): Promise<Account | null> {
    const account = this.accounts.get(identifier);
    return account ? { ...account } : null;
  }

  async create(input: CreateAccountInput): Promise<Account> {
    if (this.accounts.has(input.identifier)) {
      throw new DuplicateAccountError('identifier');
    }
    for (const existing of this.accounts.values()) {
      if (existing.referral_code === input.referralCode) {
        throw new DuplicateAccountError('referral_code');
      }
    }
    const account: Account = {
      user_id: this.nextUserId++,
      whatsapp_number: input.identifier,
      coins_balance: input.balance,
      referral_code: input.referralCode,
    };
    this.accounts.set(input.identifier, account);
    return { ...account };
  }

  async save(account: Account): Promise<void> {
    const existing = this.accounts.get(account.whatsapp_number);
    if (!existing) {
      throw new Error(`Account ${account.user_id} does not exist`);
    }
    existing.coins_balance = account.coins_balance;
  }

  async appendBets(bets: NewBet[]): Promise<Bet[]> {
    const rows: Bet[] = bets.map((bet) => ({ ...bet, bet_id: this.nextBetId++ }));
    this.ledger.push(...rows);
    return rows.map((row) => ({ ...row }));
  }

  async recentBets(userId: number, limit: number): Promise<Bet[]> {
    return this.ledger
      .filter((bet) => bet.user_id === userId)
      .sort((a, b) => b.bet_id - a.bet_id)
      .slice(0, limit)
      .map((bet) => ({ ...bet }));
  }

  async countBets(userId: number): Promise<number> {
    return this.ledger.filter((bet) => bet.user_id === userId).length;
  }

  async countAllBets(): Promise<number> {
    return this.ledger.length;
  }

  async placeBet(wager: Wager): Promise<PlaceBetResult> {
    const account = this.findById(wager.userId);
    if (!account) {
      throw new Error(`Account ${wager.userId} does not exist`);
    }
    if (account.coins_balance < wager.cost) {
      return { status: 'insufficient_balance', balance: account.coins_balance };
    }
    account.coins_balance -= wager.cost;
    const bet: Bet = {
      bet_id: this.nextBetId++,
      user_id: wager.userId,
      sport_key: wager.sportKey,
      event_name: wager.eventName,
      match_id: wager.matchId,
      status: 'placed',
      cost: wager.cost,
    };
    this.ledger.push(bet);
    return { status: 'placed', bet: { ...bet }, balance: account.coins_balance };
  }

  private findById(userId: number): Account | undefined {
    for (const account of this.accounts.values()) {
      if (account.user_id === userId) return account;
    }
    return undefined;
  }
}
