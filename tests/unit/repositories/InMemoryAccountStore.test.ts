import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateAccountError, InMemoryAccountStore } from '../../../src/repositories';
import type { Wager } from '../../../src/types';

const USER = 'whatsapp:+15551230001';

function wager(userId: number, overrides: Partial<Wager> = {}): Wager {
  return { userId, sportKey: 'soccer_epl', eventName: 'Arsenal vs Chelsea', matchId: 'match-1', cost: 10, ...overrides };
}

describe('InMemoryAccountStore', () => {
  let store: InMemoryAccountStore;

  beforeEach(() => {
    store = new InMemoryAccountStore();
  });

  it('creates and finds accounts by identifier', async () => {
    const created = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });

    expect(await store.findByIdentifier(USER)).toEqual(created);
    expect(await store.findByIdentifier('whatsapp:+15559999999')).toBeNull();
  });

  it('rejects duplicate identifiers and referral codes', async () => {
    await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });

    await expect(store.create({ identifier: USER, referralCode: 'OTHER000', balance: 500 })).rejects.toMatchObject({
      field: 'identifier',
    });
    await expect(
      store.create({ identifier: 'whatsapp:+15550000002', referralCode: 'ABCD1234', balance: 500 }),
    ).rejects.toBeInstanceOf(DuplicateAccountError);
  });

  it('returns copies so callers cannot mutate stored accounts', async () => {
    const created = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });
    created.coins_balance = 0;

    expect((await store.findByIdentifier(USER))?.coins_balance).toBe(500);
  });

  it('saves a new balance', async () => {
    const account = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });

    await store.save({ ...account, coins_balance: 120 });

    expect((await store.findByIdentifier(USER))?.coins_balance).toBe(120);
  });

  it('places a bet: balance 500 → 490 and one placed row', async () => {
    const account = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });

    const result = await store.placeBet(wager(account.user_id));

    expect(result).toEqual({
      status: 'placed',
      balance: 490,
      bet: {
        bet_id: 1,
        user_id: account.user_id,
        sport_key: 'soccer_epl',
        event_name: 'Arsenal vs Chelsea',
        match_id: 'match-1',
        status: 'placed',
        cost: 10,
      },
    });
    expect(await store.countBets(account.user_id)).toBe(1);
  });

  it('refuses a bet the balance cannot cover without writing anything', async () => {
    const account = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 5 });

    const result = await store.placeBet(wager(account.user_id));

    expect(result).toEqual({ status: 'insufficient_balance', balance: 5 });
    expect(await store.countAllBets()).toBe(0);
  });

  it('never lets concurrent placements overdraw', async () => {
    const account = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 10 });

    const results = await Promise.all([store.placeBet(wager(account.user_id)), store.placeBet(wager(account.user_id))]);

    expect(results.map((result) => result.status).sort()).toEqual(['insufficient_balance', 'placed']);
    expect((await store.findByIdentifier(USER))?.coins_balance).toBe(0);
  });

  it('lists recent bets newest first', async () => {
    const account = await store.create({ identifier: USER, referralCode: 'ABCD1234', balance: 500 });
    await store.appendBets([
      {
        user_id: null,
        sport_key: 'soccer_epl',
        event_name: 'Premier League',
        match_id: null,
        status: 'pending',
        cost: 10,
      },
    ]);
    await store.placeBet(wager(account.user_id, { matchId: 'm1' }));
    await store.placeBet(wager(account.user_id, { matchId: 'm2' }));

    const recent = await store.recentBets(account.user_id, 5);

    expect(recent.map((bet) => bet.match_id)).toEqual(['m2', 'm1']);
    expect(await store.countAllBets()).toBe(3);
  });
});
