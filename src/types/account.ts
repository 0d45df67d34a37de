export const BET_STATUSES = ['pending', 'placed', 'won', 'lost'] as const;

export type BetStatus = (typeof BET_STATUSES)[number];

export interface Account {
  user_id: number;
  whatsapp_number: string;
  coins_balance: number;
  referral_code: string;
}

export interface Bet {
  bet_id: number;
  /** Null only for placeholder rows seeded from the catalog. */
  user_id: number | null;
  sport_key: string;
  event_name: string;
  match_id: string | null;
  status: BetStatus;
  cost: number;
}

export type NewBet = Omit<Bet, 'bet_id'>;

/** Bet placement effect committed atomically with the balance decrement. */
export interface Wager {
  userId: number;
  sportKey: string;
  eventName: string;
  matchId: string;
  cost: number;
}

export type PlaceBetResult =
  | { status: 'placed'; bet: Bet; balance: number }
  | { status: 'insufficient_balance'; balance: number };

/** A page of the newest bets plus the ledger size for the account. */
export interface BetHistory {
  recent: Bet[];
  total: number;
}
