/**
 * Account Service
 *
 * First contact from an unseen identifier creates an account with the
 * starting balance and a fresh referral code.
 */

import { randomUUID } from 'node:crypto';
import { REFERRAL_CODE_MAX_ATTEMPTS } from '../../constants/betting';
import { ACCOUNT_CREATION_FAILED } from '../../constants/errorMessages';
import { AppError } from '../../errors';
import { DuplicateAccountError, type AccountStore } from '../../repositories';
import type { Account, BetHistory } from '../../types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('accountService');

export interface LoadedAccount {
  account: Account;
  created: boolean;
}

export interface AccountServiceOptions {
  startingBalance: number;
  referralCodeGenerator?: () => string;
}

/** `3f2a9c1e-…` → `3F2A9C1E`. */
export function generateReferralCode(): string {
  return randomUUID().split('-')[0].toUpperCase();
}

export class AccountService {
  private readonly nextReferralCode: () => string;

  constructor(
    private readonly store: AccountStore,
    private readonly options: AccountServiceOptions,
  ) {
    this.nextReferralCode = options.referralCodeGenerator ?? generateReferralCode;
  }

  async loadOrCreate(identifier: string): Promise<LoadedAccount> {
    const existing = await this.store.findByIdentifier(identifier);
    if (existing) {
      return { account: existing, created: false };
    }

    for (let attempt = 1; attempt <= REFERRAL_CODE_MAX_ATTEMPTS; attempt++) {
      const referralCode = this.nextReferralCode();
      try {
        const account = await this.store.create({
          identifier,
          referralCode,
          balance: this.options.startingBalance,
        });
        logger.info({ user: identifier, userId: account.user_id }, 'account created');
        return { account, created: true };
      } catch (err) {
        if (!(err instanceof DuplicateAccountError)) throw err;

        if (err.field === 'identifier') {
          const raced = await this.store.findByIdentifier(identifier);
          if (raced) return { account: raced, created: false };
          throw err;
        }
        logger.warn({ user: identifier, attempt }, 'referral code collision — retrying');
      }
    }

    throw AppError.internal(ACCOUNT_CREATION_FAILED, { identifier, attempts: REFERRAL_CODE_MAX_ATTEMPTS });
  }

  async betHistory(account: Account, limit: number): Promise<BetHistory> {
    const [recent, total] = await Promise.all([
      this.store.recentBets(account.user_id, limit),
      this.store.countBets(account.user_id),
    ]);
    return { recent, total };
  }
}
