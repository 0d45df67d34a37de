/**
 * Conversation Service
 *
 * Runs one inbound message end to end while holding the per-user lock:
 *
 *   load/create account → decide → commit wager → send replies → commit state
 *
 * Replies are handed to the message gateway before the state is written, so
 * a crash between the two replays the turn instead of skipping a reply.
 */

import type { AccountStore } from '../../repositories';
import type { ConversationState, Catalog, Match } from '../../types';
import { createLogger, errorMessage } from '../../utils/logger';
import type { AccountService } from '../account/accountService';
import type { MessageGateway } from '../messaging/messageGateway';
import type { ConversationStateStore } from './conversationStateStore';
import * as copy from './messages';
import { decide, type Decision } from './stateMachine';

const logger = createLogger('conversationService');

export interface ConversationSettings {
  betCost: number;
  recentBetsLimit: number;
}

export interface ConversationServiceDeps {
  accounts: AccountStore;
  accountService: AccountService;
  states: ConversationStateStore;
  messages: MessageGateway;
  catalog: () => Readonly<Catalog>;
  fetchMatches: (eventKey: string) => Promise<Match[]>;
  settings: ConversationSettings;
}

interface Turn {
  next: ConversationState;
  reply: string;
}

/** Set once the wager is in the ledger and its confirmation has gone out. */
interface TurnProgress {
  betPlaced: boolean;
}

export class ConversationService {
  constructor(private readonly deps: ConversationServiceDeps) {}

  /**
   * Process one inbound message. Never rejects: unexpected failures are
   * logged and answered with a generic apology, leaving the state as it was.
   */
  async handleInbound(identifier: string, text: string): Promise<void> {
    const progress: TurnProgress = { betPlaced: false };
    try {
      await this.deps.states.transact(identifier, (current) => this.runTurn(identifier, text, current, progress));
    } catch (err) {
      if (progress.betPlaced) {
        await this.resetAfterPlacedBet(identifier, err);
        return;
      }
      logger.error({ user: identifier, error: errorMessage(err) }, 'conversation turn failed');
      await this.deps.messages.send(identifier, copy.somethingWentWrongMessage());
    }
  }

  /**
   * The bet is already in the ledger and confirmed, so the user must not stay
   * in place_bet where a repeated `bet` would place it again.
   */
  private async resetAfterPlacedBet(identifier: string, cause: unknown): Promise<void> {
    logger.error({ user: identifier, error: errorMessage(cause) }, 'state commit failed after bet was placed');
    try {
      await this.deps.states.clear(identifier);
    } catch (err) {
      logger.error({ user: identifier, error: errorMessage(err) }, 'could not reset state after placed bet');
    }
  }

  private async runTurn(
    identifier: string,
    text: string,
    current: ConversationState,
    progress: TurnProgress,
  ): Promise<ConversationState> {
    const { accountService, messages, settings } = this.deps;

    const { account, created } = await accountService.loadOrCreate(identifier);
    if (created) {
      await messages.send(identifier, copy.welcomeMessage(account.coins_balance));
    }

    const decision = await decide(current, text, {
      account,
      catalog: this.deps.catalog(),
      betCost: settings.betCost,
      recentBetsLimit: settings.recentBetsLimit,
      fetchMatches: this.deps.fetchMatches,
      loadBetHistory: (limit) => accountService.betHistory(account, limit),
    });

    const turn = decision.kind === 'wager' ? await this.commitWager(identifier, decision) : decision;

    if (turn.next.state !== current.state) {
      logger.info({ user: identifier, from: current.state, to: turn.next.state }, 'state transition');
    }

    await messages.send(identifier, turn.reply);
    if (decision.kind === 'wager' && turn.next.state === 'idle') {
      progress.betPlaced = true;
    }
    return turn.next;
  }

  private async commitWager(identifier: string, decision: Extract<Decision, { kind: 'wager' }>): Promise<Turn> {
    const { wager, outcome, stay } = decision;

    try {
      const result = await this.deps.accounts.placeBet(wager);
      if (result.status === 'insufficient_balance') {
        logger.info({ user: identifier, balance: result.balance, cost: wager.cost }, 'bet rejected at commit: insufficient balance');
        return { next: stay, reply: copy.insufficientBalanceMessage(result.balance, wager.cost) };
      }

      logger.info(
        { user: identifier, betId: result.bet.bet_id, matchId: wager.matchId, outcome: outcome.name, balance: result.balance },
        'bet placed',
      );
      return { next: { state: 'idle' }, reply: copy.betPlacedMessage(outcome, wager.cost, result.balance) };
    } catch (err) {
      logger.error({ user: identifier, matchId: wager.matchId, error: errorMessage(err) }, 'bet placement failed');
      return { next: stay, reply: copy.betFailedMessage() };
    }
  }
}
