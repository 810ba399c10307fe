/**
 * Bet journal
 * Records wagers placed on props, settles them against the final stat and reports returns
 */

import { InvalidInputError, NotFoundError } from '../errors';
import type { Pick } from '../edge-engine/types';
import { createLogger } from '../logger';
import type { AmericanOdds } from '../odds/types';
import { isValidAmericanOdds } from '../odds/utils';
import { getStatCategory } from '../statCategories';
import { calculateRoi, gradePick, settlementAmounts } from './roi';
import { MemoryBetStore, type BetStore } from './stores';
import type { Bet, BetFilter, BetInput, RoiSummary } from './types';

const log = createLogger('Bet Journal');

export interface BetTrackerOptions {
  store?: BetStore;
  /** Clock in epoch milliseconds. */
  now?: () => number;
  newId?: () => string;
}

function assertOdds(odds: AmericanOdds, name: string): void {
  if (!isValidAmericanOdds(odds) || !Number.isInteger(odds)) {
    throw new InvalidInputError(`${name} must be American odds such as -110 or +150, got ${odds}`);
  }
}

export function isPick(value: unknown): value is Pick {
  return value === 'OVER' || value === 'UNDER';
}

export class BetTracker {
  private readonly store: BetStore;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(options: BetTrackerOptions = {}) {
    this.store = options.store ?? new MemoryBetStore();
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  async addBet(input: BetInput): Promise<Bet> {
    const category = getStatCategory(input.statType);
    if (!input.playerId || !category) {
      throw new InvalidInputError(`A player id and a known stat type are required, got "${input.playerId}" / "${input.statType}"`);
    }
    if (!Number.isFinite(input.line)) {
      throw new InvalidInputError(`Line must be a finite number, got ${input.line}`);
    }
    if (!isPick(input.pick)) {
      throw new InvalidInputError(`Pick must be OVER or UNDER, got ${input.pick}`);
    }
    assertOdds(input.oddsPlaced, 'oddsPlaced');
    if (!Number.isFinite(input.stake) || input.stake <= 0) {
      throw new InvalidInputError(`Stake must be positive, got ${input.stake}`);
    }
    if (input.probability !== undefined && !(input.probability >= 0 && input.probability <= 100)) {
      throw new InvalidInputError(`Probability must be within [0, 100], got ${input.probability}`);
    }

    const bet: Bet = {
      id: this.newId(),
      playerId: input.playerId,
      statType: category.code,
      line: input.line,
      pick: input.pick,
      oddsPlaced: input.oddsPlaced,
      oddsClosing: null,
      stake: input.stake,
      platform: input.platform ?? 'Unknown',
      probability: input.probability ?? null,
      placedAt: this.now(),
      result: null,
      actualStat: null,
      payout: null,
      profit: null,
      settledAt: null,
    };
    await this.store.insert(bet);
    log.info(`Placed ${bet.id}: ${bet.playerId} ${bet.statType} ${bet.pick} ${bet.line} @ ${bet.oddsPlaced}`);
    return bet;
  }

  async updateClosingOdds(id: string, closingOdds: AmericanOdds): Promise<Bet> {
    assertOdds(closingOdds, 'closingOdds');
    const bet = await this.requireBet(id);
    const updated: Bet = { ...bet, oddsClosing: closingOdds };
    await this.save(updated);
    return updated;
  }

  /**
   * Grade a bet against the final stat. Settling again re-grades it.
   */
  async settleBet(id: string, actualStat: number, closingOdds?: AmericanOdds): Promise<Bet> {
    if (!Number.isFinite(actualStat)) {
      throw new InvalidInputError(`actualStat must be a finite number, got ${actualStat}`);
    }
    if (closingOdds !== undefined) {
      assertOdds(closingOdds, 'closingOdds');
    }
    const bet = await this.requireBet(id);
    const result = gradePick(bet.pick, bet.line, actualStat);
    const settled: Bet = {
      ...bet,
      oddsClosing: closingOdds ?? bet.oddsClosing,
      actualStat,
      result,
      ...settlementAmounts(result, bet.stake, bet.oddsPlaced),
      settledAt: this.now(),
    };
    await this.save(settled);
    log.info(`Settled ${id}: ${result} (${actualStat} vs ${bet.line})`);
    return settled;
  }

  async deleteBet(id: string): Promise<boolean> {
    return this.store.delete(id);
  }

  async listBets(filter: BetFilter = {}): Promise<Bet[]> {
    const bets = await this.store.list();
    return bets.filter(bet =>
      (!filter.pendingOnly || bet.result === null) &&
      (filter.since === undefined || bet.placedAt >= filter.since)
    );
  }

  async getRoi(filter: BetFilter = {}): Promise<RoiSummary> {
    return calculateRoi(await this.listBets(filter));
  }

  private async requireBet(id: string): Promise<Bet> {
    const bet = await this.store.get(id);
    if (!bet) {
      throw new NotFoundError(`No bet with id ${id}`);
    }
    return bet;
  }

  private async save(bet: Bet): Promise<void> {
    if (!(await this.store.update(bet))) {
      throw new NotFoundError(`No bet with id ${bet.id}`);
    }
  }
}
