/**
 * Persistence contract for the bet journal, with an in-memory implementation
 */

import type { Bet } from './types';

export interface BetStore {
  insert(bet: Bet): Promise<void>;
  /** Replace a stored bet by id. Returns false when no bet has that id. */
  update(bet: Bet): Promise<boolean>;
  get(id: string): Promise<Bet | null>;
  delete(id: string): Promise<boolean>;
  /** Every bet, oldest placement first. */
  list(): Promise<Bet[]>;
}

export class MemoryBetStore implements BetStore {
  private bets = new Map<string, Bet>();

  async insert(bet: Bet): Promise<void> {
    this.bets.set(bet.id, { ...bet });
  }

  async update(bet: Bet): Promise<boolean> {
    if (!this.bets.has(bet.id)) return false;
    this.bets.set(bet.id, { ...bet });
    return true;
  }

  async get(id: string): Promise<Bet | null> {
    const bet = this.bets.get(id);
    return bet ? { ...bet } : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.bets.delete(id);
  }

  async list(): Promise<Bet[]> {
    return Array.from(this.bets.values())
      .map(bet => ({ ...bet }))
      .sort((a, b) => a.placedAt - b.placedAt);
  }
}
