/**
 * Persistence contracts for the line history tracker, with in-memory implementations
 * Supabase-backed implementations live in lib/supabaseStores.ts
 */

import type { AltLineEntry, ChaseListEntry, Line, LineChangeEvent } from './types';

export interface HistoryStore {
  getCurrentLine(playerId: string, statType: string): Promise<Line | null>;
  /**
   * Append a line observation, make it the current line for its pair and append its
   * change event, if any, as one write. Either everything is stored or nothing is.
   */
  recordChange(line: Line, event: LineChangeEvent | null): Promise<void>;
  listLines(playerId: string, statType: string): Promise<Line[]>;
  /** Events with observedAt >= since, oldest first. */
  listEvents(since: number): Promise<LineChangeEvent[]>;
}

export interface WatchlistStore {
  upsertChase(entry: ChaseListEntry): Promise<void>;
  getChase(playerId: string, statType: string): Promise<ChaseListEntry | null>;
  removeChase(playerId: string, statType: string): Promise<boolean>;
  listChase(): Promise<ChaseListEntry[]>;
  appendAltLine(entry: AltLineEntry): Promise<void>;
  listAltLines(playerId: string, statType: string): Promise<AltLineEntry[]>;
}

export function pairKey(playerId: string, statType: string): string {
  return JSON.stringify([playerId, statType]);
}

export class MemoryHistoryStore implements HistoryStore {
  private current = new Map<string, Line>();
  private lines = new Map<string, Line[]>();
  private events: LineChangeEvent[] = [];

  async getCurrentLine(playerId: string, statType: string): Promise<Line | null> {
    return this.current.get(pairKey(playerId, statType)) ?? null;
  }

  async recordChange(line: Line, event: LineChangeEvent | null): Promise<void> {
    const key = pairKey(line.playerId, line.statType);
    const list = this.lines.get(key) ?? [];
    list.push({ ...line });
    this.lines.set(key, list);
    this.current.set(key, { ...line });
    if (event) {
      this.events.push({ ...event });
    }
  }

  async listLines(playerId: string, statType: string): Promise<Line[]> {
    return (this.lines.get(pairKey(playerId, statType)) ?? []).map(line => ({ ...line }));
  }

  async listEvents(since: number): Promise<LineChangeEvent[]> {
    return this.events
      .filter(event => event.observedAt >= since)
      .map(event => ({ ...event }))
      // Stable sort keeps append order for equal timestamps
      .sort((a, b) => a.observedAt - b.observedAt);
  }
}

export class MemoryWatchlistStore implements WatchlistStore {
  private chase = new Map<string, ChaseListEntry>();
  private altLines = new Map<string, AltLineEntry[]>();

  async upsertChase(entry: ChaseListEntry): Promise<void> {
    this.chase.set(pairKey(entry.playerId, entry.statType), { ...entry });
  }

  async getChase(playerId: string, statType: string): Promise<ChaseListEntry | null> {
    const entry = this.chase.get(pairKey(playerId, statType));
    return entry ? { ...entry } : null;
  }

  async removeChase(playerId: string, statType: string): Promise<boolean> {
    return this.chase.delete(pairKey(playerId, statType));
  }

  async listChase(): Promise<ChaseListEntry[]> {
    return Array.from(this.chase.values()).map(entry => ({ ...entry }));
  }

  async appendAltLine(entry: AltLineEntry): Promise<void> {
    const key = pairKey(entry.playerId, entry.statType);
    const list = this.altLines.get(key) ?? [];
    list.push({ ...entry });
    this.altLines.set(key, list);
  }

  async listAltLines(playerId: string, statType: string): Promise<AltLineEntry[]> {
    return (this.altLines.get(pairKey(playerId, statType)) ?? []).map(entry => ({ ...entry }));
  }
}
