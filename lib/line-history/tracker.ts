/**
 * Line History Tracker
 * Records posted lines per player/stat, appends a change event whenever the line moves,
 * and keeps the chase list and alternate-line registry
 */

import { InvalidInputError } from '../errors';
import { createLogger } from '../logger';
import { getStatCategory, normalizeStatType } from '../statCategories';
import { deriveLineMovement } from '../odds/lineLogic';
import type { LineMovement } from '../odds/types';
import { directionOf, roundTo } from '../odds/utils';
import { KeyedMutex } from './keyedMutex';
import { MemoryHistoryStore, MemoryWatchlistStore, pairKey, type HistoryStore, type WatchlistStore } from './stores';
import type {
  AltLineEntry,
  AltLineInput,
  ChaseListEntry,
  ChaseListInput,
  Line,
  LineChangeEvent,
} from './types';

const log = createLogger('Line Tracker');

export interface LineHistoryTrackerOptions {
  history?: HistoryStore;
  watchlist?: WatchlistStore;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export interface ChangeFilter {
  playerId?: string;
  statType?: string;
}

/**
 * Validate a player/stat pair and return the stat's registry code.
 */
function resolveStatType(playerId: string, statType: string): string {
  if (!playerId || !statType) {
    throw new InvalidInputError('playerId and statType are required');
  }
  const category = getStatCategory(statType);
  if (!category) {
    throw new InvalidInputError(`Unknown stat type: ${statType}`);
  }
  return category.code;
}

function assertLineValue(value: number, name = 'Line value'): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${name} must be a finite number, got ${value}`);
  }
}

export class LineHistoryTracker {
  private readonly history: HistoryStore;
  private readonly watchlist: WatchlistStore;
  private readonly now: () => number;
  private readonly locks = new KeyedMutex();

  constructor(options: LineHistoryTrackerOptions = {}) {
    this.history = options.history ?? new MemoryHistoryStore();
    this.watchlist = options.watchlist ?? new MemoryWatchlistStore();
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a posted line. The first line for a pair creates no event; a different value
   * appends one LineChangeEvent; the same value is a no-op. Returns the event, if any.
   */
  async recordLine(
    playerId: string,
    statType: string,
    value: number,
    timestamp: number = this.now()
  ): Promise<LineChangeEvent | null> {
    return this.applyLine(playerId, statType, value, timestamp, false);
  }

  /**
   * Manual override. Goes through the same change detection as recordLine so edits stay auditable.
   */
  async editLine(playerId: string, statType: string, newValue: number): Promise<LineChangeEvent | null> {
    return this.applyLine(playerId, statType, newValue, this.now(), true);
  }

  private async applyLine(
    playerId: string,
    rawStatType: string,
    value: number,
    timestamp: number,
    manual: boolean
  ): Promise<LineChangeEvent | null> {
    const statType = resolveStatType(playerId, rawStatType);
    assertLineValue(value);

    // One writer per pair so two first-time records cannot both see "no prior line"
    return this.locks.runExclusive(pairKey(playerId, statType), async () => {
      const previous = await this.history.getCurrentLine(playerId, statType);
      if (previous && previous.value === value) {
        return null;
      }

      const line: Line = { playerId, statType, value, timestamp };
      if (!previous) {
        await this.history.recordChange(line, null);
        log.debug(`First line for ${playerId} ${statType}: ${value}`);
        return null;
      }

      const delta = roundTo(value - previous.value, 2);
      const event: LineChangeEvent = {
        playerId,
        statType,
        previousValue: previous.value,
        newValue: value,
        direction: directionOf(delta),
        delta,
        observedAt: timestamp,
        manual,
      };
      await this.history.recordChange(line, event);
      log.info(`${playerId} ${statType} moved ${event.direction} ${previous.value} -> ${value}${manual ? ' (manual)' : ''}`);
      return event;
    });
  }

  /**
   * Change events observed at or after `since`, oldest first.
   */
  async getChanges(since: number, filter: ChangeFilter = {}): Promise<LineChangeEvent[]> {
    const events = await this.history.listEvents(since);
    const statType = filter.statType ? normalizeStatType(filter.statType) : undefined;
    return events.filter(event =>
      (!filter.playerId || event.playerId === filter.playerId) &&
      (!statType || event.statType === statType)
    );
  }

  async getCurrentLine(playerId: string, statType: string): Promise<Line | null> {
    return this.history.getCurrentLine(playerId, normalizeStatType(statType));
  }

  async getLineMovement(playerId: string, statType: string): Promise<LineMovement> {
    return deriveLineMovement(await this.history.listLines(playerId, normalizeStatType(statType)));
  }

  /**
   * Add or overwrite the chase entry for a player/stat.
   */
  async addToChaseList(input: ChaseListInput): Promise<ChaseListEntry> {
    const statType = resolveStatType(input.playerId, input.statType);
    assertLineValue(input.lineValue);

    const now = this.now();
    const existing = await this.watchlist.getChase(input.playerId, statType);
    const entry: ChaseListEntry = {
      playerId: input.playerId,
      statType,
      lineValue: input.lineValue,
      reason: input.reason ?? '',
      status: 'active',
      addedAt: existing ? existing.addedAt : now,
      updatedAt: now,
    };
    await this.watchlist.upsertChase(entry);
    return entry;
  }

  async removeFromChaseList(playerId: string, statType: string): Promise<boolean> {
    return this.watchlist.removeChase(playerId, normalizeStatType(statType));
  }

  async listChase(): Promise<ChaseListEntry[]> {
    const entries = await this.watchlist.listChase();
    return entries.sort((a, b) => a.addedAt - b.addedAt);
  }

  /**
   * Register an alternate line. Entries are never merged, even from the same source.
   */
  async addAltLine(input: AltLineInput): Promise<AltLineEntry> {
    const statType = resolveStatType(input.playerId, input.statType);
    assertLineValue(input.mainLine, 'Main line');
    assertLineValue(input.altLine, 'Alt line');

    const entry: AltLineEntry = {
      playerId: input.playerId,
      statType,
      mainLine: input.mainLine,
      altLine: input.altLine,
      source: input.source ?? '',
      delta: roundTo(input.altLine - input.mainLine, 1),
      addedAt: this.now(),
    };
    await this.watchlist.appendAltLine(entry);
    return entry;
  }

  async listAltLines(playerId: string, statType: string): Promise<AltLineEntry[]> {
    return this.watchlist.listAltLines(playerId, normalizeStatType(statType));
  }
}
