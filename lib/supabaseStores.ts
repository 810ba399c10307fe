/**
 * Supabase-backed stores
 * Persistent, shared storage for the stat cache, line history, watch-list and bet journal.
 * Table definitions: supabase/migrations/
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { BetStore } from './bets/stores';
import type { Bet, BetResult } from './bets/types';
import type { CacheEntry, CacheStore, PayloadGuard } from './cacheStores';
import { asNumber, asString, getField } from './json';
import type { HistoryStore, WatchlistStore } from './line-history/stores';
import type { AltLineEntry, ChaseListEntry, Line, LineChangeEvent, MovementDirection } from './line-history/types';
import { createLogger } from './logger';

const log = createLogger('Supabase Store');

function supabaseError(operation: string, error: { message: string }): Error {
  return new Error(`Supabase ${operation} failed: ${error.message}`);
}

// ==================== STAT CACHE ====================

export class SupabaseCacheStore<T> implements CacheStore<T> {
  private readonly client: SupabaseClient;
  private readonly isPayload: PayloadGuard<T>;
  private readonly table: string;

  constructor(client: SupabaseClient, isPayload: PayloadGuard<T>, table = 'stat_cache') {
    this.client = client;
    this.isPayload = isPayload;
    this.table = table;
  }

  private toEntry(row: unknown): CacheEntry<T> | null {
    const key = asString(getField(row, 'cache_key'));
    const payload = getField(row, 'payload');
    const fetchedAt = asNumber(getField(row, 'fetched_at'));
    const ttl = asNumber(getField(row, 'ttl'));
    if (key === null || fetchedAt === null || ttl === null || !this.isPayload(payload)) return null;
    return { key, payload, fetchedAt, ttl };
  }

  async get(key: string): Promise<CacheEntry<T> | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('cache_key, payload, fetched_at, ttl')
      .eq('cache_key', key)
      .maybeSingle();

    if (error) {
      // Reads fail soft: a miss just triggers a fetch
      log.error(`Cache read failed for ${key}:`, error.message);
      return null;
    }
    return data ? this.toEntry(data) : null;
  }

  async set(entry: CacheEntry<T>): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert({
        cache_key: entry.key,
        payload: entry.payload,
        fetched_at: entry.fetchedAt,
        ttl: entry.ttl,
        updated_at: new Date().toISOString(),
      }, { onConflict: 'cache_key' });

    if (error) {
      // The fetched payload is still returned to the caller
      log.error(`Cache write failed for ${entry.key}:`, error.message);
    }
  }

  async delete(key: string): Promise<boolean> {
    const { error, count } = await this.client
      .from(this.table)
      .delete({ count: 'exact' })
      .eq('cache_key', key);

    if (error) throw supabaseError('cache delete', error);
    return (count ?? 0) > 0;
  }

  async entries(): Promise<CacheEntry<T>[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('cache_key, payload, fetched_at, ttl');

    if (error) throw supabaseError('cache list', error);
    return (data ?? []).map(row => this.toEntry(row)).filter((e): e is CacheEntry<T> => e !== null);
  }
}

// ==================== LINE HISTORY ====================

function toDirection(value: unknown): MovementDirection | null {
  return value === 'UP' || value === 'DOWN' || value === 'UNCHANGED' ? value : null;
}

function toLine(row: unknown): Line | null {
  const playerId = asString(getField(row, 'player_id'));
  const statType = asString(getField(row, 'stat_type'));
  const value = asNumber(getField(row, 'value'));
  const timestamp = asNumber(getField(row, 'observed_at'));
  if (playerId === null || statType === null || value === null || timestamp === null) return null;
  return { playerId, statType, value, timestamp };
}

function toEvent(row: unknown): LineChangeEvent | null {
  const playerId = asString(getField(row, 'player_id'));
  const statType = asString(getField(row, 'stat_type'));
  const previousValue = asNumber(getField(row, 'previous_value'));
  const newValue = asNumber(getField(row, 'new_value'));
  const direction = toDirection(getField(row, 'direction'));
  const delta = asNumber(getField(row, 'delta'));
  const observedAt = asNumber(getField(row, 'observed_at'));
  if (
    playerId === null || statType === null || previousValue === null || newValue === null ||
    direction === null || delta === null || observedAt === null
  ) {
    return null;
  }
  return {
    playerId,
    statType,
    previousValue,
    newValue,
    direction,
    delta,
    observedAt,
    manual: getField(row, 'manual') === true,
  };
}

export class SupabaseHistoryStore implements HistoryStore {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async getCurrentLine(playerId: string, statType: string): Promise<Line | null> {
    const { data, error } = await this.client
      .from('line_history')
      .select('player_id, stat_type, value, observed_at')
      .eq('player_id', playerId)
      .eq('stat_type', statType)
      .order('id', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw supabaseError('line lookup', error);
    return data ? toLine(data) : null;
  }

  async recordChange(line: Line, event: LineChangeEvent | null): Promise<void> {
    // Both rows go in through one SQL function so they commit or roll back together
    const { error } = await this.client.rpc('record_line_change', {
      p_player_id: line.playerId,
      p_stat_type: line.statType,
      p_value: line.value,
      p_observed_at: line.timestamp,
      p_event: event
        ? {
            previous_value: event.previousValue,
            new_value: event.newValue,
            direction: event.direction,
            delta: event.delta,
            observed_at: event.observedAt,
            manual: event.manual,
          }
        : null,
    });
    if (error) throw supabaseError('line change', error);
  }

  async listLines(playerId: string, statType: string): Promise<Line[]> {
    const { data, error } = await this.client
      .from('line_history')
      .select('player_id, stat_type, value, observed_at')
      .eq('player_id', playerId)
      .eq('stat_type', statType)
      .order('id', { ascending: true });

    if (error) throw supabaseError('line list', error);
    return (data ?? []).map(toLine).filter((l): l is Line => l !== null);
  }

  async listEvents(since: number): Promise<LineChangeEvent[]> {
    const { data, error } = await this.client
      .from('line_change_events')
      .select('player_id, stat_type, previous_value, new_value, direction, delta, observed_at, manual')
      .gte('observed_at', since)
      .order('observed_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw supabaseError('event list', error);
    return (data ?? []).map(toEvent).filter((e): e is LineChangeEvent => e !== null);
  }
}

// ==================== WATCH-LIST ====================

function toChase(row: unknown): ChaseListEntry | null {
  const playerId = asString(getField(row, 'player_id'));
  const statType = asString(getField(row, 'stat_type'));
  const lineValue = asNumber(getField(row, 'line_value'));
  const addedAt = asNumber(getField(row, 'added_at'));
  const updatedAt = asNumber(getField(row, 'updated_at'));
  if (playerId === null || statType === null || lineValue === null || addedAt === null || updatedAt === null) {
    return null;
  }
  return {
    playerId,
    statType,
    lineValue,
    reason: asString(getField(row, 'reason')) ?? '',
    status: 'active',
    addedAt,
    updatedAt,
  };
}

function toAltLine(row: unknown): AltLineEntry | null {
  const playerId = asString(getField(row, 'player_id'));
  const statType = asString(getField(row, 'stat_type'));
  const mainLine = asNumber(getField(row, 'main_line'));
  const altLine = asNumber(getField(row, 'alt_line'));
  const delta = asNumber(getField(row, 'delta'));
  const addedAt = asNumber(getField(row, 'added_at'));
  if (playerId === null || statType === null || mainLine === null || altLine === null || delta === null || addedAt === null) {
    return null;
  }
  return {
    playerId,
    statType,
    mainLine,
    altLine,
    source: asString(getField(row, 'source')) ?? '',
    delta,
    addedAt,
  };
}

export class SupabaseWatchlistStore implements WatchlistStore {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async upsertChase(entry: ChaseListEntry): Promise<void> {
    const { error } = await this.client.from('chase_list').upsert({
      player_id: entry.playerId,
      stat_type: entry.statType,
      line_value: entry.lineValue,
      reason: entry.reason,
      status: entry.status,
      added_at: entry.addedAt,
      updated_at: entry.updatedAt,
    }, { onConflict: 'player_id,stat_type' });
    if (error) throw supabaseError('chase upsert', error);
  }

  async getChase(playerId: string, statType: string): Promise<ChaseListEntry | null> {
    const { data, error } = await this.client
      .from('chase_list')
      .select('player_id, stat_type, line_value, reason, added_at, updated_at')
      .eq('player_id', playerId)
      .eq('stat_type', statType)
      .maybeSingle();

    if (error) throw supabaseError('chase lookup', error);
    return data ? toChase(data) : null;
  }

  async removeChase(playerId: string, statType: string): Promise<boolean> {
    const { error, count } = await this.client
      .from('chase_list')
      .delete({ count: 'exact' })
      .eq('player_id', playerId)
      .eq('stat_type', statType);

    if (error) throw supabaseError('chase delete', error);
    return (count ?? 0) > 0;
  }

  async listChase(): Promise<ChaseListEntry[]> {
    const { data, error } = await this.client
      .from('chase_list')
      .select('player_id, stat_type, line_value, reason, added_at, updated_at')
      .order('added_at', { ascending: true });

    if (error) throw supabaseError('chase list', error);
    return (data ?? []).map(toChase).filter((e): e is ChaseListEntry => e !== null);
  }

  async appendAltLine(entry: AltLineEntry): Promise<void> {
    const { error } = await this.client.from('alt_lines').insert({
      player_id: entry.playerId,
      stat_type: entry.statType,
      main_line: entry.mainLine,
      alt_line: entry.altLine,
      source: entry.source,
      delta: entry.delta,
      added_at: entry.addedAt,
    });
    if (error) throw supabaseError('alt line insert', error);
  }

  async listAltLines(playerId: string, statType: string): Promise<AltLineEntry[]> {
    const { data, error } = await this.client
      .from('alt_lines')
      .select('player_id, stat_type, main_line, alt_line, source, delta, added_at')
      .eq('player_id', playerId)
      .eq('stat_type', statType)
      .order('id', { ascending: true });

    if (error) throw supabaseError('alt line list', error);
    return (data ?? []).map(toAltLine).filter((e): e is AltLineEntry => e !== null);
  }
}

// ==================== BET JOURNAL ====================

const BET_COLUMNS =
  'id, player_id, stat_type, line, pick, odds_placed, odds_closing, stake, platform, probability, ' +
  'placed_at, result, actual_stat, payout, profit, settled_at';

function toBetResult(value: unknown): BetResult | null {
  return value === 'WIN' || value === 'LOSS' || value === 'PUSH' ? value : null;
}

function toBet(row: unknown): Bet | null {
  const id = asString(getField(row, 'id'));
  const playerId = asString(getField(row, 'player_id'));
  const statType = asString(getField(row, 'stat_type'));
  const line = asNumber(getField(row, 'line'));
  const pick = getField(row, 'pick');
  const oddsPlaced = asNumber(getField(row, 'odds_placed'));
  const stake = asNumber(getField(row, 'stake'));
  const placedAt = asNumber(getField(row, 'placed_at'));
  if (
    id === null || playerId === null || statType === null || line === null ||
    (pick !== 'OVER' && pick !== 'UNDER') || oddsPlaced === null || stake === null || placedAt === null
  ) {
    return null;
  }
  return {
    id,
    playerId,
    statType,
    line,
    pick,
    oddsPlaced,
    oddsClosing: asNumber(getField(row, 'odds_closing')),
    stake,
    platform: asString(getField(row, 'platform')) ?? 'Unknown',
    probability: asNumber(getField(row, 'probability')),
    placedAt,
    result: toBetResult(getField(row, 'result')),
    actualStat: asNumber(getField(row, 'actual_stat')),
    payout: asNumber(getField(row, 'payout')),
    profit: asNumber(getField(row, 'profit')),
    settledAt: asNumber(getField(row, 'settled_at')),
  };
}

function toBetRow(bet: Bet) {
  return {
    id: bet.id,
    player_id: bet.playerId,
    stat_type: bet.statType,
    line: bet.line,
    pick: bet.pick,
    odds_placed: bet.oddsPlaced,
    odds_closing: bet.oddsClosing,
    stake: bet.stake,
    platform: bet.platform,
    probability: bet.probability,
    placed_at: bet.placedAt,
    result: bet.result,
    actual_stat: bet.actualStat,
    payout: bet.payout,
    profit: bet.profit,
    settled_at: bet.settledAt,
  };
}

export class SupabaseBetStore implements BetStore {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async insert(bet: Bet): Promise<void> {
    const { error } = await this.client.from('bets').insert(toBetRow(bet));
    if (error) throw supabaseError('bet insert', error);
  }

  async update(bet: Bet): Promise<boolean> {
    const { error, count } = await this.client
      .from('bets')
      .update(toBetRow(bet), { count: 'exact' })
      .eq('id', bet.id);

    if (error) throw supabaseError('bet update', error);
    return (count ?? 0) > 0;
  }

  async get(id: string): Promise<Bet | null> {
    const { data, error } = await this.client
      .from('bets')
      .select(BET_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) throw supabaseError('bet lookup', error);
    return data ? toBet(data) : null;
  }

  async delete(id: string): Promise<boolean> {
    const { error, count } = await this.client
      .from('bets')
      .delete({ count: 'exact' })
      .eq('id', id);

    if (error) throw supabaseError('bet delete', error);
    return (count ?? 0) > 0;
  }

  async list(): Promise<Bet[]> {
    const { data, error } = await this.client
      .from('bets')
      .select(BET_COLUMNS)
      .order('placed_at', { ascending: true });

    if (error) throw supabaseError('bet list', error);
    return (data ?? []).map(toBet).filter((b): b is Bet => b !== null);
  }
}
