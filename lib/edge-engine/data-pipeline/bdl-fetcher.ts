/**
 * BallDontLie Stat Source
 * Fetches player game logs from the BallDontLie API and reduces them to one stat value per game
 */

import { getOptionalEnv } from '../../env';
import { StatSourceError } from '../../errors';
import { asNumber, getField } from '../../json';
import { createLogger } from '../../logger';
import { currentNbaSeason } from '../../nbaUtils';
import { RequestQueue } from '../../requestQueue';
import { combineStatValues, getStatCategory, type GameStatLine } from '../../statCategories';
import type { StatSource } from '../statSource';

const log = createLogger('BDL Fetcher');

const BDL_V1_BASE = 'https://api.balldontlie.io/v1';
// Two seasons of games, playoffs included, fit in three pages of 100
const MAX_PAGES = 3;

export interface BallDontLieOptions {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  queue?: RequestQueue;
  /** Clock in epoch milliseconds; picks the seasons to request. */
  now?: () => number;
}

interface GameLogPage {
  rows: GameLogRow[];
  nextCursor: number | null;
}

interface GameLogRow extends GameStatLine {
  date: string;
  minutes: number;
}

function authHeaders(apiKey: string): Record<string, string> {
  const headers: Record<string, string> = {
    'Accept': 'application/json',
  };
  if (apiKey) {
    headers['Authorization'] = apiKey.startsWith('Bearer ') ? apiKey : `Bearer ${apiKey}`;
  }
  return headers;
}

function num(value: unknown): number {
  return asNumber(value) ?? 0;
}

// BDL reports minutes as "34", "34:12" or a number
export function parseMinutes(value: unknown): number {
  if (typeof value === 'string' && value.includes(':')) {
    const [mins, secs] = value.split(':');
    return num(mins) + num(secs) / 60;
  }
  return num(value);
}

/**
 * Normalize one row of the /stats response. Rows without a game date are skipped.
 */
export function toGameLogRow(row: unknown): GameLogRow | null {
  const date = getField(getField(row, 'game'), 'date');
  if (typeof date !== 'string') return null;

  return {
    date,
    minutes: parseMinutes(getField(row, 'min')),
    pts: num(getField(row, 'pts')),
    reb: num(getField(row, 'reb')),
    ast: num(getField(row, 'ast')),
    stl: num(getField(row, 'stl')),
    blk: num(getField(row, 'blk')),
    fg3m: num(getField(row, 'fg3m')),
  };
}

export class BallDontLieStatSource implements StatSource {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly queue: RequestQueue;
  private readonly now: () => number;

  constructor(options: BallDontLieOptions = {}) {
    this.apiKey = options.apiKey ?? getOptionalEnv('BALLDONTLIE_API_KEY') ?? '';
    this.baseUrl = options.baseUrl ?? BDL_V1_BASE;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.queue = options.queue ?? new RequestQueue({
      maxConcurrent: 2,
      isRetryable: error => error instanceof StatSourceError && error.kind === 'RateLimited',
    });
    this.now = options.now ?? Date.now;
  }

  async fetch(playerId: string, statType: string, lookbackN: number): Promise<number[]> {
    if (!getStatCategory(statType)) {
      throw new StatSourceError('NotFound', `Unknown stat type: ${statType}`);
    }

    const games = await this.queue.enqueue(() => this.fetchGameLogs(playerId), `stats:${playerId}`);
    const played = games
      .filter(g => g.minutes > 0)
      .sort((a, b) => Date.parse(b.date) - Date.parse(a.date))
      .slice(0, lookbackN);

    if (played.length === 0) {
      throw new StatSourceError('NotFound', `No played games found for player ${playerId}`);
    }

    return combineStatValues(played, statType) ?? [];
  }

  /**
   * Game logs for the current and previous season, following the cursor for up to MAX_PAGES pages.
   * The previous season fills the lookback early in a season.
   */
  private async fetchGameLogs(playerId: string): Promise<GameLogRow[]> {
    const season = currentNbaSeason(new Date(this.now()));
    const games: GameLogRow[] = [];
    let cursor: number | null = null;

    for (let page = 0; page < MAX_PAGES; page++) {
      const url = new URL(`${this.baseUrl}/stats`);
      url.searchParams.set('player_ids[]', playerId);
      url.searchParams.append('seasons[]', String(season));
      url.searchParams.append('seasons[]', String(season - 1));
      url.searchParams.set('per_page', '100');
      if (cursor !== null) {
        url.searchParams.set('cursor', String(cursor));
      }

      const result = await this.fetchPage(url, playerId);
      games.push(...result.rows);
      cursor = result.nextCursor;
      if (cursor === null) break;
    }

    return games;
  }

  private async fetchPage(url: URL, playerId: string): Promise<GameLogPage> {
    log.debug(`Fetching stats: ${url.toString()}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: authHeaders(this.apiKey),
        cache: 'no-store',
      });
    } catch (error) {
      throw new StatSourceError('Unavailable', `BDL request failed for player ${playerId}`, { cause: error });
    }

    if (response.status === 429) {
      throw new StatSourceError('RateLimited', `BDL rate limit hit for player ${playerId}`);
    }
    if (response.status === 404) {
      throw new StatSourceError('NotFound', `BDL has no player ${playerId}`);
    }
    if (!response.ok) {
      const text = await response.text().catch(() => '');
      log.error(`Error ${response.status}: ${text}`);
      throw new StatSourceError('Unavailable', `BDL API error: ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new StatSourceError('Unavailable', 'BDL response is not valid JSON', { cause: error });
    }
    const rows = getField(body, 'data');
    if (!Array.isArray(rows)) {
      throw new StatSourceError('Unavailable', 'BDL response is missing a data array');
    }

    return {
      rows: rows.map(toGameLogRow).filter((row): row is GameLogRow => row !== null),
      nextCursor: asNumber(getField(getField(body, 'meta'), 'next_cursor')),
    };
  }
}
