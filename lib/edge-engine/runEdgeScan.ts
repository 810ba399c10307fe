/**
 * Edge scan service - stat cache -> stat source -> edge engine -> line history
 * Used by the single-prop API, the slate scan and the scheduled refresh
 */

import { getCacheKey, type TtlCache } from '../cache';
import type { EngineConfig } from '../config';
import { getErrorMessage, InsufficientDataError, InvalidInputError, UpstreamUnavailableError } from '../errors';
import type { LineChangeEvent } from '../line-history/types';
import type { LineHistoryTracker } from '../line-history/tracker';
import { createLogger } from '../logger';
import { getStatCategory } from '../statCategories';
import { calculateExpectedValue, type BetAnalytics } from './analytics';
import { evaluateEdge } from './evaluate';
import type { StatSource } from './statSource';
import { calculateConsistency, calculateStreak } from './streaks';
import type { EdgeResult, PropRequest, StreakInfo } from './types';

const log = createLogger('Edge Scan');

export interface EdgeServiceDeps {
  cache: TtlCache<number[]>;
  source: StatSource;
  tracker: LineHistoryTracker;
  config: EngineConfig;
}

export interface EvaluatePropInput extends PropRequest {
  threshold?: number;
  forceRefresh?: boolean;
}

interface OutcomeBase {
  playerId: string;
  statType: string;
  line: number;
  lineChange: LineChangeEvent | null;
}

export type EdgeOutcome =
  | (OutcomeBase & {
      status: 'ok';
      result: EdgeResult;
      streak: StreakInfo;
      /** Coefficient of variation of the observations, percent. */
      consistency: number;
      /** EV metrics for the pick at the default leg price. */
      analytics: BetAnalytics;
      isStale: boolean;
      fetchedAt: number;
    })
  | (OutcomeBase & { status: 'no_edge_available'; reason: string })
  | (OutcomeBase & { status: 'unavailable'; reason: string });

export type EdgeSort = 'probability' | 'ev' | 'marketEdge' | 'kelly' | 'gap';

export const EDGE_SORTS: readonly EdgeSort[] = ['probability', 'ev', 'marketEdge', 'kelly', 'gap'];

export interface ScanOptions {
  threshold?: number;
  /** Filters below apply to edges only. */
  minProbability?: number;
  minEv?: number;
  minMarketEdge?: number;
  positiveEvOnly?: boolean;
  /** Edge order, highest first. Defaults to probability. */
  sortBy?: EdgeSort;
}

export interface ScanResult {
  /** Props whose gap clears the threshold and pass the filters, sorted by ScanOptions.sortBy. */
  edges: EdgeOutcome[];
  /** Active streaks on props that are not edges. */
  streaks: EdgeOutcome[];
  noEdgeAvailable: EdgeOutcome[];
  unavailable: EdgeOutcome[];
  /** Edges dropped by the filters. */
  filteredOut: number;
}

export interface RefreshSummary {
  refreshed: number;
  stale: number;
  noData: number;
  unavailable: number;
  /** Props that threw, such as an unknown stat type. The run continues past them. */
  failed: number;
  lineChanges: number;
}

type OkOutcome = Extract<EdgeOutcome, { status: 'ok' }>;

function sortValue(outcome: OkOutcome, sortBy: EdgeSort): number {
  switch (sortBy) {
    case 'ev':
      return outcome.analytics.ev;
    case 'marketEdge':
      return outcome.analytics.marketEdge;
    case 'kelly':
      return outcome.analytics.kellyFraction;
    case 'gap':
      return Math.abs(outcome.result.gap);
    case 'probability':
      return outcome.result.probability;
  }
}

function passesFilters(outcome: OkOutcome, options: ScanOptions): boolean {
  const { analytics, result } = outcome;
  if (options.minProbability !== undefined && result.probability < options.minProbability) return false;
  if (options.minEv !== undefined && analytics.ev < options.minEv) return false;
  if (options.minMarketEdge !== undefined && analytics.marketEdge < options.minMarketEdge) return false;
  if (options.positiveEvOnly && !analytics.isPositiveEv) return false;
  return true;
}

export class EdgeService {
  private readonly deps: EdgeServiceDeps;

  constructor(deps: EdgeServiceDeps) {
    this.deps = deps;
  }

  /**
   * Evaluate one prop. Missing data and upstream outages come back as outcomes, not errors;
   * invalid input still throws.
   */
  async evaluateProp(input: EvaluatePropInput): Promise<EdgeOutcome> {
    const { cache, source, tracker, config } = this.deps;
    const category = getStatCategory(input.statType);
    if (!category) {
      throw new InvalidInputError(`Unknown stat type: ${input.statType}`);
    }
    const statType = category.code;
    const playerId = input.playerId.trim();
    if (!playerId) {
      throw new InvalidInputError('playerId is required');
    }
    if (!Number.isFinite(input.line)) {
      throw new InvalidInputError(`Line must be a finite number, got ${input.line}`);
    }
    const threshold = input.threshold ?? config.edgeThreshold;
    const prop: PropRequest = { playerId, statType, line: input.line };

    let observations: number[];
    let isStale: boolean;
    let fetchedAt: number;
    try {
      const cached = await cache.get(
        getCacheKey.playerStats(playerId, statType, config.lookbackGames),
        config.cacheTtlSeconds,
        () => source.fetch(playerId, statType, config.lookbackGames),
        { forceRefresh: input.forceRefresh }
      );
      observations = cached.payload;
      isStale = cached.isStale;
      fetchedAt = cached.fetchedAt;
    } catch (error) {
      if (!(error instanceof UpstreamUnavailableError)) throw error;
      log.warn(`Stats unavailable for ${playerId} ${statType}`, error.message);
      const lineChange = await tracker.recordLine(playerId, statType, input.line);
      return { status: 'unavailable', ...prop, lineChange, reason: 'Data temporarily unavailable' };
    }

    let result: EdgeResult;
    try {
      result = evaluateEdge(prop, observations, threshold, {
        minObservations: config.minObservations,
        rollingWindow: config.rollingWindow,
        minStdDev: config.minStdDev,
      });
    } catch (error) {
      if (!(error instanceof InsufficientDataError)) throw error;
      const lineChange = await tracker.recordLine(playerId, statType, input.line);
      return { status: 'no_edge_available', ...prop, lineChange, reason: error.message };
    }

    const lineChange = await tracker.recordLine(playerId, statType, input.line);
    return {
      status: 'ok',
      ...prop,
      lineChange,
      result,
      streak: calculateStreak(observations, input.line, config.minStreak),
      consistency: calculateConsistency(observations),
      analytics: calculateExpectedValue(result.probability, config.defaultLegOdds),
      isStale,
      fetchedAt,
    };
  }

  async scanEdges(props: PropRequest[], options: ScanOptions = {}): Promise<ScanResult> {
    const { threshold, sortBy = 'probability' } = options;
    const outcomes = await Promise.all(props.map(prop => this.evaluateProp({ ...prop, threshold })));
    const scan: ScanResult = { edges: [], streaks: [], noEdgeAvailable: [], unavailable: [], filteredOut: 0 };
    const edges: OkOutcome[] = [];

    for (const outcome of outcomes) {
      if (outcome.status === 'unavailable') {
        scan.unavailable.push(outcome);
      } else if (outcome.status === 'no_edge_available') {
        scan.noEdgeAvailable.push(outcome);
      } else if (outcome.result.isEdge) {
        if (passesFilters(outcome, options)) {
          edges.push(outcome);
        } else {
          scan.filteredOut++;
        }
      } else if (outcome.streak.active) {
        scan.streaks.push(outcome);
      }
    }

    edges.sort((a, b) => sortValue(b, sortBy) - sortValue(a, sortBy));
    scan.edges = edges;
    log.info(`Scanned ${props.length} props: ${scan.edges.length} edges, ${scan.streaks.length} streaks, ${scan.unavailable.length} unavailable`);
    return scan;
  }

  /**
   * Force-refresh stats and record the current line for each prop.
   * Meant to be driven by an external scheduler.
   */
  async refresh(props: PropRequest[]): Promise<RefreshSummary> {
    const summary: RefreshSummary = { refreshed: 0, stale: 0, noData: 0, unavailable: 0, failed: 0, lineChanges: 0 };

    for (const prop of props) {
      let outcome: EdgeOutcome;
      try {
        outcome = await this.evaluateProp({ ...prop, forceRefresh: true });
      } catch (error) {
        summary.failed++;
        log.warn(`Refresh failed for ${prop.playerId} ${prop.statType}`, getErrorMessage(error));
        continue;
      }
      if (outcome.lineChange) summary.lineChanges++;
      if (outcome.status === 'unavailable') {
        summary.unavailable++;
      } else if (outcome.status === 'no_edge_available') {
        summary.noData++;
      } else if (outcome.isStale) {
        summary.stale++;
      } else {
        summary.refreshed++;
      }
    }

    log.info('Refresh complete', summary);
    return summary;
  }
}

export function createEdgeService(deps: EdgeServiceDeps): EdgeService {
  return new EdgeService(deps);
}
