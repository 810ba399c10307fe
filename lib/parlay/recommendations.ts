/**
 * Parlay recommendations from a slate of edges
 */

import { DEFAULT_CONFIG } from '../config';
import type { EdgeResult } from '../edge-engine/types';
import { calculate, legFromEdge } from './calculator';
import type { ParlayRecommendation } from './types';

export interface RecommendOptions {
  /** Edges below this probability are not considered. */
  minProbability?: number;
  /** Price assumed for every leg (props are usually -110). */
  legOdds?: number;
  /** Only the most probable N edges are combined. */
  maxCandidates?: number;
}

export interface ParlayRecommendations {
  twoLeg: ParlayRecommendation[];
  threeLeg: ParlayRecommendation[];
  fourLeg: ParlayRecommendation[];
  sixLeg: ParlayRecommendation[];
}

const DEFAULT_MAX_CANDIDATES = 20;

export function* combinations<T>(items: readonly T[], size: number, start = 0, prefix: T[] = []): Generator<T[]> {
  if (prefix.length === size) {
    yield [...prefix];
    return;
  }
  for (let i = start; i <= items.length - (size - prefix.length); i++) {
    prefix.push(items[i]);
    yield* combinations(items, size, i + 1, prefix);
    prefix.pop();
  }
}

/**
 * Best parlays of `size` legs, scored by expected value plus ten times the edge, best first.
 */
export function findBestParlays(
  edges: readonly EdgeResult[],
  size: number,
  maxRecommendations = 10,
  options: RecommendOptions = {}
): ParlayRecommendation[] {
  const minProbability = options.minProbability ?? DEFAULT_CONFIG.parlayMinProbability;
  const legOdds = options.legOdds ?? DEFAULT_CONFIG.defaultLegOdds;
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;

  if (size < 2) return [];
  const candidates = edges
    .filter(edge => edge.probability >= minProbability)
    .sort((a, b) => b.probability - a.probability)
    .slice(0, maxCandidates);
  if (candidates.length < size) return [];

  const out: ParlayRecommendation[] = [];
  for (const combo of combinations(candidates, size)) {
    const legs = combo.map(edge => legFromEdge(edge, legOdds));
    const result = calculate(legs);
    out.push({ legs, result, score: result.expectedValue + result.edgePercent * 10 });
  }

  return out.sort((a, b) => b.score - a.score).slice(0, maxRecommendations);
}

export function recommendParlays(edges: readonly EdgeResult[], options: RecommendOptions = {}): ParlayRecommendations {
  return {
    twoLeg: findBestParlays(edges, 2, 5, options),
    threeLeg: findBestParlays(edges, 3, 5, options),
    fourLeg: findBestParlays(edges, 4, 5, options),
    sixLeg: findBestParlays(edges, 6, 3, options),
  };
}
