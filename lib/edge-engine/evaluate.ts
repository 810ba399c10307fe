/**
 * Edge Engine
 * Rolling average of recent games vs. the posted line, with a variance-normalized confidence
 *
 * Observations are ordered newest game first.
 */

import { DEFAULT_CONFIG } from '../config';
import { InsufficientDataError, InvalidInputError } from '../errors';
import { roundTo } from '../odds/utils';
import type { EdgeEvaluation, EdgeResult, EvaluateOptions, Pick, PropRequest } from './types';

export const MIN_PROBABILITY = 50;
export const MAX_PROBABILITY = 99;
// Logistic approximation of the normal CDF: 1 / (1 + e^(-1.702 z)) ~ Phi(z)
const LOGISTIC_SCALE = 1.702;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

/**
 * Mean of the newest `window` observations (all of them when fewer are available).
 */
export function rollingAverage(observations: readonly number[], window: number = DEFAULT_CONFIG.rollingWindow): number {
  return mean(observations.slice(0, Math.max(1, window)));
}

/**
 * Map the average-to-line gap onto [50, 99].
 *
 * z = |gap| / max(stdDev, minStdDev), then 50 + 49 * (2 * logistic(1.702 z) - 1).
 * A zero gap gives 50; the 49-point span keeps large gaps short of 100. Rounded to 0.1.
 */
export function edgeProbability(gap: number, stdDev: number, minStdDev: number = DEFAULT_CONFIG.minStdDev): number {
  const spread = Math.max(stdDev, minStdDev);
  const z = Math.abs(gap) / spread;
  const scaled = Math.tanh((LOGISTIC_SCALE * z) / 2);
  const probability = MIN_PROBABILITY + (MAX_PROBABILITY - MIN_PROBABILITY) * scaled;
  return Math.min(MAX_PROBABILITY, Math.max(MIN_PROBABILITY, roundTo(probability, 1)));
}

// Ties go UNDER
export function pickFor(average: number, line: number): Pick {
  return average > line ? 'OVER' : 'UNDER';
}

function validate(observations: readonly number[], line: number, threshold: number): void {
  if (!Number.isFinite(line)) {
    throw new InvalidInputError(`Line must be a finite number, got ${line}`);
  }
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new InvalidInputError(`Threshold must be a non-negative number, got ${threshold}`);
  }
  const bad = observations.findIndex(v => !Number.isFinite(v) || v < 0);
  if (bad !== -1) {
    throw new InvalidInputError(`Observation ${bad} must be a non-negative number, got ${observations[bad]}`);
  }
}

/**
 * Evaluate observations against a line.
 * Throws InsufficientDataError below the minimum observation count; pure otherwise.
 */
export function evaluate(
  observations: readonly number[],
  line: number,
  threshold: number = DEFAULT_CONFIG.edgeThreshold,
  options: EvaluateOptions = {}
): EdgeEvaluation {
  const minObservations = options.minObservations ?? DEFAULT_CONFIG.minObservations;
  const window = options.rollingWindow ?? DEFAULT_CONFIG.rollingWindow;

  if (observations.length < minObservations) {
    throw new InsufficientDataError(minObservations, observations.length);
  }
  validate(observations, line, threshold);

  const sample = observations.slice(0, window);
  const average = mean(sample);
  const gap = average - line;
  const stdDev = standardDeviation(observations);

  return {
    lineValue: line,
    rollingAverage: average,
    gap,
    stdDev,
    sampleSize: sample.length,
    pick: pickFor(average, line),
    probability: edgeProbability(gap, stdDev, options.minStdDev),
    isEdge: Math.abs(gap) >= threshold,
  };
}

export function evaluateEdge(
  prop: PropRequest,
  observations: readonly number[],
  threshold: number = DEFAULT_CONFIG.edgeThreshold,
  options: EvaluateOptions = {}
): EdgeResult {
  return {
    playerId: prop.playerId,
    statType: prop.statType,
    ...evaluate(observations, prop.line, threshold, options),
  };
}
