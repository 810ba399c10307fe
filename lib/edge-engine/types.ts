/**
 * Type definitions for the edge engine
 */

export type Pick = 'OVER' | 'UNDER';

export interface EdgeEvaluation {
  lineValue: number;
  rollingAverage: number;
  /** rollingAverage - lineValue (positive => average is over the line) */
  gap: number;
  /** Population standard deviation of all observations supplied. */
  stdDev: number;
  /** Games in the rolling average. */
  sampleSize: number;
  pick: Pick;
  /** Confidence in the pick, within [50, 99]. */
  probability: number;
  isEdge: boolean;
}

export interface EdgeResult extends EdgeEvaluation {
  playerId: string;
  statType: string;
}

export interface EvaluateOptions {
  minObservations?: number;
  rollingWindow?: number;
  minStdDev?: number;
}

export interface StreakInfo {
  count: number;
  type: Pick | null;
  active: boolean;
}

export interface PropRequest {
  playerId: string;
  statType: string;
  line: number;
}
