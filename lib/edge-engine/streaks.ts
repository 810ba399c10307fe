import { DEFAULT_CONFIG } from '../config';
import { mean, standardDeviation } from './evaluate';
import { roundTo } from '../odds/utils';
import type { Pick, StreakInfo } from './types';

/**
 * Consecutive newest-first games on the same side of the line.
 * A game exactly on the line ends the streak.
 */
export function calculateStreak(
  observations: readonly number[],
  line: number,
  minStreak: number = DEFAULT_CONFIG.minStreak
): StreakInfo {
  let count = 0;
  let type: Pick | null = null;

  for (const value of observations) {
    if (value === line) break;
    const hit: Pick = value > line ? 'OVER' : 'UNDER';
    if (type === null) {
      type = hit;
    } else if (type !== hit) {
      break;
    }
    count++;
  }

  return { count, type, active: count >= minStreak };
}

/**
 * Coefficient of variation in percent over games with a positive value (lower is steadier).
 */
export function calculateConsistency(observations: readonly number[]): number {
  const played = observations.filter(v => v > 0);
  if (played.length < 2) return 0;
  const avg = mean(played);
  return avg > 0 ? roundTo((standardDeviation(played) / avg) * 100, 1) : 100;
}
