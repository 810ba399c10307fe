/**
 * Betting metrics for an edge: expected value, market edge and a capped Kelly stake
 */

import { InvalidInputError } from '../errors';
import type { AmericanOdds } from '../odds/types';
import { americanToDecimal, isValidAmericanOdds, roundTo } from '../odds/utils';

// Quarter-Kelly ceiling
const MAX_KELLY_FRACTION = 0.25;

export interface BetAnalytics {
  /** Price the metrics were computed against. */
  odds: AmericanOdds;
  stake: number;
  /** Expected profit on the stake. */
  ev: number;
  /** ev as a percentage of the stake. */
  evPercentage: number;
  /** Model probability minus the price's implied probability, percentage points. */
  marketEdge: number;
  /** Implied probability of the price, percent. */
  impliedProbability: number;
  /** Suggested stake as a percent of bankroll, within [0, 25]. */
  kellyFraction: number;
  /** Profit on a win. */
  payout: number;
  isPositiveEv: boolean;
}

/**
 * EV metrics for a bet with win probability `probability` (0-100) at American `odds`.
 * Money values and percentages are rounded to cents.
 */
export function calculateExpectedValue(probability: number, odds: AmericanOdds = -110, stake = 100): BetAnalytics {
  if (!Number.isFinite(probability) || probability < 0 || probability > 100) {
    throw new InvalidInputError(`Probability must be within [0, 100], got ${probability}`);
  }
  if (!isValidAmericanOdds(odds)) {
    throw new InvalidInputError(`Invalid American odds: ${odds}`);
  }
  if (!Number.isFinite(stake) || stake <= 0) {
    throw new InvalidInputError(`Stake must be positive, got ${stake}`);
  }

  const p = probability / 100;
  const decimal = americanToDecimal(odds);
  const payout = stake * (decimal - 1);
  const ev = p * payout - (1 - p) * stake;
  const implied = 1 / decimal;
  const kelly = Math.max(0, Math.min((p * decimal - 1) / (decimal - 1), MAX_KELLY_FRACTION));

  return {
    odds,
    stake,
    ev: roundTo(ev, 2),
    evPercentage: roundTo((ev / stake) * 100, 2),
    marketEdge: roundTo((p - implied) * 100, 2),
    impliedProbability: roundTo(implied * 100, 2),
    kellyFraction: roundTo(kelly * 100, 2),
    payout: roundTo(payout, 2),
    isPositiveEv: ev > 0,
  };
}
