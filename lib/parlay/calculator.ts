/**
 * Parlay Engine
 * Combined probability, fair odds, payout and expected value for multi-leg wagers.
 * Legs are treated as independent; correlation between legs is not modelled.
 */

import { InsufficientLegsError, InvalidInputError, InvalidProbabilityError } from '../errors';
import type { EdgeResult } from '../edge-engine/types';
import type { AmericanOdds } from '../odds/types';
import {
  americanToDecimal,
  decimalToAmerican,
  fairAmericanOdds,
  isValidAmericanOdds,
  roundTo,
} from '../odds/utils';
import type { CalculateOptions, MarketPricing, ParlayLeg, ParlayResult } from './types';

function validateLegs(legs: readonly ParlayLeg[]): void {
  if (legs.length < 2) {
    throw new InsufficientLegsError(legs.length);
  }
  for (const leg of legs) {
    if (!Number.isFinite(leg.probability) || leg.probability <= 0 || leg.probability > 100) {
      throw new InvalidProbabilityError(leg.label, leg.probability);
    }
    if (leg.americanOdds !== undefined && !isValidAmericanOdds(leg.americanOdds)) {
      throw new InvalidInputError(`Leg "${leg.label}" has invalid American odds ${leg.americanOdds}`);
    }
  }
}

/**
 * Market decimal odds for the parlay: the parlay-wide price when given,
 * otherwise the product of per-leg prices. Null when no price was supplied.
 */
function marketDecimalOdds(legs: readonly ParlayLeg[], marketAmericanOdds?: AmericanOdds): number | null {
  if (marketAmericanOdds !== undefined) {
    if (!isValidAmericanOdds(marketAmericanOdds)) {
      throw new InvalidInputError(`Invalid parlay American odds ${marketAmericanOdds}`);
    }
    return americanToDecimal(marketAmericanOdds);
  }

  const priced = legs.filter(leg => leg.americanOdds !== undefined);
  if (priced.length === 0) return null;
  if (priced.length !== legs.length) {
    throw new InvalidInputError('Market odds must be supplied for every leg or for none');
  }
  return legs.reduce((product, leg) => product * americanToDecimal(leg.americanOdds ?? 0), 1);
}

export function calculate(legs: readonly ParlayLeg[], options: CalculateOptions = {}): ParlayResult {
  validateLegs(legs);

  const p = legs.reduce((product, leg) => product * (leg.probability / 100), 1);
  const fairPayoutPer100 = 100 / p;

  const decimal = marketDecimalOdds(legs, options.marketAmericanOdds);
  const market: MarketPricing | null = decimal === null
    ? null
    : {
        americanOdds: options.marketAmericanOdds ?? decimalToAmerican(decimal),
        decimalOdds: roundTo(decimal, 3),
        payoutPer100: roundTo(decimal * 100, 2),
        impliedProbability: roundTo(100 / decimal, 2),
      };

  const payoutPer100 = decimal === null ? fairPayoutPer100 : decimal * 100;
  const expectedValue = (payoutPer100 - 100) * p - 100 * (1 - p);
  const edgePercent = decimal === null ? 0 : p * 100 - 100 / decimal;

  return {
    legs: legs.length,
    combinedProbability: roundTo(p * 100, 2),
    americanOdds: fairAmericanOdds(p),
    decimalPayoutPerUnit: roundTo(fairPayoutPer100, 2),
    expectedValue: roundTo(expectedValue, 2),
    edgePercent: roundTo(edgePercent, 2),
    market,
  };
}

/**
 * Build a parlay leg from an edge evaluation.
 */
export function legFromEdge(edge: EdgeResult, americanOdds?: AmericanOdds): ParlayLeg {
  return {
    label: `${edge.playerId} ${edge.pick} ${edge.lineValue} ${edge.statType}`,
    probability: edge.probability,
    ...(americanOdds !== undefined ? { americanOdds } : {}),
  };
}
