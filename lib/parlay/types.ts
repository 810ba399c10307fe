import type { AmericanOdds } from '../odds/types';

export interface ParlayLeg {
  label: string;
  /** Model win probability in percent, (0, 100]. */
  probability: number;
  /** Market price offered for this leg, when known. */
  americanOdds?: AmericanOdds;
}

export interface MarketPricing {
  americanOdds: AmericanOdds;
  decimalOdds: number;
  /** Total return per 100 staked at the market price. */
  payoutPer100: number;
  impliedProbability: number;
}

export interface ParlayResult {
  legs: number;
  /** Product of leg probabilities, in percent. */
  combinedProbability: number;
  /** Fair American odds for the combined probability. */
  americanOdds: AmericanOdds;
  /** Total return per 100 staked at fair odds: 100 / p. */
  decimalPayoutPerUnit: number;
  /** Expected profit per 100 staked, at the market price when given, else at fair odds. */
  expectedValue: number;
  /** combinedProbability - market implied probability; 0 without a market price. */
  edgePercent: number;
  market: MarketPricing | null;
}

export interface CalculateOptions {
  /** Price offered for the parlay as a whole; overrides per-leg odds. */
  marketAmericanOdds?: AmericanOdds;
}

export interface ParlayRecommendation {
  legs: ParlayLeg[];
  result: ParlayResult;
  score: number;
}
