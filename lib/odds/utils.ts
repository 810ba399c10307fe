// Pure helpers for odds conversion and line selection
import type { AmericanOdds, Line, MovementDirection } from './types';

// Fair odds are clamped to this magnitude; probabilities of exactly 1 (or near 0) have no finite price
export const MAX_AMERICAN_ODDS = 100000;

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // `|| 0` folds -0 into 0
  return Math.round(value * factor) / factor || 0;
}

// Round half away from zero so -150.5 and +150.5 mirror each other
function roundOdds(odds: number): number {
  return Math.sign(odds) * Math.round(Math.abs(odds));
}

export function isValidAmericanOdds(odds: number): boolean {
  return Number.isFinite(odds) && Math.abs(odds) >= 100;
}

// Convert American odds to implied probability (0..100)
export function impliedProbabilityFromAmerican(odds: AmericanOdds): number {
  if (!Number.isFinite(odds)) return 0;
  if (odds < 0) {
    return (Math.abs(odds) / (Math.abs(odds) + 100)) * 100;
  }
  return (100 / (odds + 100)) * 100;
}

// Decimal odds include the stake: -110 => 1.909, +150 => 2.5
export function americanToDecimal(odds: AmericanOdds): number {
  if (odds > 0) {
    return odds / 100 + 1;
  }
  return 100 / Math.abs(odds) + 1;
}

export function decimalToAmerican(decimal: number): AmericanOdds {
  if (decimal >= 2) {
    return roundOdds(Math.min((decimal - 1) * 100, MAX_AMERICAN_ODDS));
  }
  if (decimal <= 1) return -MAX_AMERICAN_ODDS;
  return roundOdds(Math.max(-100 / (decimal - 1), -MAX_AMERICAN_ODDS));
}

/**
 * Fair American odds for a win probability p in (0, 1], with no bookmaker margin.
 * p >= 0.5 is priced as a favorite, so p = 0.5 gives -100.
 */
export function fairAmericanOdds(p: number): AmericanOdds {
  if (p >= 1) return -MAX_AMERICAN_ODDS;
  if (p <= 0) return MAX_AMERICAN_ODDS;
  const odds = p >= 0.5 ? (-100 * p) / (1 - p) : (100 * (1 - p)) / p;
  return roundOdds(Math.max(-MAX_AMERICAN_ODDS, Math.min(MAX_AMERICAN_ODDS, odds)));
}

export function directionOf(delta: number): MovementDirection {
  return delta > 0 ? 'UP' : delta < 0 ? 'DOWN' : 'UNCHANGED';
}

// Compute movement and direction from opening/current
export function computeMovement(
  opening: number | null,
  current: number | null
): { movement: number | null; direction: MovementDirection | null } {
  if (opening === null || current === null || !Number.isFinite(opening) || !Number.isFinite(current)) {
    return { movement: null, direction: null };
  }
  const mv = roundTo(current - opening, 2);
  return { movement: mv, direction: directionOf(mv) };
}

// Pick earliest line by timestamp (with finite value)
export function pickOpeningLine(lines: Line[]): Line | null {
  const valid = lines.filter(l => Number.isFinite(l.value) && Number.isFinite(l.timestamp));
  if (valid.length === 0) return null;
  return valid.reduce((earliest, l) => (l.timestamp < earliest.timestamp ? l : earliest));
}

// Pick latest line by timestamp (with finite value)
export function pickCurrentLine(lines: Line[]): Line | null {
  const valid = lines.filter(l => Number.isFinite(l.value) && Number.isFinite(l.timestamp));
  if (valid.length === 0) return null;
  return valid.reduce((latest, l) => (l.timestamp >= latest.timestamp ? l : latest));
}
