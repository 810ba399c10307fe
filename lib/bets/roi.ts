/**
 * Settlement and return-on-investment math for the bet journal
 */

import type { Pick } from '../edge-engine/types';
import type { AmericanOdds } from '../odds/types';
import { americanToDecimal, impliedProbabilityFromAmerican, roundTo } from '../odds/utils';
import type { Bet, BetResult, RoiSummary } from './types';

/** A stat landing exactly on the line is a push. */
export function gradePick(pick: Pick, line: number, actual: number): BetResult {
  if (actual === line) return 'PUSH';
  const over = actual > line;
  return over === (pick === 'OVER') ? 'WIN' : 'LOSS';
}

export function settlementAmounts(result: BetResult, stake: number, odds: AmericanOdds): { payout: number; profit: number } {
  switch (result) {
    case 'WIN': {
      const payout = roundTo(stake * americanToDecimal(odds), 2);
      return { payout, profit: roundTo(payout - stake, 2) };
    }
    case 'PUSH':
      return { payout: stake, profit: 0 };
    case 'LOSS':
      return { payout: 0, profit: -stake };
  }
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Record and returns over a set of bets. Pending bets count toward totalBets only.
 */
export function calculateRoi(bets: Bet[]): RoiSummary {
  const settled = bets.filter(bet => bet.result !== null);
  const wins = settled.filter(bet => bet.result === 'WIN').length;
  const losses = settled.filter(bet => bet.result === 'LOSS').length;
  const pushes = settled.filter(bet => bet.result === 'PUSH').length;

  const totalStake = settled.reduce((sum, bet) => sum + bet.stake, 0);
  const totalProfit = settled.reduce((sum, bet) => sum + (bet.profit ?? 0), 0);

  const closingValues = settled.flatMap(bet =>
    bet.oddsClosing === null
      ? []
      : [impliedProbabilityFromAmerican(bet.oddsClosing) - impliedProbabilityFromAmerican(bet.oddsPlaced)]
  );
  const avgPlaced = mean(settled.map(bet => bet.oddsPlaced));
  const avgClosing = mean(settled.flatMap(bet => (bet.oddsClosing === null ? [] : [bet.oddsClosing])));

  return {
    totalBets: bets.length,
    settledBets: settled.length,
    pendingBets: bets.length - settled.length,
    wins,
    losses,
    pushes,
    totalStake: roundTo(totalStake, 2),
    totalProfit: roundTo(totalProfit, 2),
    roiPercentage: totalStake > 0 ? roundTo((totalProfit / totalStake) * 100, 2) : 0,
    winRate: wins + losses > 0 ? roundTo((wins / (wins + losses)) * 100, 1) : 0,
    avgOddsPlaced: avgPlaced === null ? 0 : Math.round(avgPlaced),
    avgOddsClosing: avgClosing === null ? null : Math.round(avgClosing),
    closingLineValue: roundTo(mean(closingValues) ?? 0, 2),
  };
}
