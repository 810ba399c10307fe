import type { Pick } from '../edge-engine/types';
import type { AmericanOdds } from '../odds/types';

export type BetResult = 'WIN' | 'LOSS' | 'PUSH';

/**
 * A single-prop wager in the bet journal.
 * Settlement fields stay null until the bet is settled.
 */
export interface Bet {
  id: string;
  playerId: string;
  statType: string;
  line: number;
  pick: Pick;
  oddsPlaced: AmericanOdds;
  oddsClosing: AmericanOdds | null;
  stake: number;
  platform: string;
  /** Model probability when the bet was placed, percent. */
  probability: number | null;
  placedAt: number; // epoch ms
  result: BetResult | null;
  actualStat: number | null;
  /** Amount returned, stake included. */
  payout: number | null;
  profit: number | null;
  settledAt: number | null; // epoch ms
}

export interface BetInput {
  playerId: string;
  statType: string;
  line: number;
  pick: Pick;
  oddsPlaced: AmericanOdds;
  stake: number;
  platform?: string;
  probability?: number;
}

export interface BetFilter {
  /** Only unsettled bets. */
  pendingOnly?: boolean;
  /** Placed at or after this time, epoch ms. */
  since?: number;
}

export interface RoiSummary {
  totalBets: number;
  settledBets: number;
  pendingBets: number;
  wins: number;
  losses: number;
  pushes: number;
  totalStake: number;
  totalProfit: number;
  roiPercentage: number;
  /** Wins over decided bets, percent; pushes are left out. */
  winRate: number;
  avgOddsPlaced: number;
  avgOddsClosing: number | null;
  /** Mean closing minus placed implied probability, percentage points. Positive beat the close. */
  closingLineValue: number;
}
