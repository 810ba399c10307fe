import { describe, it, expect } from 'vitest';
import { InvalidInputError, NotFoundError } from '../errors';
import { BetTracker } from './tracker';
import type { BetInput } from './types';

function createTracker(startMs = 1_000) {
  let current = startMs;
  let nextId = 0;
  const tracker = new BetTracker({
    now: () => current,
    newId: () => `bet-${++nextId}`,
  });
  return {
    tracker,
    setNow: (ms: number) => {
      current = ms;
    },
  };
}

const over: BetInput = { playerId: '237', statType: 'pts', line: 24.5, pick: 'OVER', oddsPlaced: -110, stake: 100 };

describe('BetTracker.addBet', () => {
  it('records a pending bet under the stat code', async () => {
    const { tracker } = createTracker();

    expect(await tracker.addBet({ ...over, probability: 72 })).toEqual({
      id: 'bet-1',
      playerId: '237',
      statType: 'PTS',
      line: 24.5,
      pick: 'OVER',
      oddsPlaced: -110,
      oddsClosing: null,
      stake: 100,
      platform: 'Unknown',
      probability: 72,
      placedAt: 1000,
      result: null,
      actualStat: null,
      payout: null,
      profit: null,
      settledAt: null,
    });
  });

  it('rejects bad input', async () => {
    const { tracker } = createTracker();

    await expect(tracker.addBet({ ...over, statType: 'DUNKS' })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(tracker.addBet({ ...over, oddsPlaced: 50 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(tracker.addBet({ ...over, stake: 0 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(tracker.addBet({ ...over, probability: 120 })).rejects.toBeInstanceOf(InvalidInputError);
    expect(await tracker.listBets()).toEqual([]);
  });
});

describe('BetTracker.settleBet', () => {
  it('grades the bet and books the payout', async () => {
    const { tracker, setNow } = createTracker();
    const bet = await tracker.addBet(over);
    setNow(5_000);

    const settled = await tracker.settleBet(bet.id, 27, -125);

    expect(settled).toMatchObject({ result: 'WIN', actualStat: 27, payout: 190.91, profit: 90.91, oddsClosing: -125, settledAt: 5000 });
    expect(await tracker.listBets({ pendingOnly: true })).toEqual([]);
  });

  it('keeps earlier closing odds when none are given', async () => {
    const { tracker } = createTracker();
    const bet = await tracker.addBet(over);
    await tracker.updateClosingOdds(bet.id, -130);

    expect((await tracker.settleBet(bet.id, 20)).oddsClosing).toBe(-130);
  });

  it('fails for an unknown bet', async () => {
    const { tracker } = createTracker();

    await expect(tracker.settleBet('missing', 20)).rejects.toBeInstanceOf(NotFoundError);
    await expect(tracker.updateClosingOdds('missing', -110)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('BetTracker.getRoi', () => {
  it('summarizes settled bets and closing line value', async () => {
    const { tracker, setNow } = createTracker();
    const win = await tracker.addBet(over);
    const loss = await tracker.addBet({ ...over, pick: 'UNDER', oddsPlaced: 150, stake: 50 });
    const push = await tracker.addBet({ ...over, statType: 'REB', line: 8, oddsPlaced: -120, stake: 40 });
    setNow(9_000);
    await tracker.addBet({ ...over, stake: 10 });

    await tracker.settleBet(win.id, 27, -130);
    await tracker.settleBet(loss.id, 30, 120);
    await tracker.settleBet(push.id, 8);

    expect(await tracker.getRoi()).toEqual({
      totalBets: 4,
      settledBets: 3,
      pendingBets: 1,
      wins: 1,
      losses: 1,
      pushes: 1,
      totalStake: 190,
      totalProfit: 40.91,
      roiPercentage: 21.53,
      winRate: 50,
      avgOddsPlaced: -27,
      avgOddsClosing: -5,
      closingLineValue: 4.8,
    });
    expect((await tracker.getRoi({ since: 5_000 })).totalBets).toBe(1);
  });

  it('deletes bets', async () => {
    const { tracker } = createTracker();
    const bet = await tracker.addBet(over);

    expect(await tracker.deleteBet(bet.id)).toBe(true);
    expect(await tracker.deleteBet(bet.id)).toBe(false);
    expect(await tracker.listBets()).toEqual([]);
  });
});
