import { describe, it, expect } from 'vitest';
import { TtlCache } from '../cache';
import { DEFAULT_CONFIG } from '../config';
import { InvalidInputError, StatSourceError } from '../errors';
import { LineHistoryTracker } from '../line-history/tracker';
import { EdgeService } from './runEdgeScan';
import type { StatSource } from './statSource';

class FakeStatSource implements StatSource {
  calls: string[] = [];
  private readonly data = new Map<string, number[] | StatSourceError>();

  set(playerId: string, statType: string, value: number[] | StatSourceError): this {
    this.data.set(`${playerId}:${statType}`, value);
    return this;
  }

  async fetch(playerId: string, statType: string): Promise<number[]> {
    const key = `${playerId}:${statType}`;
    this.calls.push(key);
    const value = this.data.get(key);
    if (value === undefined) throw new StatSourceError('NotFound', `No stats for ${key}`);
    if (value instanceof StatSourceError) throw value;
    return value;
  }
}

function createService(source: StatSource) {
  let nowMs = 1_000_000;
  const clock = () => nowMs;
  const tracker = new LineHistoryTracker({ now: clock });
  const service = new EdgeService({
    cache: new TtlCache<number[]>({ now: clock }),
    source,
    tracker,
    config: DEFAULT_CONFIG,
  });
  return {
    service,
    tracker,
    advanceSeconds: (seconds: number) => {
      nowMs += seconds * 1000;
    },
  };
}

describe('EdgeService.evaluateProp', () => {
  it('evaluates a prop with streak and consistency', async () => {
    const source = new FakeStatSource().set('237', 'PTS', [30, 32, 28, 31, 29]);
    const { service } = createService(source);

    const outcome = await service.evaluateProp({ playerId: '237', statType: 'pts', line: 24.5 });

    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(outcome.statType).toBe('PTS');
    expect(outcome.result.pick).toBe('OVER');
    expect(outcome.result.probability).toBe(98.9);
    expect(outcome.result.isEdge).toBe(true);
    expect(outcome.streak).toEqual({ count: 5, type: 'OVER', active: true });
    expect(outcome.consistency).toBe(4.7);
    expect(outcome.analytics).toMatchObject({ odds: -110, ev: 88.81, marketEdge: 46.52, kellyFraction: 25, isPositiveEv: true });
    expect(outcome.isStale).toBe(false);
    expect(outcome.fetchedAt).toBe(1000);
    expect(outcome.lineChange).toBeNull();
  });

  it('serves repeat calls from the cache and records line moves', async () => {
    const source = new FakeStatSource().set('237', 'PTS', [30, 32, 28, 31, 29]);
    const { service } = createService(source);

    await service.evaluateProp({ playerId: '237', statType: 'PTS', line: 24.5 });
    const outcome = await service.evaluateProp({ playerId: '237', statType: 'PTS', line: 25.5 });

    expect(source.calls).toEqual(['237:PTS']);
    expect(outcome.lineChange?.delta).toBe(1);
    expect(outcome.lineChange?.direction).toBe('UP');
  });

  it('reports too few games as no edge available', async () => {
    const source = new FakeStatSource().set('5', 'REB', [10, 12]);
    const { service } = createService(source);

    const outcome = await service.evaluateProp({ playerId: '5', statType: 'REB', line: 9.5 });

    expect(outcome).toMatchObject({ status: 'no_edge_available', reason: 'Need at least 5 observations, got 2' });
  });

  it('reports an upstream failure as unavailable and still records the line', async () => {
    const source = new FakeStatSource().set('7', 'AST', new StatSourceError('Unavailable', 'BDL API error: 500'));
    const { service, tracker } = createService(source);

    const outcome = await service.evaluateProp({ playerId: '7', statType: 'AST', line: 6.5 });

    expect(outcome).toMatchObject({ status: 'unavailable', reason: 'Data temporarily unavailable' });
    expect((await tracker.getCurrentLine('7', 'AST'))?.value).toBe(6.5);
  });

  it('serves stale stats when a refresh fails', async () => {
    const source = new FakeStatSource().set('237', 'PTS', [30, 32, 28, 31, 29]);
    const { service, advanceSeconds } = createService(source);

    await service.evaluateProp({ playerId: '237', statType: 'PTS', line: 24.5 });
    source.set('237', 'PTS', new StatSourceError('RateLimited', 'BDL rate limit hit'));
    advanceSeconds(DEFAULT_CONFIG.cacheTtlSeconds + 1);
    const outcome = await service.evaluateProp({ playerId: '237', statType: 'PTS', line: 24.5 });

    expect(outcome.status).toBe('ok');
    expect(outcome.status === 'ok' && outcome.isStale).toBe(true);
  });

  it('rejects unknown stat types and bad lines', async () => {
    const { service } = createService(new FakeStatSource());

    await expect(service.evaluateProp({ playerId: '1', statType: 'DUNKS', line: 1 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(service.evaluateProp({ playerId: ' ', statType: 'PTS', line: 1 })).rejects.toBeInstanceOf(InvalidInputError);
    await expect(service.evaluateProp({ playerId: '1', statType: 'PTS', line: Number.NaN })).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('EdgeService.scanEdges', () => {
  it('sorts outcomes into edges, streaks and failures', async () => {
    const source = new FakeStatSource()
      .set('1', 'PTS', [30, 32, 28, 31, 29])
      .set('2', 'PTS', [21, 21, 21, 21, 21])
      .set('3', 'PTS', [18, 25, 22, 19, 22])
      .set('4', 'PTS', [10])
      .set('5', 'PTS', new StatSourceError('Unavailable', 'down'));
    const { service } = createService(source);

    const scan = await service.scanEdges([
      { playerId: '1', statType: 'PTS', line: 24.5 },
      { playerId: '2', statType: 'PTS', line: 20 },
      { playerId: '3', statType: 'PTS', line: 21.5 },
      { playerId: '4', statType: 'PTS', line: 9.5 },
      { playerId: '5', statType: 'PTS', line: 15.5 },
    ]);

    expect(scan.edges.map(o => o.playerId)).toEqual(['1']);
    expect(scan.streaks.map(o => o.playerId)).toEqual(['2']);
    expect(scan.noEdgeAvailable.map(o => o.playerId)).toEqual(['4']);
    expect(scan.unavailable.map(o => o.playerId)).toEqual(['5']);
    expect(scan.filteredOut).toBe(0);
  });

  describe('filters and sorts', () => {
    const slate = [
      { playerId: '1', statType: 'PTS', line: 24.5 },
      { playerId: '7', statType: 'PTS', line: 22 },
    ];

    function createSlateService() {
      const source = new FakeStatSource()
        .set('1', 'PTS', [30, 32, 28, 31, 29])
        .set('7', 'PTS', [40, 20, 35, 15, 30]);
      return createService(source).service;
    }

    it('orders edges by probability unless asked otherwise', async () => {
      const service = createSlateService();

      expect((await service.scanEdges(slate)).edges.map(o => o.playerId)).toEqual(['1', '7']);
      expect((await service.scanEdges(slate, { sortBy: 'gap' })).edges.map(o => o.playerId)).toEqual(['7', '1']);
    });

    it('drops edges below the EV, market edge or probability floors', async () => {
      const service = createSlateService();

      const byEv = await service.scanEdges(slate, { minEv: 50 });
      expect(byEv.edges.map(o => o.playerId)).toEqual(['1']);
      expect(byEv.filteredOut).toBe(1);

      expect((await service.scanEdges(slate, { minMarketEdge: 30 })).edges.map(o => o.playerId)).toEqual(['1']);
      expect((await service.scanEdges(slate, { minProbability: 75 })).edges.map(o => o.playerId)).toEqual(['1']);
      expect((await service.scanEdges(slate, { positiveEvOnly: true })).edges).toHaveLength(2);
    });
  });
});

describe('EdgeService.refresh', () => {
  it('refetches every prop and summarizes the run', async () => {
    const source = new FakeStatSource()
      .set('1', 'PTS', [30, 32, 28, 31, 29])
      .set('2', 'REB', [4]);
    const { service } = createService(source);
    await service.evaluateProp({ playerId: '1', statType: 'PTS', line: 24.5 });

    const summary = await service.refresh([
      { playerId: '1', statType: 'PTS', line: 25.5 },
      { playerId: '2', statType: 'REB', line: 5.5 },
      { playerId: '3', statType: 'AST', line: 4.5 },
    ]);

    expect(summary).toEqual({ refreshed: 1, stale: 0, noData: 1, unavailable: 1, failed: 0, lineChanges: 1 });
    expect(source.calls.filter(c => c === '1:PTS')).toHaveLength(2);
  });

  it('counts a failing prop and keeps refreshing the rest', async () => {
    const source = new FakeStatSource().set('1', 'PTS', [30, 32, 28, 31, 29]);
    const { service } = createService(source);

    const summary = await service.refresh([
      { playerId: '9', statType: 'FOO', line: 3.5 },
      { playerId: '1', statType: 'PTS', line: 24.5 },
    ]);

    expect(summary).toEqual({ refreshed: 1, stale: 0, noData: 0, unavailable: 0, failed: 1, lineChanges: 0 });
    expect(source.calls).toEqual(['1:PTS']);
  });
});
