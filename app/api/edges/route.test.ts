import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { NextRequest } from 'next/server';
import { DEFAULT_CONFIG } from '@/lib/config';
import type { StatSource } from '@/lib/edge-engine/statSource';
import { buildServices, setServices } from '@/lib/services';
import { GET, POST } from './route';

const games: Record<string, number[]> = {
  '1': [30, 32, 28, 31, 29],
  '2': [12, 13, 11, 12, 12],
  '3': [9, 9, 8, 10, 9],
};

const source: StatSource = {
  fetch: async playerId => games[playerId] ?? [],
};

describe('/api/edges', () => {
  beforeEach(() => {
    setServices(buildServices({ config: DEFAULT_CONFIG, source }));
  });

  afterEach(() => {
    setServices(undefined);
  });

  it('evaluates a single prop from the query string', async () => {
    const response = await GET(new NextRequest('http://localhost/api/edges?player_id=1&stat_type=pts&line=24.5'));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.data.status).toBe('ok');
    expect(body.data.result.probability).toBe(98.9);
  });

  it('requires a numeric line', async () => {
    const response = await GET(new NextRequest('http://localhost/api/edges?player_id=1&stat_type=PTS&line=abc'));
    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('line must be a number');
  });

  it('scans a slate and recommends parlays', async () => {
    const response = await POST(new NextRequest('http://localhost/api/edges', {
      method: 'POST',
      body: JSON.stringify({
        parlays: true,
        props: [
          { playerId: '1', statType: 'PTS', line: 24.5 },
          { playerId: '2', statType: 'REB', line: 8.5 },
          { playerId: '3', statType: 'AST', line: 5.5 },
        ],
      }),
    }));
    const body = await response.json();

    expect(body.data.edges).toHaveLength(3);
    expect(body.data.parlays.twoLeg).toHaveLength(3);
    expect(body.data.parlays.threeLeg).toHaveLength(1);
  });

  it('applies EV filters to the scanned edges', async () => {
    const response = await POST(new NextRequest('http://localhost/api/edges', {
      method: 'POST',
      body: JSON.stringify({
        minEv: 1000,
        props: [
          { playerId: '1', statType: 'PTS', line: 24.5 },
          { playerId: '2', statType: 'REB', line: 8.5 },
        ],
      }),
    }));
    const body = await response.json();

    expect(body.data.edges).toEqual([]);
    expect(body.data.filteredOut).toBe(2);
  });

  it('rejects an unknown sort', async () => {
    const response = await POST(new NextRequest('http://localhost/api/edges', {
      method: 'POST',
      body: JSON.stringify({ sortBy: 'grade', props: [{ playerId: '1', statType: 'PTS', line: 24.5 }] }),
    }));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('sortBy must be one of probability, ev, marketEdge, kelly, gap');
  });
});
