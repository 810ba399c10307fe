import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { NextRequest } from 'next/server';
import { DEFAULT_CONFIG } from '@/lib/config';
import type { StatSource } from '@/lib/edge-engine/statSource';
import { buildServices, getServices, setServices } from '@/lib/services';
import { GET, POST } from './route';

const games: Record<string, number[]> = {
  '237': [30, 32, 28, 31, 29],
};

function cronRequest(method: string, body?: string, secret = 'test-secret'): NextRequest {
  return new NextRequest('http://localhost/api/cron/refresh', {
    method,
    headers: { Authorization: `Bearer ${secret}` },
    ...(body !== undefined ? { body } : {}),
  });
}

describe('/api/cron/refresh', () => {
  let calls: string[];

  beforeEach(() => {
    vi.stubEnv('CRON_SECRET', 'test-secret');
    calls = [];
    const source: StatSource = {
      fetch: async (playerId, statType) => {
        calls.push(`${playerId}:${statType}`);
        return games[playerId] ?? [];
      },
    };
    setServices(buildServices({ config: DEFAULT_CONFIG, source }));
  });

  afterEach(() => {
    setServices(undefined);
    vi.unstubAllEnvs();
  });

  it('refreshes every chase-list entry when the body is empty', async () => {
    const { tracker } = getServices();
    await tracker.addToChaseList({ playerId: '237', statType: 'PTS', lineValue: 24.5 });
    await tracker.addToChaseList({ playerId: '5', statType: 'REB', lineValue: 9.5 });

    const response = await POST(cronRequest('POST'));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      success: true,
      data: { refreshed: 1, stale: 0, noData: 1, unavailable: 0, failed: 0, lineChanges: 0, purged: 0 },
    });
    expect(calls.sort()).toEqual(['237:PTS', '5:REB']);
    expect((await tracker.getCurrentLine('237', 'PTS'))?.value).toBe(24.5);
  });

  it('keeps going past a prop it cannot evaluate', async () => {
    const body = JSON.stringify({
      props: [
        { playerId: '9', statType: 'FOO', line: 3.5 },
        { playerId: '237', statType: 'PTS', line: 24.5 },
      ],
    });

    const response = await POST(cronRequest('POST', body));

    expect(response.status).toBe(200);
    expect((await response.json()).data).toMatchObject({ refreshed: 1, failed: 1 });
    expect(calls).toEqual(['237:PTS']);
  });

  it('runs the same refresh on GET', async () => {
    const response = await GET(cronRequest('GET'));

    expect(await response.json()).toEqual({
      success: true,
      data: { refreshed: 0, stale: 0, noData: 0, unavailable: 0, failed: 0, lineChanges: 0, purged: 0 },
    });
  });

  it('rejects a request without the secret', async () => {
    const response = await POST(cronRequest('POST', undefined, 'wrong'));

    expect(response.status).toBe(401);
    expect(calls).toEqual([]);
  });

  it('rejects a body that is not JSON', async () => {
    const response = await POST(cronRequest('POST', '{props'));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('Request body must be valid JSON');
  });
});
