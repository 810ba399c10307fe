import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('returns the defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads numeric settings from the environment', () => {
    const config = loadConfig({ EDGE_THRESHOLD: '3.5', EDGE_ROLLING_WINDOW: '8', CACHE_TTL_SECONDS: '600' });
    expect(config.edgeThreshold).toBe(3.5);
    expect(config.rollingWindow).toBe(8);
    expect(config.cacheTtlSeconds).toBe(600);
  });

  it('ignores blank values', () => {
    expect(loadConfig({ EDGE_THRESHOLD: '  ' }).edgeThreshold).toBe(2);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ EDGE_ROLLING_WINDOW: '2.5', EDGE_THRESHOLD: 'abc' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.invalid).toEqual([
      'EDGE_ROLLING_WINDOW=2.5 (expected an integer >= 1)',
      'EDGE_THRESHOLD=abc (expected a number >= 0)',
    ]);
  });

  it('validates the default leg odds', () => {
    expect(loadConfig({ PARLAY_DEFAULT_LEG_ODDS: '+150' }).defaultLegOdds).toBe(150);
    expect(() => loadConfig({ PARLAY_DEFAULT_LEG_ODDS: '-50' })).toThrow(ConfigError);
  });

  it('picks up the cache directory', () => {
    expect(loadConfig({ STAT_CACHE_DIR: '/tmp/stats' }).cacheDir).toBe('/tmp/stats');
  });

  it('applies overrides last', () => {
    expect(loadConfig({ EDGE_THRESHOLD: '3' }, { edgeThreshold: 1 }).edgeThreshold).toBe(1);
  });
});
