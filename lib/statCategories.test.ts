import { describe, it, expect } from 'vitest';
import {
  combineStatValues,
  getCombinationStats,
  getIndividualStats,
  getStatCategory,
  getStatDisplayName,
  isValidStatType,
  normalizeStatType,
} from './statCategories';

const game = { pts: 20, reb: 5, ast: 3, stl: 1, blk: 0, fg3m: 2 };

describe('normalizeStatType', () => {
  it('upper-cases and resolves aliases', () => {
    expect(normalizeStatType(' pts ')).toBe('PTS');
    expect(normalizeStatType('threes')).toBe('3PM');
    expect(normalizeStatType('pts+reb+ast')).toBe('PRA');
    expect(normalizeStatType('RA')).toBe('REB+AST');
  });
});

describe('getStatCategory', () => {
  it('returns the component fields', () => {
    expect(getStatCategory('pra')?.fields).toEqual(['pts', 'reb', 'ast']);
    expect(getStatCategory('fg3m')?.code).toBe('3PM');
  });

  it('returns null for unknown stats', () => {
    expect(getStatCategory('DUNKS')).toBeNull();
    expect(isValidStatType('DUNKS')).toBe(false);
  });
});

describe('category lists', () => {
  it('splits individual and combination stats', () => {
    expect(getIndividualStats().map(c => c.code)).toEqual(['PTS', 'REB', 'AST', 'STL', 'BLK', '3PM']);
    expect(getCombinationStats()).toHaveLength(5);
  });
});

describe('getStatDisplayName', () => {
  it('falls back to the input', () => {
    expect(getStatDisplayName('PR')).toBe('Points + Rebounds');
    expect(getStatDisplayName('DUNKS')).toBe('DUNKS');
  });
});

describe('combineStatValues', () => {
  it('sums combination components per game', () => {
    expect(combineStatValues([game, { ...game, pts: 30 }], 'PRA')).toEqual([28, 38]);
    expect(combineStatValues([game], '3PM')).toEqual([2]);
  });

  it('returns null for unknown stats', () => {
    expect(combineStatValues([game], 'DUNKS')).toBeNull();
  });
});
