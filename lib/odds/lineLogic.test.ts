import { describe, it, expect } from 'vitest';
import { deriveLineMovement } from './lineLogic';

describe('deriveLineMovement', () => {
  it('derives opening, current and movement', () => {
    const movement = deriveLineMovement([
      { playerId: '1', statType: 'REB', value: 9.5, timestamp: 2000 },
      { playerId: '1', statType: 'REB', value: 10.5, timestamp: 1000 },
    ]);

    expect(movement).toEqual({
      openingLine: 10.5,
      openingAt: 1000,
      currentLine: 9.5,
      currentAt: 2000,
      movement: -1,
      direction: 'DOWN',
    });
  });

  it('is empty without lines', () => {
    expect(deriveLineMovement([])).toEqual({
      openingLine: null,
      openingAt: null,
      currentLine: null,
      currentAt: null,
      movement: null,
      direction: null,
    });
  });
});
