// Derivation of opening/current lines and movement from recorded lines
import type { Line, LineMovement } from './types';
import { computeMovement, pickCurrentLine, pickOpeningLine } from './utils';

export function deriveLineMovement(lines: Line[]): LineMovement {
  const opening = pickOpeningLine(lines);
  const current = pickCurrentLine(lines);

  const openingLine = opening ? opening.value : null;
  const currentLine = current ? current.value : null;
  const { movement, direction } = computeMovement(openingLine, currentLine);

  return {
    openingLine,
    openingAt: opening ? opening.timestamp : null,
    currentLine,
    currentAt: current ? current.timestamp : null,
    movement,
    direction,
  };
}
