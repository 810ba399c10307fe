// Types for odds and line movement

export type AmericanOdds = number; // e.g., -110, +120

export type MovementDirection = 'UP' | 'DOWN' | 'UNCHANGED';

/**
 * A posted line for one player/stat at a point in time.
 * Immutable once recorded: a new posting is a new Line.
 */
export interface Line {
  playerId: string;
  statType: string;
  value: number;
  // Unix epoch milliseconds when this line was observed
  timestamp: number;
}

export interface LineMovement {
  openingLine: number | null;
  openingAt: number | null; // epoch ms
  currentLine: number | null;
  currentAt: number | null; // epoch ms
  movement: number | null; // current - opening (positive => up)
  direction: MovementDirection | null;
}
