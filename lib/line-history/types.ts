import type { Line, MovementDirection } from '../odds/types';

export type { Line, MovementDirection };

/**
 * Recorded whenever a new line differs from the last one for the same player/stat.
 * Append-only.
 */
export interface LineChangeEvent {
  playerId: string;
  statType: string;
  previousValue: number;
  newValue: number;
  direction: MovementDirection;
  /** newValue - previousValue */
  delta: number;
  observedAt: number; // epoch ms
  /** Set when the change came through editLine rather than a feed. */
  manual: boolean;
}

export interface ChaseListEntry {
  playerId: string;
  statType: string;
  lineValue: number;
  reason: string;
  status: 'active';
  addedAt: number; // epoch ms
  updatedAt: number; // epoch ms
}

export interface AltLineEntry {
  playerId: string;
  statType: string;
  mainLine: number;
  altLine: number;
  source: string;
  /** altLine - mainLine, one decimal */
  delta: number;
  addedAt: number; // epoch ms
}

export interface ChaseListInput {
  playerId: string;
  statType: string;
  lineValue: number;
  reason?: string;
}

export interface AltLineInput {
  playerId: string;
  statType: string;
  mainLine: number;
  altLine: number;
  source?: string;
}
