/**
 * Contract for the upstream per-game stat provider
 */

export interface StatSource {
  /**
   * Most recent per-game values for a player's stat, newest game first.
   * Rejects with StatSourceError (RateLimited | NotFound | Unavailable).
   */
  fetch(playerId: string, statType: string, lookbackN: number): Promise<number[]>;
}
