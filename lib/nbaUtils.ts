/**
 * NBA calendar helpers
 */

/**
 * The NBA season year for a date, named by the year it starts in.
 * A season starts around October 15th, so anything earlier belongs to the previous year's season.
 */
export function currentNbaSeason(now: Date = new Date()): number {
  const month = now.getMonth(); // 0-11
  const day = now.getDate();

  if (month === 9 && day >= 15) {
    return now.getFullYear();
  }
  return month >= 10 ? now.getFullYear() : now.getFullYear() - 1;
}
