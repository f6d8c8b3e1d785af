/**
 * Time Utilities
 */

export type Clock = () => Date;

export const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const systemClock: Clock = () => new Date();

/**
 * ISO timestamp for the given clock
 */
export function isoNow(clock: Clock = systemClock): string {
  return clock().toISOString();
}

/**
 * Fractional days from `from` to `to`, clamped at zero
 */
export function ageInDays(from: string | Date, to: Date): number {
  const start = typeof from === 'string' ? new Date(from) : from;
  const diff = to.getTime() - start.getTime();
  return diff > 0 ? diff / MS_PER_DAY : 0;
}
