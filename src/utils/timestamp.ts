function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Drop the sub-second part of a date.
 */
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Format a date as local wall-clock time, e.g. `14:03:09`.
 */
export function formatClockTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Whole seconds elapsed between two instants, never negative.
 */
export function getElapsedSeconds(since: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - since.getTime()) / 1000));
}
