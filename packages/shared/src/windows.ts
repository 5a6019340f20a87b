export const DEFAULT_ANALYSIS_WINDOWS_HOURS = [1, 6, 24] as const;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export function clampProbability(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export function toPct(probability: number, digits = 1): string {
  return `${(probability * 100).toFixed(digits)}%`;
}

export function hoursBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / HOUR_MS;
}

export function hoursBefore(date: Date, hours: number): Date {
  return new Date(date.getTime() - hours * HOUR_MS);
}

export function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Whole days from `now` until `end`, floored; negative once `end` has passed. */
export function wholeDaysUntil(now: Date, end: Date): number {
  return Math.floor((end.getTime() - now.getTime()) / DAY_MS);
}
