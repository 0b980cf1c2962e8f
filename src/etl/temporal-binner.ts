import {
  type DetectionEvent,
  type HourBucketLabel,
  type StartTime,
  type UnbinnedDetectionEvent,
  isClockTime,
  isValidStartTime,
} from '@domain/types';

export interface HourBucket {
  readonly label: HourBucketLabel;
  readonly lower: number; // HHMMSS as an integer, inclusive
  readonly upper: number; // HHMMSS as an integer
  readonly closedRight: boolean;
}

/**
 * Hourly buckets of the dawn (06-10) and dusk (16-19) recording windows.
 * Half-open except the last of each window, which also takes its closing
 * instant (e.g. 100000).
 */
export const HOUR_BUCKETS: readonly HourBucket[] = [
  { label: '6AM-7AM', lower: 60000, upper: 70000, closedRight: false },
  { label: '7AM-8AM', lower: 70000, upper: 80000, closedRight: false },
  { label: '8AM-9AM', lower: 80000, upper: 90000, closedRight: false },
  { label: '9AM-10AM', lower: 90000, upper: 100000, closedRight: true },
  { label: '4PM-5PM', lower: 160000, upper: 170000, closedRight: false },
  { label: '5PM-6PM', lower: 170000, upper: 180000, closedRight: false },
  { label: '6PM-7PM', lower: 180000, upper: 190000, closedRight: true },
];

// "60000" -> "060000"; null when the value is not all digits
export function normalizeStartTime(raw: string): StartTime | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const padded = trimmed.padStart(6, '0');
  return isValidStartTime(padded) ? padded : null;
}

// null for anything outside the buckets, including values that are not clock times
export function hourOfDay(startTime: StartTime): HourBucketLabel | null {
  if (!isClockTime(startTime)) return null;
  const t = Number.parseInt(startTime, 10);
  const bucket = HOUR_BUCKETS.find(
    (b) => t >= b.lower && (t < b.upper || (b.closedRight && t === b.upper))
  );
  return bucket ? bucket.label : null;
}

export function binEvents(events: readonly UnbinnedDetectionEvent[]): DetectionEvent[] {
  return events.map((e) => ({ ...e, hour_of_day: hourOfDay(e.start_time) }));
}
