import {
  type DatasetRow,
  type DetectionEvent,
  type SpeciesActivitySummary,
  type SpeciesCode,
  type ZeroFillRecord,
  TIMES_OF_DAY,
} from '@domain/types';

export interface ActivityFilterResult {
  readonly events: readonly DetectionEvent[];
  readonly retainedSpecies: readonly SpeciesCode[];
  readonly excludedSpecies: readonly SpeciesActivitySummary[];
  readonly summaries: readonly SpeciesActivitySummary[];
}

function bySpeciesCode(a: { species_code: string }, b: { species_code: string }): number {
  return a.species_code < b.species_code ? -1 : a.species_code > b.species_code ? 1 : 0;
}

/**
 * Counts, per species, the distinct (site, date) pairs with a nonzero total
 * across both time-of-day windows.
 */
export function summarizeSpeciesActivity(
  events: readonly DetectionEvent[]
): SpeciesActivitySummary[] {
  const totals = new Map<SpeciesCode, Map<string, number>>();
  for (const e of events) {
    const perSiteDate = totals.get(e.species_code) ?? new Map<string, number>();
    const key = JSON.stringify([e.site_id, e.date]);
    perSiteDate.set(key, (perSiteDate.get(key) ?? 0) + e.detection_count);
    totals.set(e.species_code, perSiteDate);
  }
  return [...totals]
    .map(([species_code, perSiteDate]) => ({
      species_code,
      siteDateCount: [...perSiteDate.values()].filter((n) => n > 0).length,
    }))
    .sort(bySpeciesCode);
}

/**
 * Keeps only species detected on more than `threshold` distinct site-dates.
 * This is an inclusion policy for downstream comparisons, not a test.
 */
export function filterByActivity(
  events: readonly DetectionEvent[],
  threshold: number
): ActivityFilterResult {
  const summaries = summarizeSpeciesActivity(events);
  const retained = summaries.filter((s) => s.siteDateCount > threshold);
  const retainedSet = new Set(retained.map((s) => s.species_code));
  return {
    events: events.filter((e) => retainedSet.has(e.species_code)),
    retainedSpecies: retained.map((s) => s.species_code),
    excludedSpecies: summaries.filter((s) => !retainedSet.has(s.species_code)),
    summaries,
  };
}

/**
 * Adds one zero-count record for every species detected in only one
 * time-of-day window, so dawn/dusk comparisons see both sides.
 *
 * Zero-fill rows stand for a whole window, not a recording: they carry no
 * site, date, start time, split or hour bucket, and the writer leaves those
 * cells empty. Consumers must check `detection_count === 0` before reading
 * `date` or `start_time`.
 */
export function symmetrizeTimeOfDay(events: readonly DetectionEvent[]): DatasetRow[] {
  const seen = new Map<SpeciesCode, Set<string>>();
  for (const e of events) {
    if (e.detection_count <= 0) continue;
    const windows = seen.get(e.species_code) ?? new Set<string>();
    windows.add(e.time_of_day);
    seen.set(e.species_code, windows);
  }

  const zeroFills: ZeroFillRecord[] = [];
  for (const [species_code, windows] of seen) {
    for (const time_of_day of TIMES_OF_DAY) {
      if (!windows.has(time_of_day)) {
        zeroFills.push({ kind: 'zero-fill', species_code, time_of_day, detection_count: 0 });
      }
    }
  }
  zeroFills.sort(
    (a, b) => bySpeciesCode(a, b) || TIMES_OF_DAY.indexOf(a.time_of_day) - TIMES_OF_DAY.indexOf(b.time_of_day)
  );
  return [...events, ...zeroFills];
}
