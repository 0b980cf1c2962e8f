import { SchemaError } from '@domain/errors';
import type {
  AnnotationTable,
  RecordingMetadata,
  SpeciesCode,
  UnbinnedDetectionEvent,
} from '@domain/types';
import type { SpeciesCodeMap } from './taxonomy-mapper';

interface EventGroup {
  readonly metadata: RecordingMetadata;
  readonly counts: Map<SpeciesCode, number>;
}

const BLANK_CELLS = new Set(['', 'NA', 'NaN']);

/**
 * Reads one species cell. Blank and NA cells are absences, not errors.
 */
export function parseDetectionCount(
  cell: string | undefined,
  context: { readonly column: string; readonly filename: string }
): number {
  const value = (cell ?? '').trim();
  if (BLANK_CELLS.has(value)) return 0;
  if (!/^\d+(\.0+)?$/.test(value)) {
    throw new SchemaError(
      `Invalid detection count "${value}" in column ${context.column} of ${context.filename}`,
      { source: context.filename }
    );
  }
  return Number.parseInt(value, 10);
}

function groupKey(m: RecordingMetadata): string {
  return JSON.stringify([
    m.site_id,
    m.date,
    m.start_time,
    m.split_index,
    m.time_of_day,
    m.restoration_type,
  ]);
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareEvents(a: UnbinnedDetectionEvent, b: UnbinnedDetectionEvent): number {
  return (
    compareText(a.time_of_day, b.time_of_day) ||
    compareText(a.site_id, b.site_id) ||
    compareText(a.date, b.date) ||
    compareText(a.start_time, b.start_time) ||
    compareText(a.split_index, b.split_index) ||
    compareText(a.restoration_type, b.restoration_type) ||
    compareText(a.species_code, b.species_code)
  );
}

/**
 * Reshapes wide annotation rows (one column per ad-hoc code) into long-form
 * events. Duplicate chunks are summed, ad-hoc variants of one species are
 * merged, and zero totals are never emitted.
 */
export function normalizeEvents(
  table: AnnotationTable,
  speciesCodes: SpeciesCodeMap
): UnbinnedDetectionEvent[] {
  // Every species column must resolve, even one that is all zeros
  const resolved = speciesCodes.resolveAll(table.speciesColumns);

  const groups = new Map<string, EventGroup>();
  for (const row of table.rows) {
    const metadata: RecordingMetadata = {
      site_id: row.site_id,
      date: row.date,
      start_time: row.start_time,
      split_index: row.split_index,
      time_of_day: row.time_of_day,
      restoration_type: row.restoration_type,
    };
    const key = groupKey(metadata);
    let group = groups.get(key);
    if (!group) {
      group = { metadata, counts: new Map() };
      groups.set(key, group);
    }
    for (const [column, speciesCode] of resolved) {
      const count = parseDetectionCount(row.species_presence.get(column), {
        column,
        filename: row.filename,
      });
      if (count > 0) {
        group.counts.set(speciesCode, (group.counts.get(speciesCode) ?? 0) + count);
      }
    }
  }

  const events: UnbinnedDetectionEvent[] = [];
  for (const { metadata, counts } of groups.values()) {
    for (const [speciesCode, total] of counts) {
      events.push({
        kind: 'detection',
        ...metadata,
        species_code: speciesCode,
        detection_count: total,
      });
    }
  }
  return events.sort(compareEvents);
}
