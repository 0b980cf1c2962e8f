import {
  type DatasetRow,
  type DetectionEvent,
  type SpeciesActivitySummary,
  type SpeciesCode,
  type TimeOfDay,
  TIMES_OF_DAY,
} from '@domain/types';
import { filterByActivity, symmetrizeTimeOfDay } from './activity-filter';
import { type AnnotationSourceTable, loadAnnotationTables } from './annotation-loader';
import type { PipelineConfig } from './config';
import { normalizeEvents } from './event-normalizer';
import type { SpeciesCodeMap } from './taxonomy-mapper';
import { binEvents } from './temporal-binner';

export interface DetectionPipelineInput {
  readonly speciesCodes: SpeciesCodeMap;
  readonly annotations: readonly AnnotationSourceTable[];
}

export interface DetectionPipelineResult {
  readonly rows: readonly DatasetRow[];
  readonly events: readonly DetectionEvent[];
  readonly retainedSpecies: readonly SpeciesCode[];
  readonly excludedSpecies: readonly SpeciesActivitySummary[];
  readonly unbucketedEvents: number;
  readonly droppedColumns: Readonly<Partial<Record<TimeOfDay, readonly string[]>>>;
}

/**
 * Runs every stage in memory. Throws on the first structural problem, so a
 * caller only ever sees a complete dataset.
 */
export function buildDetectionDataset(
  input: DetectionPipelineInput,
  config: PipelineConfig
): DetectionPipelineResult {
  const droppedColumns: Partial<Record<TimeOfDay, readonly string[]>> = {};

  const normalized = TIMES_OF_DAY.flatMap((timeOfDay) => {
    const tables = input.annotations.filter((t) => t.timeOfDay === timeOfDay);
    if (tables.length === 0) return [];
    const table = loadAnnotationTables(timeOfDay, tables, {
      droppedColumns: config.droppedColumns,
    });
    droppedColumns[timeOfDay] = table.droppedColumns;
    return normalizeEvents(table, input.speciesCodes);
  });

  const binned = binEvents(normalized);
  const filtered = filterByActivity(binned, config.minimumOccurrenceThreshold);
  const rows = config.symmetrizeTimeOfDay
    ? symmetrizeTimeOfDay(filtered.events)
    : filtered.events;

  return {
    rows,
    events: filtered.events,
    retainedSpecies: filtered.retainedSpecies,
    excludedSpecies: filtered.excludedSpecies,
    unbucketedEvents: filtered.events.filter((e) => e.hour_of_day === null).length,
    droppedColumns,
  };
}
