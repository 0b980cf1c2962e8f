import { FilenameFormatError, SchemaError } from '@domain/errors';
import {
  type AnnotationChunk,
  type AnnotationTable,
  type IsoDate,
  type Season,
  type StartTime,
  type TimeOfDay,
  isValidIsoDate,
} from '@domain/types';
import {
  FILENAME_COLUMN,
  FILENAME_DELIMITER,
  RESTORATION_COLUMN,
  TIME_LABEL_COLUMN,
} from './config';
import type { AnnotationRawRecord } from './csv-parser';
import { normalizeStartTime } from './temporal-binner';

// One parsed season/time-of-day file
export interface AnnotationSourceTable {
  readonly season: Season;
  readonly timeOfDay: TimeOfDay;
  readonly label: string; // e.g. file path, used in error messages
  readonly columns: readonly string[];
  readonly records: readonly AnnotationRawRecord[];
}

export interface FilenameParts {
  readonly site_id: string;
  readonly date: IsoDate;
  readonly start_time: StartTime;
  readonly split_index: string;
}

export interface ColumnLayout {
  readonly speciesColumns: readonly string[];
  readonly droppedColumns: readonly string[];
}

export interface LoadAnnotationOptions {
  readonly droppedColumns?: readonly string[];
}

const REQUIRED_COLUMNS = [FILENAME_COLUMN, RESTORATION_COLUMN];

function parseRecordingDate(raw: string): IsoDate | null {
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(raw);
  const candidate = compact ? `${compact[1]}-${compact[2]}-${compact[3]}` : raw;
  return isValidIsoDate(candidate) ? candidate : null;
}

/**
 * Splits "SITE_YYYYMMDD_HHMMSS_N[.ext]" into recording metadata.
 */
export function decomposeFilename(filename: string): FilenameParts {
  const base = filename.trim().replace(/\.[A-Za-z0-9]+$/, '');
  const parts = base.split(FILENAME_DELIMITER);
  if (parts.length !== 4) {
    throw new FilenameFormatError(
      filename,
      `expected 4 '${FILENAME_DELIMITER}'-delimited parts, found ${parts.length}`
    );
  }
  const [siteId = '', rawDate = '', rawTime = '', splitIndex = ''] = parts;
  if ([siteId, rawDate, rawTime, splitIndex].some((p) => p.trim() === '')) {
    throw new FilenameFormatError(filename, 'empty filename component');
  }
  const date = parseRecordingDate(rawDate);
  if (!date) {
    throw new FilenameFormatError(filename, `invalid recording date "${rawDate}"`);
  }
  const startTime = normalizeStartTime(rawTime);
  if (!startTime) {
    throw new FilenameFormatError(filename, `invalid start time "${rawTime}"`);
  }
  return { site_id: siteId, date, start_time: startTime, split_index: splitIndex };
}

/**
 * Separates species columns from recording/annotator metadata. The time label
 * column and everything after it is annotator free text.
 */
export function classifyColumns(
  columns: readonly string[],
  extraDropped: readonly string[] = []
): ColumnLayout {
  const timeLabelIndex = columns.indexOf(TIME_LABEL_COLUMN);
  const speciesColumns: string[] = [];
  const droppedColumns: string[] = [];
  columns.forEach((column, idx) => {
    if (column === FILENAME_COLUMN || column === RESTORATION_COLUMN) return;
    const trailing = timeLabelIndex !== -1 && idx >= timeLabelIndex;
    if (trailing || extraDropped.includes(column)) {
      droppedColumns.push(column);
    } else {
      speciesColumns.push(column);
    }
  });
  return { speciesColumns, droppedColumns };
}

function assertRequiredColumns(table: AnnotationSourceTable): void {
  const missing = REQUIRED_COLUMNS.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new SchemaError(`${table.label} is missing required columns: ${missing.join(', ')}`, {
      source: table.label,
      missingColumns: missing,
    });
  }
}

function assertSameColumns(reference: AnnotationSourceTable, table: AnnotationSourceTable): void {
  const missing = reference.columns.filter((c) => !table.columns.includes(c));
  const extra = table.columns.filter((c) => !reference.columns.includes(c));
  if (missing.length === 0 && extra.length === 0) return;
  const detail = [
    missing.length > 0 ? `missing ${missing.join(', ')}` : '',
    extra.length > 0 ? `extra ${extra.join(', ')}` : '',
  ]
    .filter((s) => s !== '')
    .join('; ');
  throw new SchemaError(
    `${table.label} columns do not match ${reference.label}: ${detail}`,
    { source: table.label, missingColumns: missing, extraColumns: extra }
  );
}

function toChunk(
  record: AnnotationRawRecord,
  timeOfDay: TimeOfDay,
  speciesColumns: readonly string[]
): AnnotationChunk {
  const filename = (record[FILENAME_COLUMN] ?? '').trim();
  const parts = decomposeFilename(filename);
  return {
    ...parts,
    filename,
    time_of_day: timeOfDay,
    restoration_type: record[RESTORATION_COLUMN] ?? '',
    species_presence: new Map(speciesColumns.map((c) => [c, record[c]])),
  };
}

/**
 * Unions the seasonal tables of one time-of-day window into a single table.
 * Rows are tagged by provenance: a dawn file is dawn whatever its clock says.
 */
export function loadAnnotationTables(
  timeOfDay: TimeOfDay,
  tables: readonly AnnotationSourceTable[],
  options: LoadAnnotationOptions = {}
): AnnotationTable {
  const [reference] = tables;
  if (!reference) {
    throw new SchemaError(`No annotation tables supplied for ${timeOfDay}`, { source: timeOfDay });
  }

  for (const table of tables) {
    if (table.timeOfDay !== timeOfDay) {
      throw new SchemaError(`${table.label} is a ${table.timeOfDay} table, expected ${timeOfDay}`, {
        source: table.label,
      });
    }
    assertRequiredColumns(table);
    assertSameColumns(reference, table);
  }

  const layout = classifyColumns(reference.columns, options.droppedColumns);
  const rows = tables.flatMap((table) =>
    table.records.map((record) => toChunk(record, timeOfDay, layout.speciesColumns))
  );

  return {
    time_of_day: timeOfDay,
    speciesColumns: layout.speciesColumns,
    droppedColumns: layout.droppedColumns,
    rows,
  };
}
