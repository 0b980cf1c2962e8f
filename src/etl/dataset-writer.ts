import * as fs from 'fs';
import * as path from 'path';
import { csvFormat } from 'd3-dsv';
import { IOError } from '@domain/errors';
import type { DatasetRow } from '@domain/types';

// Column order is the contract with every downstream analysis
export const DATASET_COLUMNS = [
  'site_id',
  'date',
  'start_time',
  'split_index',
  'time_of_day',
  'restoration_type',
  'hour_of_day',
  'species_code',
  'detection_count',
] as const;

export type DatasetColumn = (typeof DATASET_COLUMNS)[number];

export interface WriteDatasetResult {
  readonly outputPath: string;
  readonly rowCount: number;
}

function toCsvRecord(row: DatasetRow): Record<DatasetColumn, string> {
  if (row.kind === 'zero-fill') {
    // No recording behind it: date and start_time stay empty
    return {
      site_id: '',
      date: '',
      start_time: '',
      split_index: '',
      time_of_day: row.time_of_day,
      restoration_type: '',
      hour_of_day: '',
      species_code: row.species_code,
      detection_count: '0',
    };
  }
  return {
    site_id: row.site_id,
    date: row.date,
    start_time: row.start_time,
    split_index: row.split_index,
    time_of_day: row.time_of_day,
    restoration_type: row.restoration_type,
    hour_of_day: row.hour_of_day ?? '',
    species_code: row.species_code,
    detection_count: String(row.detection_count),
  };
}

export function formatDataset(rows: readonly DatasetRow[]): string {
  return `${csvFormat(rows.map(toCsvRecord), DATASET_COLUMNS)}\n`;
}

/**
 * Writes the dataset through a temporary sibling file and renames it into
 * place, so readers never observe a half-written table.
 */
export function writeDataset(rows: readonly DatasetRow[], outputPath: string): WriteDatasetResult {
  const content = formatDataset(rows);
  const tempPath = `${outputPath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, outputPath);
  } catch (error) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
    throw new IOError('Cannot write detection dataset', outputPath, { cause: error });
  }
  return { outputPath, rowCount: rows.length };
}
