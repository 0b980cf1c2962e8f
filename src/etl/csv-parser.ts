import { type SpeciesCode, createSpeciesCode, isValidSpeciesCode } from '@domain/types';
import { type DSVRowArray, csvParse } from 'd3-dsv';
import {
  TAXONOMY_ANNOTATION_CODE_COLUMN,
  TAXONOMY_COMMON_NAME_COLUMN,
  TAXONOMY_SCIENTIFIC_NAME_COLUMN,
  TAXONOMY_SPECIES_CODE_COLUMN,
} from './config';

// Raw record interfaces for parsed CSV data
export interface TaxonomyRawRecord {
  readonly speciesCode: SpeciesCode;
  readonly annotationCodes: readonly string[];
  readonly scientificName?: string;
  readonly commonName?: string;
}

export type AnnotationRawRecord = Readonly<Record<string, string | undefined>>;

// Validation error types
export type CSVValidationErrorType =
  | 'MISSING_COLUMNS'
  | 'DUPLICATE_COLUMNS'
  | 'BLANK_COLUMN_NAME'
  | 'INVALID_SPECIES_CODE'
  | 'EMPTY_REQUIRED_FIELD'
  | 'MALFORMED_ROW';

export interface CSVValidationError {
  readonly type: CSVValidationErrorType;
  readonly message: string;
  readonly row: number; // 1-based (excluding header) where possible
  readonly value: string;
}

export interface CSVParseStats {
  readonly totalRows: number; // data rows processed (after parsing, excludes header)
  readonly validRecords: number;
  readonly skippedRecords: number;
  readonly errorRecords: number;
}

export interface CSVParseResult<T> {
  readonly success: boolean;
  readonly columns: readonly string[];
  readonly records: readonly T[];
  readonly errors: readonly CSVValidationError[];
  readonly stats: CSVParseStats;
}

const EMPTY_STATS: CSVParseStats = {
  totalRows: 0,
  validRecords: 0,
  skippedRecords: 0,
  errorRecords: 0,
};

// Utility: remove BOM
function stripBOM(content: string): string {
  return content.replace(/^[\ufeff]+/, '');
}

function failure<T>(
  error: CSVValidationError,
  columns: readonly string[] = [],
  totalRows = 0
): CSVParseResult<T> {
  return {
    success: false,
    columns,
    records: [],
    errors: [error],
    stats: { ...EMPTY_STATS, totalRows },
  };
}

function readRows(
  csvContent: string
): { rows: DSVRowArray<string> } | { error: CSVValidationError } {
  try {
    const rows = csvParse(stripBOM(csvContent));
    if (rows.length === 0) {
      return {
        error: {
          type: 'MALFORMED_ROW',
          message: 'CSV contains no data rows',
          row: 0,
          value: '',
        },
      };
    }
    return { rows };
  } catch (e) {
    return {
      error: {
        type: 'MALFORMED_ROW',
        message: 'Failed to parse CSV',
        row: 0,
        value: String(e),
      },
    };
  }
}

function headerProblems(columns: readonly string[]): CSVValidationError | null {
  if (columns.some((c) => c.trim() === '')) {
    return {
      type: 'BLANK_COLUMN_NAME',
      message: 'Header contains a blank column name',
      row: 0,
      value: columns.join(','),
    };
  }
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const c of columns) {
    if (seen.has(c)) duplicates.add(c);
    seen.add(c);
  }
  if (duplicates.size > 0) {
    return {
      type: 'DUPLICATE_COLUMNS',
      message: `Duplicate columns: ${[...duplicates].join(', ')}`,
      row: 0,
      value: [...duplicates].join(','),
    };
  }
  return null;
}

function isBlankRow(row: Readonly<Record<string, string | undefined>>, columns: readonly string[]): boolean {
  return columns.every((c) => (row[c] ?? '').trim() === '');
}

// A taxonomy cell may list historical variants: "AMKE; AMKE2" or "AMKE|AMKE2"
export function splitAnnotationCodes(cell: string): string[] {
  return cell
    .split(/[;|]/)
    .map((c) => c.trim())
    .filter((c) => c !== '');
}

/**
 * Parses the species-code taxonomy table (eBird codes alongside the ad-hoc
 * codes annotators used). Rows without an annotation code are skipped.
 */
export function parseTaxonomyCSV(csvContent: string): CSVParseResult<TaxonomyRawRecord> {
  const parsed = readRows(csvContent);
  if ('error' in parsed) return failure(parsed.error);
  const { rows } = parsed;
  const columns = rows.columns;

  const expectedColumns = [TAXONOMY_SPECIES_CODE_COLUMN, TAXONOMY_ANNOTATION_CODE_COLUMN];
  const missingColumns = expectedColumns.filter((c) => !columns.includes(c));
  if (missingColumns.length > 0) {
    return failure(
      {
        type: 'MISSING_COLUMNS',
        message: `Required columns missing: ${missingColumns.join(', ')}`,
        row: 0,
        value: '',
      },
      columns,
      rows.length
    );
  }

  const records: TaxonomyRawRecord[] = [];
  const errors: CSVValidationError[] = [];
  let validRecords = 0;
  let skippedRecords = 0;
  let errorRecords = 0;

  rows.forEach((r, idx) => {
    const speciesCodeRaw = (r[TAXONOMY_SPECIES_CODE_COLUMN] ?? '').trim();
    const annotationCodes = splitAnnotationCodes(r[TAXONOMY_ANNOTATION_CODE_COLUMN] ?? '');
    const scientificName = (r[TAXONOMY_SCIENTIFIC_NAME_COLUMN] ?? '').trim();
    const commonName = (r[TAXONOMY_COMMON_NAME_COLUMN] ?? '').trim();

    // Species that were never annotated carry no code to map
    if (annotationCodes.length === 0) {
      skippedRecords++;
      return;
    }

    if (!speciesCodeRaw) {
      errorRecords++;
      errors.push({
        type: 'EMPTY_REQUIRED_FIELD',
        message: `Missing ${TAXONOMY_SPECIES_CODE_COLUMN} for annotation code(s) ${annotationCodes.join(', ')}`,
        row: idx + 1,
        value: annotationCodes.join(';'),
      });
      return;
    }

    if (!isValidSpeciesCode(speciesCodeRaw)) {
      errorRecords++;
      errors.push({
        type: 'INVALID_SPECIES_CODE',
        message: `Invalid eBird species code format: ${speciesCodeRaw}`,
        row: idx + 1,
        value: speciesCodeRaw,
      });
      return;
    }

    records.push({
      speciesCode: createSpeciesCode(speciesCodeRaw),
      annotationCodes,
      ...(scientificName ? { scientificName } : {}),
      ...(commonName ? { commonName } : {}),
    });
    validRecords++;
  });

  return {
    success: errors.length === 0,
    columns,
    records,
    errors,
    stats: {
      totalRows: rows.length,
      validRecords,
      skippedRecords,
      errorRecords,
    },
  };
}

/**
 * Parses one raw annotation table. Column semantics are left to the loader;
 * here we only guarantee a well-formed header and drop fully blank lines.
 */
export function parseAnnotationCSV(csvContent: string): CSVParseResult<AnnotationRawRecord> {
  const parsed = readRows(csvContent);
  if ('error' in parsed) return failure(parsed.error);
  const { rows } = parsed;
  const columns = rows.columns;

  const headerError = headerProblems(columns);
  if (headerError) return failure(headerError, columns, rows.length);

  const records: AnnotationRawRecord[] = [];
  let skippedRecords = 0;

  for (const r of rows) {
    if (isBlankRow(r, columns)) {
      skippedRecords++;
      continue;
    }
    records.push(Object.fromEntries(columns.map((c) => [c, r[c]])));
  }

  if (records.length === 0) {
    return failure(
      {
        type: 'MALFORMED_ROW',
        message: 'CSV contains no data rows',
        row: 0,
        value: '',
      },
      columns,
      rows.length
    );
  }

  return {
    success: true,
    columns,
    records,
    errors: [],
    stats: {
      totalRows: rows.length,
      validRecords: records.length,
      skippedRecords,
      errorRecords: 0,
    },
  };
}
