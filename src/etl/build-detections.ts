import * as fs from 'fs';
import { fileURLToPath } from 'url';
import { IOError, SchemaError } from '@domain/errors';
import {
  type Season,
  type SpeciesActivitySummary,
  type SpeciesCode,
  type TimeOfDay,
  SEASONS,
  TIMES_OF_DAY,
} from '@domain/types';
import type { AnnotationSourceTable } from './annotation-loader';
import {
  DEFAULT_OUTPUT_CSV,
  DEFAULT_TAXONOMY_CSV,
  type PipelineConfigInput,
  annotationCsvFile,
  configFromEnv,
  resolvePipelineConfig,
} from './config';
import { parseAnnotationCSV } from './csv-parser';
import { writeDataset } from './dataset-writer';
import { buildDetectionDataset } from './pipeline';
import { SpeciesCodeMap } from './taxonomy-mapper';

export type AnnotationSourceKey = `${Season}-${TimeOfDay}`;

export type PipelineLogger = Pick<Console, 'log' | 'warn'>;

export interface RunBuildDetectionsOptions {
  taxonomyCsvPath?: string;
  annotationCsvPaths?: Partial<Record<AnnotationSourceKey, string>>;
  outputPath?: string;
  config?: PipelineConfigInput;
  logger?: PipelineLogger;
}

export interface RunBuildDetectionsResult {
  outputPath: string;
  rowCount: number;
  retainedSpecies: readonly SpeciesCode[];
  excludedSpecies: readonly SpeciesActivitySummary[];
  unbucketedEvents: number;
}

function readInput(filePath: string, what: string): string {
  if (!fs.existsSync(filePath)) {
    throw new IOError(`${what} not found`, filePath);
  }
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOError(`Cannot read ${what}`, filePath, { cause: error });
  }
}

function readAnnotationSource(
  season: Season,
  timeOfDay: TimeOfDay,
  filePath: string
): AnnotationSourceTable {
  const parsed = parseAnnotationCSV(readInput(filePath, `${season} ${timeOfDay} annotations`));
  if (!parsed.success) {
    throw new SchemaError(
      `${filePath} rejected: ${parsed.errors.map((e) => e.message).join('; ')}`,
      { source: filePath }
    );
  }
  return {
    season,
    timeOfDay,
    label: filePath,
    columns: parsed.columns,
    records: parsed.records,
  };
}

export async function runBuildDetections(
  options: RunBuildDetectionsOptions = {}
): Promise<RunBuildDetectionsResult> {
  const logger = options.logger ?? console;
  const config = resolvePipelineConfig(options.config);
  const taxonomyCsvPath = options.taxonomyCsvPath || DEFAULT_TAXONOMY_CSV;
  const outputPath = options.outputPath || DEFAULT_OUTPUT_CSV;

  const speciesCodes = SpeciesCodeMap.fromCSV(readInput(taxonomyCsvPath, 'Taxonomy CSV'));
  logger.log(`Loaded ${speciesCodes.size} annotation codes from ${taxonomyCsvPath}`);

  const annotations = TIMES_OF_DAY.flatMap((timeOfDay) =>
    SEASONS.map((season) => {
      const key: AnnotationSourceKey = `${season}-${timeOfDay}`;
      const filePath = options.annotationCsvPaths?.[key] || annotationCsvFile(season, timeOfDay);
      const table = readAnnotationSource(season, timeOfDay, filePath);
      logger.log(`Read ${table.records.length} annotated chunks from ${filePath}`);
      return table;
    })
  );

  // Nothing is written unless every stage succeeded
  const result = buildDetectionDataset({ speciesCodes, annotations }, config);

  for (const excluded of result.excludedSpecies) {
    logger.warn(
      `Excluded ${speciesCodes.describe(excluded.species_code)}: detected on ${excluded.siteDateCount} site-dates (threshold ${config.minimumOccurrenceThreshold})`
    );
  }
  if (result.unbucketedEvents > 0) {
    logger.warn(
      `${result.unbucketedEvents} events start outside every hour-of-day bucket; hour_of_day left empty`
    );
  }

  const written = writeDataset(result.rows, outputPath);
  logger.log(
    `Retained ${result.retainedSpecies.length} species, wrote ${written.rowCount} rows to ${written.outputPath}`
  );

  return {
    outputPath: written.outputPath,
    rowCount: written.rowCount,
    retainedSpecies: result.retainedSpecies,
    excludedSpecies: result.excludedSpecies,
    unbucketedEvents: result.unbucketedEvents,
  };
}

// CLI support when executed directly with tsx / node
const isMainModule =
  process.argv[1] !== undefined && process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  const outputPath = process.env['DETECTIONS_OUTPUT_CSV'];
  runBuildDetections({
    config: configFromEnv(process.env),
    ...(outputPath ? { outputPath } : {}),
  })
    .then((r) => {
      console.log(`✅ Generated detection dataset: ${r.outputPath} (${r.rowCount} rows)`);
    })
    .catch((err: unknown) => {
      console.error('❌ Detection ETL failed:', err);
      process.exit(1);
    });
}
