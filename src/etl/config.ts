// Centralized ETL configuration for raw data asset locations & pipeline options.
// Tests and the build runner rely on these canonical paths and defaults.
import { z } from 'zod';
import { ConfigError } from '@domain/errors';
import type { Season, TimeOfDay } from '@domain/types';

export const RAW_DATA_DIR = 'data/raw';

export const ANNOTATIONS_DIR = `${RAW_DATA_DIR}/annotations`;
export const TAXONOMY_DIR = `${RAW_DATA_DIR}/taxonomy`;
export const PROCESSED_DATA_DIR = 'data/processed';

// Canonical filenames
export function annotationCsvFile(season: Season, timeOfDay: TimeOfDay): string {
  return `${ANNOTATIONS_DIR}/${season}-${timeOfDay}.csv`;
}

export const DEFAULT_TAXONOMY_CSV = `${TAXONOMY_DIR}/species-codes.csv`;
export const DEFAULT_OUTPUT_CSV = `${PROCESSED_DATA_DIR}/detection-events.csv`;

// Annotation file layout
export const FILENAME_COLUMN = 'Filename';
export const FILENAME_DELIMITER = '_';
export const RESTORATION_COLUMN = 'Restoration.Type..Benchmark.Active.Passive.';
// Annotator's own time label; superseded by file provenance. Columns after it are free text.
export const TIME_LABEL_COLUMN = 'Time..Morning.Evening.Night.';
export const DEFAULT_DROPPED_COLUMNS = ['Notes', 'Comments', 'Annotator', 'Observer'];

// Taxonomy file layout
export const TAXONOMY_SPECIES_CODE_COLUMN = 'eBird_codes';
export const TAXONOMY_ANNOTATION_CODE_COLUMN = 'species_annotation_codes';
export const TAXONOMY_SCIENTIFIC_NAME_COLUMN = 'scientific_name';
export const TAXONOMY_COMMON_NAME_COLUMN = 'common_name';

export const DEFAULT_MINIMUM_OCCURRENCE_THRESHOLD = 20;

export const PipelineConfigSchema = z.object({
  minimumOccurrenceThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MINIMUM_OCCURRENCE_THRESHOLD),
  symmetrizeTimeOfDay: z.boolean().default(false),
  droppedColumns: z.array(z.string()).default(DEFAULT_DROPPED_COLUMNS),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export function resolvePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
    );
  }
  return parsed.data;
}

// Environment overrides, e.g. MIN_OCCURRENCE_THRESHOLD=10 SYMMETRIZE_TIME_OF_DAY=true
export function configFromEnv(env: Record<string, string | undefined>): PipelineConfigInput {
  const input: PipelineConfigInput = {};
  const threshold = env['MIN_OCCURRENCE_THRESHOLD'];
  if (threshold !== undefined && threshold.trim() !== '') {
    input.minimumOccurrenceThreshold = Number(threshold);
  }
  const symmetrize = env['SYMMETRIZE_TIME_OF_DAY'];
  if (symmetrize !== undefined && symmetrize.trim() !== '') {
    input.symmetrizeTimeOfDay = ['1', 'true', 'yes'].includes(symmetrize.trim().toLowerCase());
  }
  return input;
}
