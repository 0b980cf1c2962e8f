import { describe, it, expect } from 'vitest';
import {
  DEFAULT_OUTPUT_CSV,
  DEFAULT_TAXONOMY_CSV,
  annotationCsvFile,
  configFromEnv,
  resolvePipelineConfig,
} from '@etl/config';
import { ConfigError } from '@domain/errors';

describe('ETL configuration', () => {
  it('should expose canonical data paths', () => {
    expect(annotationCsvFile('summer', 'dawn')).toBe('data/raw/annotations/summer-dawn.csv');
    expect(annotationCsvFile('winter', 'dusk')).toBe('data/raw/annotations/winter-dusk.csv');
    expect(DEFAULT_TAXONOMY_CSV).toBe('data/raw/taxonomy/species-codes.csv');
    expect(DEFAULT_OUTPUT_CSV).toBe('data/processed/detection-events.csv');
  });

  it('should fill in documented defaults', () => {
    const config = resolvePipelineConfig();

    expect(config.minimumOccurrenceThreshold).toBe(20);
    expect(config.symmetrizeTimeOfDay).toBe(false);
    expect(config.droppedColumns).toEqual(['Notes', 'Comments', 'Annotator', 'Observer']);
  });

  it('should keep explicit overrides', () => {
    const config = resolvePipelineConfig({
      minimumOccurrenceThreshold: 0,
      symmetrizeTimeOfDay: true,
      droppedColumns: ['Remarks'],
    });

    expect(config.minimumOccurrenceThreshold).toBe(0);
    expect(config.symmetrizeTimeOfDay).toBe(true);
    expect(config.droppedColumns).toEqual(['Remarks']);
  });

  it('should reject invalid thresholds', () => {
    expect(() => resolvePipelineConfig({ minimumOccurrenceThreshold: -1 })).toThrow(ConfigError);
    expect(() => resolvePipelineConfig({ minimumOccurrenceThreshold: 2.5 })).toThrow(
      'Invalid pipeline configuration: minimumOccurrenceThreshold: Expected integer, received float'
    );
  });

  describe('configFromEnv', () => {
    it('should read overrides from environment variables', () => {
      expect(
        configFromEnv({
          MIN_OCCURRENCE_THRESHOLD: '5',
          SYMMETRIZE_TIME_OF_DAY: 'true',
        })
      ).toEqual({
        minimumOccurrenceThreshold: 5,
        symmetrizeTimeOfDay: true,
      });
    });

    it('should ignore unset or blank variables', () => {
      expect(configFromEnv({ MIN_OCCURRENCE_THRESHOLD: ' ', PATH: '/usr/bin' })).toEqual({});
    });

    it('should let validation catch a non-numeric threshold', () => {
      const input = configFromEnv({ MIN_OCCURRENCE_THRESHOLD: 'many' });
      expect(() => resolvePipelineConfig(input)).toThrow(ConfigError);
    });
  });
});
