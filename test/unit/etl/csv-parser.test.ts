import { describe, it, expect } from 'vitest';
import {
  parseAnnotationCSV,
  parseTaxonomyCSV,
  splitAnnotationCodes,
} from '@etl/csv-parser';

describe('CSV Parser', () => {
  describe('taxonomy CSV parsing with BOM handling', () => {
    const validTaxonomyCSV = `\ufeffeBird_codes,species_annotation_codes,scientific_name,common_name
asikoe2,ASKO,Eudynamys scolopaceus,Asian Koel
commyn,COMY; CMYN,Acridotheres tristis,Common Myna
houcro1,,Corvus splendens,House Crow`;

    it('should parse annotation codes and names', () => {
      const result = parseTaxonomyCSV(validTaxonomyCSV);

      expect(result.success).toBe(true);
      expect(result.records).toHaveLength(2);
      expect(result.records[0]).toEqual({
        speciesCode: 'asikoe2',
        annotationCodes: ['ASKO'],
        scientificName: 'Eudynamys scolopaceus',
        commonName: 'Asian Koel',
      });
      expect(result.records[1]?.annotationCodes).toEqual(['COMY', 'CMYN']);
    });

    it('should skip species that were never annotated', () => {
      const result = parseTaxonomyCSV(validTaxonomyCSV);

      expect(result.stats).toEqual({
        totalRows: 3,
        validRecords: 2,
        skippedRecords: 1,
        errorRecords: 0,
      });
    });

    it('should accept the two required columns without names', () => {
      const result = parseTaxonomyCSV('eBird_codes,species_annotation_codes\nxx1,X1');

      expect(result.success).toBe(true);
      expect(result.records).toEqual([{ speciesCode: 'xx1', annotationCodes: ['X1'] }]);
    });

    it('should report missing columns', () => {
      const result = parseTaxonomyCSV('eBird_codes,common_name\nasikoe2,Asian Koel');

      expect(result.success).toBe(false);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.type).toBe('MISSING_COLUMNS');
      expect(result.errors[0]?.message).toBe('Required columns missing: species_annotation_codes');
    });

    it('should flag annotation codes without a canonical code', () => {
      const result = parseTaxonomyCSV('eBird_codes,species_annotation_codes\n,ORPH');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.type).toBe('EMPTY_REQUIRED_FIELD');
      expect(result.errors[0]?.row).toBe(1);
      expect(result.errors[0]?.value).toBe('ORPH');
    });

    it('should validate eBird code format', () => {
      const result = parseTaxonomyCSV('eBird_codes,species_annotation_codes\nAsian Koel,ASKO');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.type).toBe('INVALID_SPECIES_CODE');
      expect(result.stats.errorRecords).toBe(1);
    });

    it('should fail on a header-only file', () => {
      const result = parseTaxonomyCSV('eBird_codes,species_annotation_codes\n');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.message).toBe('CSV contains no data rows');
    });
  });

  describe('splitAnnotationCodes', () => {
    it('should split on semicolons and pipes and drop blanks', () => {
      expect(splitAnnotationCodes(' ASKO ;ASK2| ')).toEqual(['ASKO', 'ASK2']);
      expect(splitAnnotationCodes('')).toEqual([]);
    });
  });

  describe('annotation CSV parsing', () => {
    it('should keep the header order and every cell', () => {
      const csv = [
        'Filename,ASKO,COMY,Restoration.Type..Benchmark.Active.Passive.',
        'S1_20220101_060000_1,2,,Active',
      ].join('\n');

      const result = parseAnnotationCSV(csv);

      expect(result.success).toBe(true);
      expect(result.columns).toEqual([
        'Filename',
        'ASKO',
        'COMY',
        'Restoration.Type..Benchmark.Active.Passive.',
      ]);
      expect(result.records).toEqual([
        {
          Filename: 'S1_20220101_060000_1',
          ASKO: '2',
          COMY: '',
          'Restoration.Type..Benchmark.Active.Passive.': 'Active',
        },
      ]);
    });

    it('should handle quoted free text containing commas', () => {
      const csv = [
        'Filename,ASKO,Notes',
        'S1_20220101_060000_1,1,"wind, some rain"',
      ].join('\n');

      const result = parseAnnotationCSV(csv);
      expect(result.records[0]?.['Notes']).toBe('wind, some rain');
    });

    it('should skip fully blank lines', () => {
      const csv = ['Filename,ASKO', 'S1_20220101_060000_1,1', ',', 'S1_20220101_060000_2,0'].join(
        '\n'
      );

      const result = parseAnnotationCSV(csv);
      expect(result.records).toHaveLength(2);
      expect(result.stats.skippedRecords).toBe(1);
    });

    it('should reject duplicate columns', () => {
      const result = parseAnnotationCSV('Filename,ASKO,ASKO\nS1_20220101_060000_1,1,2');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.type).toBe('DUPLICATE_COLUMNS');
      expect(result.errors[0]?.message).toBe('Duplicate columns: ASKO');
    });

    it('should reject blank column names', () => {
      const result = parseAnnotationCSV('Filename,,ASKO\nS1_20220101_060000_1,x,2');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.type).toBe('BLANK_COLUMN_NAME');
    });

    it('should reject a file whose rows are all blank', () => {
      const result = parseAnnotationCSV('Filename,ASKO\n,\n');

      expect(result.success).toBe(false);
      expect(result.errors[0]?.message).toBe('CSV contains no data rows');
    });
  });
});
