import { TaxonomyError } from '@domain/errors';
import type { SpeciesCode, SpeciesCodeEntry } from '@domain/types';
import { type TaxonomyRawRecord, parseTaxonomyCSV } from './csv-parser';

// Ad-hoc code claimed by more than one canonical species
export interface TaxonomyConflict {
  readonly annotationCode: string;
  readonly speciesCodes: readonly SpeciesCode[];
}

/**
 * Bidirectional lookup between ad-hoc annotation codes and canonical eBird
 * species codes. Built once per run; every lookup is total or throws.
 */
export class SpeciesCodeMap {
  private readonly byAnnotationCode: ReadonlyMap<string, SpeciesCodeEntry>;
  private readonly bySpeciesCode: ReadonlyMap<SpeciesCode, readonly SpeciesCodeEntry[]>;

  private constructor(entries: readonly SpeciesCodeEntry[]) {
    this.byAnnotationCode = new Map(entries.map((e) => [e.annotationCode, e]));
    const reverse = new Map<SpeciesCode, SpeciesCodeEntry[]>();
    for (const entry of entries) {
      reverse.set(entry.speciesCode, [...(reverse.get(entry.speciesCode) ?? []), entry]);
    }
    this.bySpeciesCode = reverse;
  }

  /**
   * Builds the map from parsed taxonomy rows. Fails if two different
   * canonical codes claim the same annotation code.
   */
  static fromRecords(records: readonly TaxonomyRawRecord[]): SpeciesCodeMap {
    const claims = new Map<string, SpeciesCode[]>();
    const entries = new Map<string, SpeciesCodeEntry>();

    for (const record of records) {
      for (const annotationCode of record.annotationCodes) {
        const claimants = claims.get(annotationCode) ?? [];
        if (!claimants.includes(record.speciesCode)) {
          claims.set(annotationCode, [...claimants, record.speciesCode]);
        }
        if (!entries.has(annotationCode)) {
          entries.set(annotationCode, {
            annotationCode,
            speciesCode: record.speciesCode,
            ...(record.scientificName ? { scientificName: record.scientificName } : {}),
            ...(record.commonName ? { commonName: record.commonName } : {}),
          });
        }
      }
    }

    const conflicts: TaxonomyConflict[] = [...claims]
      .filter(([, speciesCodes]) => speciesCodes.length > 1)
      .map(([annotationCode, speciesCodes]) => ({ annotationCode, speciesCodes }));

    if (conflicts.length > 0) {
      const detail = conflicts
        .map((c) => `${c.annotationCode} -> ${c.speciesCodes.join(' | ')}`)
        .join('; ');
      throw new TaxonomyError(
        `Ambiguous annotation codes: ${detail}`,
        conflicts.map((c) => c.annotationCode)
      );
    }

    return new SpeciesCodeMap([...entries.values()]);
  }

  static fromCSV(csvContent: string): SpeciesCodeMap {
    const parsed = parseTaxonomyCSV(csvContent);
    if (!parsed.success) {
      throw new TaxonomyError(
        `Taxonomy table rejected: ${parsed.errors.map((e) => e.message).join('; ')}`,
        parsed.errors.map((e) => e.value).filter((v) => v !== '')
      );
    }
    return SpeciesCodeMap.fromRecords(parsed.records);
  }

  get size(): number {
    return this.byAnnotationCode.size;
  }

  tryResolve(annotationCode: string): SpeciesCode | undefined {
    return this.byAnnotationCode.get(annotationCode.trim())?.speciesCode;
  }

  resolve(annotationCode: string): SpeciesCode {
    const speciesCode = this.tryResolve(annotationCode);
    if (speciesCode === undefined) {
      throw new TaxonomyError(`Unmapped annotation code: ${annotationCode}`, [annotationCode]);
    }
    return speciesCode;
  }

  /**
   * Resolves a batch of codes, reporting every unmapped one in a single error.
   */
  resolveAll(annotationCodes: readonly string[]): ReadonlyMap<string, SpeciesCode> {
    const resolved = new Map<string, SpeciesCode>();
    const unmapped: string[] = [];
    for (const code of annotationCodes) {
      const speciesCode = this.tryResolve(code);
      if (speciesCode === undefined) unmapped.push(code);
      else resolved.set(code, speciesCode);
    }
    if (unmapped.length > 0) {
      throw new TaxonomyError(`Unmapped annotation codes: ${unmapped.join(', ')}`, unmapped);
    }
    return resolved;
  }

  // Unknown column names (metadata mixed in with species) pass through untouched
  renameColumn(column: string): string {
    return this.tryResolve(column) ?? column;
  }

  annotationCodesFor(speciesCode: SpeciesCode): readonly string[] {
    return (this.bySpeciesCode.get(speciesCode) ?? []).map((e) => e.annotationCode);
  }

  describe(speciesCode: SpeciesCode): string {
    const entry = this.bySpeciesCode.get(speciesCode)?.find((e) => e.commonName !== undefined);
    return entry?.commonName ? `${speciesCode} (${entry.commonName})` : speciesCode;
  }
}
