// Brand types for compile-time safety on canonical values
export type SpeciesCode = string & { readonly __brand: 'SpeciesCode' };
export type IsoDate = string & { readonly __brand: 'IsoDate' };
export type StartTime = string & { readonly __brand: 'StartTime' }; // digits, zero-padded to 6

export const SEASONS = ['summer', 'winter'] as const;
export type Season = (typeof SEASONS)[number];

export const TIMES_OF_DAY = ['dawn', 'dusk'] as const;
export type TimeOfDay = (typeof TIMES_OF_DAY)[number];

export const HOUR_BUCKET_LABELS = [
  '6AM-7AM',
  '7AM-8AM',
  '8AM-9AM',
  '9AM-10AM',
  '4PM-5PM',
  '5PM-6PM',
  '6PM-7PM',
] as const;
export type HourBucketLabel = (typeof HOUR_BUCKET_LABELS)[number];

// Taxonomy entry: one ad-hoc annotation code and the canonical code it stands for
export interface SpeciesCodeEntry {
  readonly annotationCode: string;
  readonly speciesCode: SpeciesCode;
  readonly scientificName?: string;
  readonly commonName?: string;
}

export interface RecordingMetadata {
  readonly site_id: string;
  readonly date: IsoDate;
  readonly start_time: StartTime;
  readonly split_index: string;
  readonly time_of_day: TimeOfDay;
  readonly restoration_type: string;
}

// One annotated 10-second chunk after filename decomposition.
// Species cells are kept raw; the normalizer decides what a count is.
export interface AnnotationChunk extends RecordingMetadata {
  readonly filename: string;
  readonly species_presence: ReadonlyMap<string, string | undefined>;
}

export interface AnnotationTable {
  readonly time_of_day: TimeOfDay;
  readonly speciesColumns: readonly string[];
  readonly droppedColumns: readonly string[];
  readonly rows: readonly AnnotationChunk[];
}

export interface DetectionEvent extends RecordingMetadata {
  readonly kind: 'detection';
  readonly hour_of_day: HourBucketLabel | null;
  readonly species_code: SpeciesCode;
  readonly detection_count: number;
}

export type UnbinnedDetectionEvent = Omit<DetectionEvent, 'hour_of_day'>;

// Explicit absence of a species in one time-of-day window
export interface ZeroFillRecord {
  readonly kind: 'zero-fill';
  readonly species_code: SpeciesCode;
  readonly time_of_day: TimeOfDay;
  readonly detection_count: 0;
}

export type DatasetRow = DetectionEvent | ZeroFillRecord;

export interface SpeciesActivitySummary {
  readonly species_code: SpeciesCode;
  readonly siteDateCount: number;
}

// Validation functions
export function isValidSpeciesCode(input: string): input is SpeciesCode {
  // eBird codes: lowercase letters and digits, starting with a letter
  return /^[a-z][a-z0-9]{2,9}$/.test(input);
}

export function isValidIsoDate(input: string): input is IsoDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(input);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

// The recorder's label as written, padded; it need not be a real clock time
export function isValidStartTime(input: string): input is StartTime {
  return /^\d{6,}$/.test(input);
}

// HHMMSS within 00:00:00-23:59:59
export function isClockTime(startTime: StartTime): boolean {
  const match = /^(\d{2})(\d{2})(\d{2})$/.exec(startTime);
  if (!match) return false;
  return Number(match[1]) < 24 && Number(match[2]) < 60 && Number(match[3]) < 60;
}

// Factory functions with validation
export function createSpeciesCode(input: string): SpeciesCode {
  if (!isValidSpeciesCode(input)) {
    throw new Error(
      `Invalid SpeciesCode format: ${input}. Must be 3-10 lowercase letters or digits, starting with a letter.`
    );
  }
  return input;
}

export function createIsoDate(input: string): IsoDate {
  if (!isValidIsoDate(input)) {
    throw new Error(`Invalid IsoDate: ${input}. Must be a calendar date in YYYY-MM-DD form.`);
  }
  return input;
}

export function createStartTime(input: string): StartTime {
  if (!isValidStartTime(input)) {
    throw new Error(`Invalid StartTime: ${input}. Must be digits zero-padded to at least 6 places.`);
  }
  return input;
}
