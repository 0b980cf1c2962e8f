// Typed failures. Any of these aborts a build before the dataset is written.

export class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TaxonomyError extends PipelineError {
  readonly codes: readonly string[];

  constructor(message: string, codes: readonly string[] = []) {
    super(message);
    this.codes = codes;
  }
}

export class SchemaError extends PipelineError {
  readonly source: string;
  readonly missingColumns: readonly string[];
  readonly extraColumns: readonly string[];

  constructor(
    message: string,
    details: {
      readonly source: string;
      readonly missingColumns?: readonly string[];
      readonly extraColumns?: readonly string[];
    }
  ) {
    super(message);
    this.source = details.source;
    this.missingColumns = details.missingColumns ?? [];
    this.extraColumns = details.extraColumns ?? [];
  }
}

export class FilenameFormatError extends PipelineError {
  readonly filename: string;

  constructor(filename: string, reason: string) {
    super(`Malformed recording filename "${filename}": ${reason}`);
    this.filename = filename;
  }
}

export class IOError extends PipelineError {
  readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(`${message}: ${path}`, options);
    this.path = path;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid pipeline configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
