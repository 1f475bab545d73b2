/**
 * Error types
 */

/**
 * Base error class for all cipherprep errors.
 */
export class CipherPrepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CipherPrepError';
  }
}

// ---------------------------------------------------------------------------
// Record errors (caught by the pipeline, the record is skipped)
// ---------------------------------------------------------------------------

/**
 * Thrown when a record file is not valid JSON.
 */
export class RecordParseError extends CipherPrepError {
  public readonly file: string;

  constructor(file: string, detail: string) {
    super(`Malformed JSON in ${file}: ${detail}`);
    this.name = 'RecordParseError';
    this.file = file;
  }
}

/**
 * Thrown when a record lacks the cipher/plain fields or they have the wrong shape.
 */
export class RecordValidationError extends CipherPrepError {
  public readonly file: string;
  public readonly issues: string[];

  constructor(file: string, issues: string[]) {
    super(`Invalid record ${file}: ${issues.join('; ')}`);
    this.name = 'RecordValidationError';
    this.file = file;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Run errors (abort the run)
// ---------------------------------------------------------------------------

export class NoInputFilesError extends CipherPrepError {
  public readonly dir: string;

  constructor(dir: string) {
    super(`No JSON files found in ${dir}`);
    this.name = 'NoInputFilesError';
    this.dir = dir;
  }
}

export class ConfigError extends CipherPrepError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(field ? `Invalid config "${field}": ${message}` : `Invalid config: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

/**
 * Thrown when reading inputs or writing artifacts fails.
 */
export class StorageError extends CipherPrepError {
  public readonly operation: 'read' | 'write';
  public readonly path: string;

  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    super(`Storage ${operation} failed for ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'StorageError';
    this.operation = operation;
    this.path = path;
  }
}
