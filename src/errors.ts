/**
 * Bad generation parameters (counts, dates, domain). Raised before any
 * record is generated.
 */
export class InvalidParametersError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParametersError";
  }
}

/**
 * A profiles file that cannot be used: missing, not JSON, not an array, or
 * with entries that fail validation.
 */
export class ProfileLoadError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path ? `${message} (${path})` : message);
    this.name = "ProfileLoadError";
    this.path = path;
  }
}

/**
 * Raised only in strict-count mode; otherwise the mismatch is a warning.
 */
export class RecordCountMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Record count mismatch: expected ${expected} vs actual ${actual}.`
    );
    this.name = "RecordCountMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * A record store already holds a document with this id.
 */
export class RecordConflictError extends Error {
  readonly id: string;

  constructor(id: string) {
    super(`Document with id ${id} already exists`);
    this.name = "RecordConflictError";
    this.id = id;
  }
}
