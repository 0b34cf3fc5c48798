/**
 * Error taxonomy for the certified-deletion core.
 *
 * Every thrown error extends CertifiedDeletionError and carries a stable
 * string code. Correction failures are not errors: `corr` returns its input
 * unchanged and the hash-mismatch flag of decryption reports them.
 *
 * @module errors
 */

/** Stable error codes. */
export enum ErrorCode {
  CONFIGURATION = "CONFIGURATION",
  UNKNOWN_CODE = "UNKNOWN_CODE",
  LENGTH_MISMATCH = "LENGTH_MISMATCH",
  MALFORMED_MEASUREMENT = "MALFORMED_MEASUREMENT",
  SERIALIZATION = "SERIALIZATION",
}

export class CertifiedDeletionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "CertifiedDeletionError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Invalid scheme parameters, code tables, or key material. Fatal. */
export class ConfigurationError extends CertifiedDeletionError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = ErrorCode.CONFIGURATION,
  ) {
    super(message, code, details);
    this.name = "ConfigurationError";
  }
}

/** An error-correcting code name that does not resolve to a table. */
export class UnknownCodeError extends ConfigurationError {
  constructor(public readonly codeName: string, cause?: string) {
    super(
      `Unknown error-correcting code "${codeName}"${cause ? `: ${cause}` : ""}`,
      { codeName },
      ErrorCode.UNKNOWN_CODE,
    );
    this.name = "UnknownCodeError";
  }
}

/** Two lengths that the scheme dimensions require to agree do not. */
export class LengthMismatchError extends CertifiedDeletionError {
  constructor(
    what: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Length mismatch for ${what}: expected ${expected}, got ${actual}`,
      ErrorCode.LENGTH_MISMATCH,
      { what, expected, actual },
    );
    this.name = "LengthMismatchError";
  }
}

/** A measurement string or count that cannot be interpreted. */
export class MalformedMeasurementError extends CertifiedDeletionError {
  constructor(public readonly entry: string, reason: string) {
    super(
      `Malformed measurement "${entry}": ${reason}`,
      ErrorCode.MALFORMED_MEASUREMENT,
      { entry },
    );
    this.name = "MalformedMeasurementError";
  }
}

/** A persisted value failed schema validation. */
export class SerializationError extends CertifiedDeletionError {
  constructor(what: string, issues: readonly string[]) {
    super(
      `Invalid serialized ${what}: ${issues.join("; ")}`,
      ErrorCode.SERIALIZATION,
      { what, issues },
    );
    this.name = "SerializationError";
  }
}

/**
 * A per-entry fault collected by a batch operation.
 * The batch keeps processing the remaining entries.
 */
export interface EntryError {
  /** The raw count-table key. */
  entry: string;
  /** Number of shots carried by the entry. */
  count: number;
  error: CertifiedDeletionError;
}
