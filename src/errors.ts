/**
 * Error codes and result shapes for framecheck.
 */

export enum ErrorCode {
  // Structural: the input could not be interpreted.
  EMPTY_INPUT = "EMPTY_INPUT",
  INVALID_CHARACTER = "INVALID_CHARACTER",
  ODD_LENGTH = "ODD_LENGTH",
  TOO_SHORT = "TOO_SHORT",
  LENGTH_MISMATCH = "LENGTH_MISMATCH",
  USAGE = "USAGE",
  INPUT_UNREADABLE = "INPUT_UNREADABLE",
  // Integrity: the input parsed but is not correct.
  CHECKSUM_MISMATCH = "CHECKSUM_MISMATCH",
  LENGTH_FIELD_MISMATCH = "LENGTH_FIELD_MISMATCH",
  PAYLOAD_NOT_UTF8 = "PAYLOAD_NOT_UTF8",
  REENCODE_MISMATCH = "REENCODE_MISMATCH",
  NULL_BYTE = "NULL_BYTE",
  SIZE_ACCOUNTING = "SIZE_ACCOUNTING",
}

const STRUCTURAL_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.EMPTY_INPUT,
  ErrorCode.INVALID_CHARACTER,
  ErrorCode.ODD_LENGTH,
  ErrorCode.TOO_SHORT,
  ErrorCode.LENGTH_MISMATCH,
  ErrorCode.USAGE,
  ErrorCode.INPUT_UNREADABLE,
]);

/** True for codes that mean "could not parse" rather than "parsed but wrong". */
export function isStructural(code: ErrorCode): boolean {
  return STRUCTURAL_CODES.has(code);
}

export interface VerificationError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface VerificationResult {
  valid: boolean;
  errors: VerificationError[];
}

/**
 * Thrown when input is structurally malformed. Pipelines catch it and
 * report an ERROR outcome; it never escapes a verify call.
 */
export class ParseError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly reason: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(reason);
    this.name = "ParseError";
  }

  toVerificationError(): VerificationError {
    return this.details === undefined
      ? { code: this.code, message: this.reason }
      : { code: this.code, message: this.reason, details: this.details };
  }
}

/** Hex text that cannot be normalized. */
export class NormalizeError extends ParseError {
  constructor(code: ErrorCode, reason: string, details?: Record<string, unknown>) {
    super(code, reason, details);
    this.name = "NormalizeError";
  }
}
