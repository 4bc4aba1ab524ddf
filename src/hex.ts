/**
 * Hex text normalization and the standalone hex-capsule pipeline.
 */

import { outcomeOf } from "./capsule.js";
import type { PipelineResult } from "./capsule.js";
import { ErrorCode, NormalizeError } from "./errors.js";
import { HEADER_SIZE } from "./frame.js";

/**
 * How the digit count is checked after whitespace is removed.
 *
 * - "even": the whole string must have an even number of digits.
 * - "header": only the 16-digit frame header is required; anything after it
 *   is payload hex and is not length-checked here.
 */
export type LengthRule = "even" | "header";

export interface NormalizeOptions {
  /** Default: "even". */
  lengthRule?: LengthRule;
}

const WHITESPACE = /[ \t\n\r]/g;
const NON_HEX = /[^0-9a-f]/u;
const HEADER_DIGITS = HEADER_SIZE * 2;

/** Quoted and escaped, with its code point: `"\u000b" (U+000B)`. */
function describeChar(ch: string): string {
  const codePoint = (ch.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
  return `${JSON.stringify(ch)} (U+${codePoint})`;
}

export function resolveLengthRule(options?: NormalizeOptions): LengthRule {
  return options?.lengthRule ?? "even";
}

/**
 * Strip whitespace, lower-case, and validate. Throws NormalizeError.
 */
export function normalizeHex(raw: string, options?: NormalizeOptions): string {
  const normalized = raw.replace(WHITESPACE, "").toLowerCase();

  if (normalized.length === 0) {
    throw new NormalizeError(ErrorCode.EMPTY_INPUT, "empty input");
  }

  const bad = NON_HEX.exec(normalized);
  if (bad) {
    throw new NormalizeError(
      ErrorCode.INVALID_CHARACTER,
      `invalid character ${describeChar(bad[0])} at offset ${bad.index}`,
      { character: bad[0], offset: bad.index },
    );
  }

  const rule = resolveLengthRule(options);
  if (rule === "even" && normalized.length % 2 !== 0) {
    throw new NormalizeError(
      ErrorCode.ODD_LENGTH,
      `odd length: ${normalized.length} hex digits`,
      { length: normalized.length },
    );
  }
  if (rule === "header" && normalized.length < HEADER_DIGITS) {
    throw new NormalizeError(
      ErrorCode.TOO_SHORT,
      `too short: ${normalized.length} hex digits, header needs ${HEADER_DIGITS}`,
      { minimum: HEADER_DIGITS, actual: normalized.length },
    );
  }

  return normalized;
}

/**
 * Normalize hex text for the standalone capsule. The outcome is PASS or
 * ERROR; nothing here is an integrity check.
 */
export function verifyHexCapsule(raw: string, options?: NormalizeOptions): PipelineResult {
  if (resolveLengthRule(options) === "header") {
    console.warn(
      "framecheck: the 'header' length rule is meant for frame decoding; standalone capsules normally use 'even'.",
    );
  }

  try {
    return { outcome: outcomeOf([]), normalizedHex: normalizeHex(raw, options) };
  } catch (err) {
    if (err instanceof NormalizeError) {
      return { outcome: outcomeOf([err.toVerificationError()]), normalizedHex: "" };
    }
    throw err;
  }
}
