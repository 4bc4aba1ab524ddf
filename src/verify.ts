/**
 * Frame verification for framecheck.
 *
 * Structural problems (the bytes are not a frame) end in ERROR. A frame that
 * parses but whose checksum, length field or strict invariants disagree with
 * its payload ends in FAIL.
 */

import { outcomeOf } from "./capsule.js";
import type { PipelineResult } from "./capsule.js";
import { computeCrc32, crc32ToHex } from "./crc32.js";
import { ErrorCode, ParseError } from "./errors.js";
import type { VerificationError, VerificationResult } from "./errors.js";
import { bytesToHex, decodeFrame, hexToBytes } from "./frame.js";
import type { Frame } from "./frame.js";
import { normalizeHex } from "./hex.js";
import { checkStrictInvariants } from "./strict.js";

export interface VerifyOptions {
  /** Run the strict invariant suite after basic validation passes. */
  strict?: boolean;
}

/**
 * Check the length field and checksum against the payload. Both are checked
 * and reported independently.
 */
export function validateFrame(frame: Frame): VerificationResult {
  const errors: VerificationError[] = [];

  if (frame.length !== frame.payload.length) {
    errors.push({
      code: ErrorCode.LENGTH_FIELD_MISMATCH,
      message: `length field ${frame.length} does not match payload size ${frame.payload.length}`,
      details: { declared: frame.length, actual: frame.payload.length },
    });
  }

  const computed = computeCrc32(frame.payload);
  if (frame.checksum !== computed) {
    errors.push({
      code: ErrorCode.CHECKSUM_MISMATCH,
      message: `checksum mismatch: header ${crc32ToHex(frame.checksum)}, payload ${crc32ToHex(computed)}`,
      details: { expected: crc32ToHex(frame.checksum), actual: crc32ToHex(computed) },
    });
  }

  return { valid: errors.length === 0, errors };
}

function parseFailure(err: unknown): PipelineResult {
  if (err instanceof ParseError) {
    return { outcome: outcomeOf([err.toVerificationError()]), normalizedHex: "" };
  }
  throw err;
}

/**
 * Decode, validate and (optionally) strictly check a wire frame.
 */
export function verifyFrame(wire: Uint8Array, options?: VerifyOptions): PipelineResult {
  let frame: Frame;
  try {
    frame = decodeFrame(wire);
  } catch (err) {
    return parseFailure(err);
  }

  const normalizedHex = bytesToHex(wire);

  const basic = validateFrame(frame);
  if (!basic.valid) {
    return { outcome: outcomeOf(basic.errors), normalizedHex };
  }

  if (options?.strict) {
    const strict = checkStrictInvariants(frame, wire);
    if (!strict.valid) {
      return { outcome: outcomeOf(strict.errors), normalizedHex };
    }
  }

  return { outcome: outcomeOf([]), normalizedHex };
}

/**
 * Verify a frame supplied as loosely formatted hex text. Only the header is
 * length-checked while normalizing; a dangling half byte at the end of the
 * payload is a length mismatch.
 */
export function verifyFrameHex(raw: string, options?: VerifyOptions): PipelineResult {
  let wire: Uint8Array;
  try {
    const normalized = normalizeHex(raw, { lengthRule: "header" });
    if (normalized.length % 2 !== 0) {
      throw new ParseError(
        ErrorCode.LENGTH_MISMATCH,
        `length mismatch: payload hex ends in a half byte (${normalized.length} hex digits)`,
        { length: normalized.length },
      );
    }
    wire = hexToBytes(normalized);
  } catch (err) {
    return parseFailure(err);
  }
  return verifyFrame(wire, options);
}
