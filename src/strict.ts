/**
 * Strict-mode invariants over a frame that already passed validateFrame.
 *
 * All checks run and every violation is reported, so one pass shows the
 * caller everything that is wrong with the frame.
 */

import { ErrorCode } from "./errors.js";
import type { VerificationError, VerificationResult } from "./errors.js";
import { HEADER_SIZE, encodeText } from "./frame.js";
import type { Frame } from "./frame.js";

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });
const utf8 = new TextEncoder();

function decodeUtf8(payload: Uint8Array): string | null {
  try {
    return strictUtf8.decode(payload);
  } catch {
    return null;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Check the frame against the original wire bytes it was decoded from.
 *
 * Re-encoding and length accuracy are defined over the payload text, so they
 * are skipped when the payload is not UTF-8; that failure is reported instead.
 */
export function checkStrictInvariants(frame: Frame, wire: Uint8Array): VerificationResult {
  const errors: VerificationError[] = [];
  const text = decodeUtf8(frame.payload);

  if (text === null) {
    errors.push({
      code: ErrorCode.PAYLOAD_NOT_UTF8,
      message: "payload is not valid UTF-8",
    });
  } else {
    if (!bytesEqual(encodeText(text), wire)) {
      errors.push({
        code: ErrorCode.REENCODE_MISMATCH,
        message: "re-encoding the payload does not reproduce the wire frame",
      });
    }

    const textBytes = utf8.encode(text).length;
    if (frame.length !== textBytes) {
      errors.push({
        code: ErrorCode.LENGTH_FIELD_MISMATCH,
        message: `length field ${frame.length} does not match decoded payload size ${textBytes}`,
        details: { declared: frame.length, actual: textBytes },
      });
    }
  }

  const nul = frame.payload.indexOf(0);
  if (nul !== -1) {
    errors.push({
      code: ErrorCode.NULL_BYTE,
      message: `payload contains a null byte at offset ${nul}`,
      details: { offset: nul },
    });
  }

  const expectedSize = HEADER_SIZE + frame.length;
  if (wire.length !== expectedSize) {
    errors.push({
      code: ErrorCode.SIZE_ACCOUNTING,
      message: `wire size ${wire.length} does not equal header plus length (${expectedSize})`,
      details: { expected: expectedSize, actual: wire.length },
    });
  }

  return { valid: errors.length === 0, errors };
}
