/**
 * Frame encoding and decoding for framecheck.
 *
 * Wire layout (all integers little-endian):
 *
 *   [checksum u32][length u32][payload: length bytes]
 *
 * Decoding only checks structure. Whether the checksum matches the payload is
 * decided by validateFrame, so a frame that parses but is corrupt stays
 * distinguishable from one that does not parse at all.
 */

import { computeCrc32 } from "./crc32.js";
import { ErrorCode, ParseError } from "./errors.js";

/** Bytes of header before the payload: checksum + length. */
export const HEADER_SIZE = 8;

/** Largest payload a u32 length field can describe. */
export const MAX_PAYLOAD_SIZE = 0xffffffff;

export interface Frame {
  readonly checksum: number;
  readonly length: number;
  readonly payload: Uint8Array;
}

const utf8 = new TextEncoder();

/**
 * Wrap `payload` in a checksum + length header.
 */
export function encodeFrame(payload: Uint8Array): Uint8Array {
  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new RangeError(
      `encodeFrame: payload of ${payload.length} bytes exceeds limit of ${MAX_PAYLOAD_SIZE}`,
    );
  }
  const wire = new Uint8Array(HEADER_SIZE + payload.length);
  const view = new DataView(wire.buffer);
  view.setUint32(0, computeCrc32(payload), true);
  view.setUint32(4, payload.length, true);
  wire.set(payload, HEADER_SIZE);
  return wire;
}

/** UTF-8 encode `text`, then frame it. */
export function encodeText(text: string): Uint8Array {
  return encodeFrame(utf8.encode(text));
}

/**
 * Parse a wire frame. Throws ParseError when the bytes are too short to hold
 * a header or when the declared length disagrees with the bytes present.
 */
export function decodeFrame(wire: Uint8Array): Frame {
  if (wire.length < HEADER_SIZE) {
    throw new ParseError(
      ErrorCode.TOO_SHORT,
      `too short: ${wire.length} bytes, header needs ${HEADER_SIZE}`,
      { minimum: HEADER_SIZE, actual: wire.length },
    );
  }

  const view = new DataView(wire.buffer, wire.byteOffset, wire.byteLength);
  const checksum = view.getUint32(0, true);
  const length = view.getUint32(4, true);
  const available = wire.length - HEADER_SIZE;

  if (length !== available) {
    throw new ParseError(
      ErrorCode.LENGTH_MISMATCH,
      `length mismatch: header declares ${length} payload bytes, ${available} present`,
      { declared: length, actual: available },
    );
  }

  return {
    checksum,
    length,
    payload: new Uint8Array(wire.subarray(HEADER_SIZE)),
  };
}

export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const byte of bytes) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Parse canonical hex (lowercase, even length, no separators) into bytes.
 * Callers holding loosely formatted text should run normalizeHex first.
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new ParseError(ErrorCode.ODD_LENGTH, `odd length: ${hex.length} hex digits`, {
      length: hex.length,
    });
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    const pair = hex.slice(i * 2, i * 2 + 2);
    if (!/^[0-9a-f]{2}$/.test(pair)) {
      throw new ParseError(
        ErrorCode.INVALID_CHARACTER,
        `invalid character in ${JSON.stringify(pair)} at offset ${i * 2}`,
        { offset: i * 2 },
      );
    }
    out[i] = parseInt(pair, 16);
  }
  return out;
}
