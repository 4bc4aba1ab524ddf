/**
 * framecheck -- CRC-32 framed payloads and canonical hex capsules.
 * Pure, synchronous verification; the CLI is the only part that does I/O.
 */

// Canonical JSON
export { canonicalJson } from "./canonical.js";
export type { JsonValue } from "./canonical.js";

// CRC-32
export { computeCrc32, crc32ToHex } from "./crc32.js";

// Frame codec
export {
  HEADER_SIZE,
  MAX_PAYLOAD_SIZE,
  encodeFrame,
  encodeText,
  decodeFrame,
  bytesToHex,
  hexToBytes,
} from "./frame.js";
export type { Frame } from "./frame.js";

// Verification
export { validateFrame, verifyFrame, verifyFrameHex } from "./verify.js";
export type { VerifyOptions } from "./verify.js";
export { checkStrictInvariants } from "./strict.js";

// Hex normalization
export { normalizeHex, resolveLengthRule, verifyHexCapsule } from "./hex.js";
export type { LengthRule, NormalizeOptions } from "./hex.js";

// Classification and capsules
export {
  CAPSULE_ENCODING,
  ExitCode,
  classify,
  outcomeOf,
  reasons,
  renderCapsule,
  serializeCapsule,
  serializeDiagnostics,
} from "./capsule.js";
export type {
  Outcome,
  OutcomeStatus,
  PipelineResult,
  HexCapsule,
  Diagnostics,
  RenderedCapsule,
} from "./capsule.js";

// CLI
export { runCli, nodeIO, USAGE } from "./cli.js";
export type { CliIO } from "./cli.js";

// Errors
export { ErrorCode, ParseError, NormalizeError, isStructural } from "./errors.js";
export type { VerificationError, VerificationResult } from "./errors.js";
