/**
 * Outcome classification and capsule rendering for framecheck.
 *
 * Every pipeline ends in one of three outcomes. Errors keep the order they
 * were found in; they are never sorted or deduplicated.
 */

import { canonicalJson } from "./canonical.js";
import { isStructural } from "./errors.js";
import type { VerificationError } from "./errors.js";

/** Identifies the capsule format. */
export const CAPSULE_ENCODING = "publichex-v1";

export type Outcome =
  | { status: "pass" }
  | { status: "fail"; errors: VerificationError[] }
  | { status: "error"; errors: VerificationError[] };

export type OutcomeStatus = Outcome["status"];

export enum ExitCode {
  Pass = 0,
  Error = 1,
  Fail = 2,
}

/** What a pipeline hands to the classifier. */
export interface PipelineResult {
  outcome: Outcome;
  /** Canonical hex of the input; empty when the input never parsed. */
  normalizedHex: string;
}

export type HexCapsule = {
  encoding: typeof CAPSULE_ENCODING;
  normalized_frame_hex: string;
  errors?: string[];
};

export type Diagnostics = {
  errors: string[];
};

export interface RenderedCapsule {
  /** Written to the primary channel (stdout). */
  capsule: HexCapsule;
  /** Written to the diagnostic channel (stderr) on FAIL only. */
  diagnostics?: Diagnostics;
}

export function classify(outcome: Outcome): ExitCode {
  switch (outcome.status) {
    case "pass":
      return ExitCode.Pass;
    case "fail":
      return ExitCode.Fail;
    case "error":
      return ExitCode.Error;
  }
}

/** Human-readable reasons, in encounter order. */
export function reasons(outcome: Outcome): string[] {
  return outcome.status === "pass" ? [] : outcome.errors.map((e) => e.message);
}

/**
 * Build the outcome for a list of findings: none is PASS, any structural
 * finding makes it ERROR, otherwise FAIL.
 */
export function outcomeOf(errors: VerificationError[]): Outcome {
  if (errors.length === 0) {
    return { status: "pass" };
  }
  return errors.some((e) => isStructural(e.code))
    ? { status: "error", errors }
    : { status: "fail", errors };
}

export function renderCapsule(result: PipelineResult): RenderedCapsule {
  const { outcome, normalizedHex } = result;
  switch (outcome.status) {
    case "pass":
      return {
        capsule: { encoding: CAPSULE_ENCODING, normalized_frame_hex: normalizedHex },
      };
    case "fail":
      return {
        capsule: { encoding: CAPSULE_ENCODING, normalized_frame_hex: normalizedHex },
        diagnostics: { errors: reasons(outcome) },
      };
    case "error":
      return {
        capsule: {
          encoding: CAPSULE_ENCODING,
          normalized_frame_hex: "",
          errors: reasons(outcome),
        },
      };
  }
}

export function serializeCapsule(capsule: HexCapsule): string {
  return canonicalJson(capsule);
}

export function serializeDiagnostics(diagnostics: Diagnostics): string {
  return canonicalJson(diagnostics);
}
