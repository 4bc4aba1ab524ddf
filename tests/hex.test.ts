import { describe, it, expect, vi, afterEach } from "vitest";
import {
  normalizeHex,
  reasons,
  resolveLengthRule,
  verifyHexCapsule,
  ErrorCode,
  NormalizeError,
} from "../src/index.js";

function normalizeErrorOf(raw: string, lengthRule?: "even" | "header"): NormalizeError {
  try {
    normalizeHex(raw, { lengthRule });
  } catch (err) {
    if (err instanceof NormalizeError) {
      return err;
    }
    throw err;
  }
  throw new Error(`expected ${JSON.stringify(raw)} to be rejected`);
}

describe("normalizeHex", () => {
  it("lower-cases uppercase hex", () => {
    expect(normalizeHex("DEADBEEF")).toBe("deadbeef");
  });

  it("removes spaces, tabs, newlines and carriage returns", () => {
    expect(normalizeHex("48 65 6C 6C 6F")).toBe("48656c6c6f");
    expect(normalizeHex("DE\tAD\nBE\rEF")).toBe("deadbeef");
  });

  it("produces one canonical form for equivalent inputs", () => {
    const inputs = ["48656C6C6F", "48656c6c6f", "48 65 6C 6C 6F", "48\t65\n6C\r6C\n6F", "  48656C6C6F  "];
    for (const input of inputs) {
      expect(normalizeHex(input)).toBe("48656c6c6f");
    }
  });

  it("rejects a non-hex character after lowering", () => {
    const err = normalizeErrorOf("48656C6C6G");
    expect(err.code).toBe(ErrorCode.INVALID_CHARACTER);
    expect(err.message).toBe('invalid character "g" (U+0067) at offset 9');
  });

  it("rejects punctuation", () => {
    expect(normalizeErrorOf("DEAD@BEEF").message).toBe('invalid character "@" (U+0040) at offset 4');
    expect(normalizeErrorOf("AB-CD").code).toBe(ErrorCode.INVALID_CHARACTER);
  });

  it("escapes invisible characters and names their code point", () => {
    expect(normalizeErrorOf("48\v65").message).toBe('invalid character "\\u000b" (U+000B) at offset 2');
    expect(normalizeErrorOf("48\u00a065").message).toBe('invalid character "\u00a0" (U+00A0) at offset 2');
    expect(normalizeErrorOf("48\u{1F600}").message).toBe('invalid character "\u{1F600}" (U+1F600) at offset 2');
  });

  it("rejects empty and whitespace-only input", () => {
    expect(normalizeErrorOf("").message).toBe("empty input");
    expect(normalizeErrorOf("   \t\n  ").code).toBe(ErrorCode.EMPTY_INPUT);
  });

  it("rejects odd length under the even rule", () => {
    const err = normalizeErrorOf("DEADBEE");
    expect(err.code).toBe(ErrorCode.ODD_LENGTH);
    expect(err.message).toBe("odd length: 7 hex digits");
  });

  it("only requires the header under the header rule", () => {
    expect(normalizeHex("0123456789ABCDEF0", { lengthRule: "header" })).toBe("0123456789abcdef0");
    const err = normalizeErrorOf("ABC", "header");
    expect(err.code).toBe(ErrorCode.TOO_SHORT);
    expect(err.message).toBe("too short: 3 hex digits, header needs 16");
  });

  it("defaults to the even rule", () => {
    expect(resolveLengthRule()).toBe("even");
    expect(resolveLengthRule({})).toBe("even");
    expect(resolveLengthRule({ lengthRule: "header" })).toBe("header");
  });
});

describe("verifyHexCapsule", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("passes normalizable hex", () => {
    const result = verifyHexCapsule("AA BB CC DD");
    expect(result.outcome).toEqual({ status: "pass" });
    expect(result.normalizedHex).toBe("aabbccdd");
  });

  it("reports a normalize failure as an error", () => {
    const result = verifyHexCapsule("ABC");
    expect(result.outcome.status).toBe("error");
    expect(reasons(result.outcome)).toEqual(["odd length: 3 hex digits"]);
    expect(result.normalizedHex).toBe("");
  });

  it("warns when the header rule is used for a standalone capsule", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const result = verifyHexCapsule("0123456789abcdef0", { lengthRule: "header" });
    expect(result.outcome.status).toBe("pass");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
