/**
 * Command-line front end. All I/O goes through a CliIO so the commands can be
 * driven in process; bytes read from files or stdin reach the codec untouched.
 */

import { readFile } from "node:fs/promises";
import {
  ExitCode,
  classify,
  outcomeOf,
  renderCapsule,
  serializeCapsule,
  serializeDiagnostics,
} from "./capsule.js";
import type { PipelineResult } from "./capsule.js";
import { ErrorCode, ParseError } from "./errors.js";
import { bytesToHex, encodeFrame, encodeText } from "./frame.js";
import { verifyHexCapsule } from "./hex.js";
import type { LengthRule } from "./hex.js";
import { verifyFrame, verifyFrameHex } from "./verify.js";

export interface CliIO {
  readStdin(): Promise<Uint8Array>;
  readFile(path: string): Promise<Uint8Array>;
  stdout(chunk: string | Uint8Array): void;
  stderr(text: string): void;
}

export const nodeIO: CliIO = {
  async readStdin() {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf-8"));
    }
    return Buffer.concat(chunks);
  },
  readFile(path) {
    return readFile(path);
  },
  stdout(chunk) {
    process.stdout.write(chunk);
  },
  stderr(text) {
    process.stderr.write(text);
  },
};

export const USAGE = [
  "usage: framecheck encode (<text> | --infile <path>) [--hex]",
  "       framecheck verify [<frame-hex> | --infile <path>] [--hex] [--strict]",
  "       framecheck publichex-verify [--hex <text>] [--length-rule even|header]",
].join("\n");

type FlagKind = "boolean" | "string";

const COMMANDS = {
  encode: { "--infile": "string", "--hex": "boolean" },
  verify: { "--infile": "string", "--hex": "boolean", "--strict": "boolean" },
  "publichex-verify": { "--hex": "string", "--length-rule": "string" },
} satisfies Record<string, Record<string, FlagKind>>;

type Command = keyof typeof COMMANDS;

interface ParsedArgs {
  flags: Map<string, string | true>;
  positionals: string[];
}

function usageError(message: string): ParseError {
  return new ParseError(ErrorCode.USAGE, message);
}

function isCommand(name: string | undefined): name is Command {
  return name !== undefined && Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

function parseArgs(
  argv: readonly string[],
  spec: Partial<Record<string, FlagKind>>,
): ParsedArgs {
  const flags = new Map<string, string | true>();
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const kind = spec[name];
    if (kind === undefined) {
      throw usageError(`Unrecognized argument: ${name}`);
    }

    if (kind === "boolean") {
      if (eq !== -1) {
        throw usageError(`${name} does not take a value`);
      }
      flags.set(name, true);
    } else if (eq !== -1) {
      flags.set(name, arg.slice(eq + 1));
    } else if (index + 1 < argv.length) {
      flags.set(name, argv[index + 1]);
      index += 1;
    } else {
      throw usageError(`${name} requires a value`);
    }
  }

  return { flags, positionals };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function parseLengthRule(value: string | undefined): LengthRule | undefined {
  if (value === undefined || value === "even" || value === "header") {
    return value;
  }
  throw usageError(`--length-rule must be "even" or "header", got "${value}"`);
}

function emit(io: CliIO, result: PipelineResult): ExitCode {
  const rendered = renderCapsule(result);
  io.stdout(`${serializeCapsule(rendered.capsule)}\n`);
  if (rendered.diagnostics) {
    io.stderr(`${serializeDiagnostics(rendered.diagnostics)}\n`);
  }
  return classify(result.outcome);
}

function unreadable(path: string, err: unknown): PipelineResult {
  const message = err instanceof Error ? err.message : String(err);
  return {
    outcome: outcomeOf([
      {
        code: ErrorCode.INPUT_UNREADABLE,
        message: `cannot read ${path}: ${message}`,
        details: { path },
      },
    ]),
    normalizedHex: "",
  };
}

async function runEncode(io: CliIO, args: ParsedArgs): Promise<ExitCode> {
  const infile = stringFlag(args, "--infile");
  if ((infile === undefined) === (args.positionals.length === 0) || args.positionals.length > 1) {
    throw usageError("encode takes exactly one of <text> or --infile <path>");
  }

  let wire: Uint8Array;
  if (infile !== undefined) {
    let payload: Uint8Array;
    try {
      payload = await io.readFile(infile);
    } catch (err) {
      return emit(io, unreadable(infile, err));
    }
    wire = encodeFrame(payload);
  } else {
    wire = encodeText(args.positionals[0]);
  }

  io.stdout(args.flags.has("--hex") ? `${bytesToHex(wire)}\n` : wire);
  return ExitCode.Pass;
}

async function runVerify(io: CliIO, args: ParsedArgs): Promise<ExitCode> {
  const infile = stringFlag(args, "--infile");
  if (args.positionals.length > 1) {
    throw usageError(`Unexpected argument: ${args.positionals[1]}`);
  }

  const options = { strict: args.flags.has("--strict") };
  const [frameHex] = args.positionals;
  if (frameHex !== undefined) {
    if (infile !== undefined) {
      throw usageError("verify takes at most one of <frame-hex> or --infile <path>");
    }
    return emit(io, verifyFrameHex(frameHex, options));
  }

  let input: Uint8Array;
  try {
    input = infile === undefined ? await io.readStdin() : await io.readFile(infile);
  } catch (err) {
    return emit(io, unreadable(infile ?? "<stdin>", err));
  }

  const result = args.flags.has("--hex")
    ? verifyFrameHex(new TextDecoder().decode(input), options)
    : verifyFrame(input, options);
  return emit(io, result);
}

async function runPublicHex(io: CliIO, args: ParsedArgs): Promise<ExitCode> {
  if (args.positionals.length > 0) {
    throw usageError(`Unexpected argument: ${args.positionals[0]}`);
  }

  const lengthRule = parseLengthRule(stringFlag(args, "--length-rule"));
  const raw = stringFlag(args, "--hex") ?? new TextDecoder().decode(await io.readStdin());
  return emit(io, verifyHexCapsule(raw, { lengthRule }));
}

const HANDLERS: Record<Command, (io: CliIO, args: ParsedArgs) => Promise<ExitCode>> = {
  encode: runEncode,
  verify: runVerify,
  "publichex-verify": runPublicHex,
};

/**
 * Run one command and return its exit code: 0 PASS, 2 FAIL, 1 ERROR.
 */
export async function runCli(argv: readonly string[], io: CliIO = nodeIO): Promise<ExitCode> {
  const [name, ...rest] = argv;
  try {
    if (!isCommand(name)) {
      throw usageError(name === undefined ? "Missing command" : `Unknown command: ${name}`);
    }
    const args = parseArgs(rest, COMMANDS[name]);
    return await HANDLERS[name](io, args);
  } catch (err) {
    if (err instanceof ParseError && err.code === ErrorCode.USAGE) {
      io.stderr(`${err.message}\n${USAGE}\n`);
      return ExitCode.Error;
    }
    throw err;
  }
}
