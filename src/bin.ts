#!/usr/bin/env node
import { runCli } from "./cli.js";

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error during verification";
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}

await main();
