#!/usr/bin/env -S node --import tsx
/**
 * @chainverify/cli — Entry point.
 *
 * Usage: chainverify <numVars> <targetHex> <fanin> <steps> [options]
 */

import { readFile } from "node:fs/promises";
import chalk from "chalk";
import { run } from "./run.js";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    readFile: (filePath) => readFile(filePath, "utf8"),
    env: process.env,
    color: chalk.level > 0,
  });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  process.exit(1);
});
