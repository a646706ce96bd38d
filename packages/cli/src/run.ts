/**
 * @chainverify/cli — Command runner.
 *
 * Parses the command line, loads the chain file named after the
 * invocation, verifies every block and prints the score.
 *
 * All I/O goes through `CliIO` so the runner can be driven in-process.
 */

import path from "node:path";
import { Command, CommanderError } from "commander";
import { Chalk } from "chalk";
import type { Logger } from "pino";
import type { SymmetryAdvisory } from "@chainverify/types";
import {
  ChainVerifier,
  chainFileName,
  identifierName,
  inputId,
  scoreChains,
  splitChainBlocks,
} from "@chainverify/verify";
import { loadEnv, loadInvocation } from "./config.js";
import type { EnvConfig, Invocation } from "./config.js";
import { ChainFileError, ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { formatAdvisory, formatJsonReport, formatSummary } from "./report.js";

// =============================================================================
// Types
// =============================================================================

export interface CliIO {
  /** Write one line to stdout */
  readonly out: (line: string) => void;

  /** Write one line to stderr */
  readonly err: (line: string) => void;

  readonly readFile: (filePath: string) => Promise<string>;
  readonly env: Record<string, string | undefined>;

  /** Whether to color advisories and errors */
  readonly color: boolean;

  /** Logger to use instead of one built from the environment */
  readonly logger?: Logger | undefined;
}

interface CliOptions {
  file?: string;
  dir?: string;
  ext?: string;
  verbose?: boolean;
  json?: boolean;
}

interface ParsedCommand {
  readonly args: {
    readonly numVars: string;
    readonly targetHex: string;
    readonly fanin: string;
    readonly steps: string;
  };
  readonly options: CliOptions;
}

// =============================================================================
// Helpers
// =============================================================================

function createProgram(io: CliIO, onParsed: (parsed: ParsedCommand) => void): Command {
  return new Command()
    .name("chainverify")
    .description("Verify canonical logic chains against a target truth table")
    .argument("<numVars>", "number of primary inputs")
    .argument("<targetHex>", "target function as a hexadecimal truth table")
    .argument("<fanin>", "number of inputs of every gate")
    .argument("<steps>", "number of steps in every chain")
    .option("--file <path>", "chain file (default <targetHex>-<fanin>-<steps>.<ext>)")
    .option("--dir <path>", "directory holding the chain file")
    .option("--ext <ext>", "chain file extension")
    .option("-v, --verbose", "log every violation")
    .option("--json", "print the summary as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.out(s.trimEnd()),
      writeErr: (s) => io.err(s.trimEnd()),
    })
    .action(
      (numVars: string, targetHex: string, fanin: string, steps: string, options: CliOptions) => {
        onParsed({ args: { numVars, targetHex, fanin, steps }, options });
      },
    );
}

async function readChainFile(io: CliIO, filePath: string): Promise<string> {
  try {
    return await io.readFile(filePath);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ChainFileError(
      "UNREADABLE",
      filePath,
      `Cannot read chain file "${filePath}": ${reason}`,
      err,
    );
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Run the verifier with `argv` (arguments only, no node/script prefix).
 *
 * @returns the process exit status
 */
export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  const paint = new Chalk({ level: io.color ? 1 : 0 });

  const holder: { parsed?: ParsedCommand } = {};
  try {
    await createProgram(io, (p) => {
      holder.parsed = p;
    }).parseAsync([...argv], { from: "user" });
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  if (holder.parsed === undefined) {
    return 1;
  }
  const { args, options } = holder.parsed;

  let invocation: Invocation;
  let env: EnvConfig;
  try {
    env = loadEnv(io.env);
    invocation = loadInvocation(args);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      io.err(paint.red(`[e] ${err.message}`));
      return 1;
    }
    throw err;
  }

  const logger = io.logger ?? createLogger(env);
  logger.level = options.verbose === true ? "debug" : env.LOG_LEVEL;

  const { numVars, targetHex, fanin, steps } = invocation;
  const filePath =
    options.file ??
    path.join(
      options.dir ?? env.CHAIN_DIR,
      chainFileName(targetHex, fanin, steps, options.ext ?? env.CHAIN_EXT),
    );

  let text: string;
  try {
    text = await readChainFile(io, filePath);
  } catch (err: unknown) {
    if (err instanceof ChainFileError) {
      logger.error({ file: err.path, code: err.code }, err.message);
      io.err(paint.red(`[e] ${err.message}`));
      return 1;
    }
    throw err;
  }

  const verifier = ChainVerifier.fromHex(targetHex, { numVars, fanin, steps });
  const advisories: SymmetryAdvisory[] = [];

  const report = scoreChains(splitChainBlocks(text), verifier, (verdict, block) => {
    if (verdict.verdict === "FAIL") {
      const { kind, rule, stepIndex, message } = verdict.violation;
      logger.debug({ block, kind, rule, step: stepIndex }, `[e] ${message}`);
      return;
    }
    for (const advisory of verdict.advisories) {
      advisories.push(advisory);
      logger.debug(
        {
          block,
          first: identifierName(inputId(advisory.first)),
          second: identifierName(inputId(advisory.second)),
        },
        advisory.message,
      );
      if (options.json !== true) {
        io.out(formatAdvisory(advisory, paint));
      }
    }
  });

  const summary = {
    points: report.points,
    violations: report.violations,
    score: report.score,
  };
  logger.info({ file: filePath, ...summary }, "Verification complete");

  if (options.json === true) {
    io.out(formatJsonReport({ file: filePath, ...summary, advisories }));
  } else {
    for (const line of formatSummary(summary)) {
      io.out(line);
    }
  }

  return 0;
}
