/**
 * @chainverify/cli — Configuration.
 *
 * Validates the four positional arguments and the environment using Zod.
 */

import { z } from "zod";
import { MAX_ARITY, hexLength } from "@chainverify/truth-table";
import { ALPHABET_SIZE, DEFAULT_CHAIN_EXTENSION } from "@chainverify/verify";
import { ConfigError } from "./errors.js";

// =============================================================================
// Schemas
// =============================================================================

/** Largest gate fanin accepted on the command line. */
export const MAX_FANIN = 10;

function count(min: number, max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));
}

export const InvocationSchema = z
  .object({
    numVars: count(0, MAX_ARITY),
    targetHex: z
      .string()
      .trim()
      .regex(/^[0-9a-fA-F]+$/, "must be a hexadecimal string"),
    fanin: count(0, MAX_FANIN),
    steps: count(1, ALPHABET_SIZE),
  })
  .superRefine((value, ctx) => {
    if (value.numVars + value.steps > ALPHABET_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["steps"],
        message: `${String(value.numVars)} inputs and ${String(value.steps)} steps exceed ${String(ALPHABET_SIZE)} identifiers`,
      });
    }
    const digits = hexLength(2 ** value.numVars);
    if (value.targetHex.length !== digits) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["targetHex"],
        message: `must have ${String(digits)} hex digits for ${String(value.numVars)} variables`,
      });
    }
  });

export type Invocation = z.infer<typeof InvocationSchema>;

export const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
  CHAIN_DIR: z.string().min(1).default("."),
  CHAIN_EXT: z
    .string()
    .regex(/^[A-Za-z0-9]+$/, "must be alphanumeric")
    .default(DEFAULT_CHAIN_EXTENSION),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

// =============================================================================
// Loaders
// =============================================================================

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate the positional arguments.
 *
 * @throws {ConfigError} listing every invalid argument
 */
export function loadInvocation(args: {
  readonly numVars: string;
  readonly targetHex: string;
  readonly fanin: string;
  readonly steps: string;
}): Invocation {
  const result = InvocationSchema.safeParse(args);
  if (!result.success) {
    throw new ConfigError("INVALID_INVOCATION", describeIssues(result.error));
  }
  return result.data;
}

/**
 * Load and validate configuration from the environment.
 *
 * @throws {ConfigError} if a variable is set to an invalid value
 */
export function loadEnv(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError("INVALID_ENVIRONMENT", describeIssues(result.error));
  }
  return result.data;
}
