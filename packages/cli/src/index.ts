/**
 * @chainverify/cli — Public API of the command-line verifier.
 */

export { run } from "./run.js";
export type { CliIO } from "./run.js";
export {
  InvocationSchema,
  EnvSchema,
  MAX_FANIN,
  loadInvocation,
  loadEnv,
} from "./config.js";
export type { Invocation, EnvConfig } from "./config.js";
export { createLogger } from "./logger.js";
export { formatSummary, formatAdvisory, formatJsonReport } from "./report.js";
export type { JsonReport } from "./report.js";
export { ConfigError, ChainFileError } from "./errors.js";
export type { ConfigErrorCode, ChainFileErrorCode } from "./errors.js";
