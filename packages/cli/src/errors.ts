/**
 * @chainverify/cli — Error types.
 *
 * Only these abort a run; chain violations are reported per chain.
 */

export type ConfigErrorCode = "INVALID_INVOCATION" | "INVALID_ENVIRONMENT";

/**
 * Invalid positional arguments or environment.
 * `issues` lists every problem found, one line each.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly issues: readonly string[];

  constructor(code: ConfigErrorCode, issues: readonly string[]) {
    super(`${code === "INVALID_INVOCATION" ? "Invalid arguments" : "Invalid environment"}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.code = code;
    this.issues = issues;
  }
}

export type ChainFileErrorCode = "UNREADABLE";

export class ChainFileError extends Error {
  public readonly code: ChainFileErrorCode;
  public readonly path: string;

  constructor(code: ChainFileErrorCode, path: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ChainFileError";
    this.code = code;
    this.path = path;
  }
}
