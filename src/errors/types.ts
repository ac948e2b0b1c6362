/**
 * Error type definitions for context-warden
 *
 * Every error raised by the core carries:
 * - an actionable recovery hint
 * - an exit code the CLI hands back to the shell
 */

/**
 * Base class for all warden errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: lets scripts branch on the failure kind
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a referenced document, project, entity or path does not exist.
 *
 * Exit code 3
 */
export class ResourceNotFoundError extends CLIError {
  public readonly kind: string;
  public readonly key: string;

  constructor(kind: string, key: string, hint?: string) {
    super(
      `${kind} not found: ${key}`,
      hint ?? 'Check the identifier and try again',
      3
    );
    this.name = 'ResourceNotFoundError';
    this.kind = kind;
    this.key = key;
  }
}

/**
 * Thrown for configuration errors: invalid TOML, unknown keys, a profile
 * that violates its invariants, an unknown provider tag.
 *
 * Fatal at startup. Exit code 2
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: warden config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when a provider needs a credential that is not set.
 *
 * Exit code 4
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures.
 *
 * Exit code 5
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(
      message,
      'Check that the data directory is writable: warden config get storage.path',
      5
    );
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Exit code 1
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A model endpoint, embedding service or store could not be reached or
 * failed mid-call. The core does not retry these; callers decide.
 *
 * Exit code 7
 */
export class TransientIOError extends CLIError {
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error, hint?: string) {
    super(
      message,
      hint ?? 'Check that the endpoint is running and reachable, then retry',
      7
    );
    this.name = 'TransientIOError';
    this.cause = cause;
  }
}

/**
 * The model kept returning text that is not a JSON object, after every
 * repair attempt. Raised by callers that prefer failing over a tagged result.
 *
 * Exit code 8
 */
export class MalformedOutputError extends CLIError {
  /** First 500 characters of the last response */
  public readonly raw: string;

  constructor(message: string, raw: string) {
    super(
      message,
      'Try a larger model, or raise json_retries under [profiles.<name>] in config.toml',
      8
    );
    this.name = 'MalformedOutputError';
    this.raw = raw;
  }
}

/**
 * A subprocess (git) ran past its time limit and was killed.
 *
 * Exit code 9
 */
export class CommandTimeoutError extends CLIError {
  public readonly command: string;
  public readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(
      `Command timed out after ${timeoutMs}ms: ${command}`,
      'Narrow the commit range or run: warden config set git.timeout_ms <ms>',
      9
    );
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}
