/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property identifies the failure kind in logs; `exitCode`
 * is what the CLI hands back to the shell.
 */

export class BeamerBaseError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Invocation errors
// ---------------------------------------------------------------------------

/** Missing or unrecognised subcommand, or bad operands. */
export class UsageError extends BeamerBaseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'USAGE_ERROR', 2, details);
  }
}

/** The config file could not be read or failed schema validation. */
export class ConfigError extends BeamerBaseError {
  constructor(path: string, reason: string, violations?: unknown[]) {
    super(`Invalid config file "${path}": ${reason}`, 'CONFIG_ERROR', 2, { path, violations });
  }
}

// ---------------------------------------------------------------------------
// External tool errors
// ---------------------------------------------------------------------------

/** The display tool is not installed or not on PATH. */
export class DependencyMissingError extends BeamerBaseError {
  constructor(binary: string) {
    super(
      `Required program "${binary}" was not found. Install xrandr (x11-xserver-utils / xorg-xrandr) or point --xrandr at it.`,
      'DEPENDENCY_MISSING',
      127,
      { binary }
    );
  }
}

/** The display tool ran and reported failure. Its status and stderr are kept as-is. */
export class DelegatedError extends BeamerBaseError {
  readonly stderr: string;

  constructor(commandLine: string, status: number, stderr: string) {
    super(
      `"${commandLine}" failed with exit status ${status}`,
      'DELEGATED_ERROR',
      status === 0 ? 1 : status,
      { commandLine, status }
    );
    this.stderr = stderr;
  }
}

/** `xrandr --query` printed something we do not understand. */
export class QueryParseError extends BeamerBaseError {
  constructor(lineNumber: number, line: string, reason: string) {
    super(
      `Unexpected xrandr output on line ${lineNumber} (${reason}): ${JSON.stringify(line)}`,
      'QUERY_PARSE_ERROR',
      1,
      { lineNumber, line }
    );
  }
}

// ---------------------------------------------------------------------------
// Layout errors
// ---------------------------------------------------------------------------

/** The directive needs more connected outputs than there are. */
export class MissingOutputError extends BeamerBaseError {
  constructor(directive: string, required: number, found: number) {
    super(
      `"${directive}" needs ${required} connected output${required === 1 ? '' : 's'}, found ${found}`,
      'MISSING_OUTPUT',
      1,
      { directive, required, found }
    );
  }
}

/** Cloning is impossible because the outputs share no resolution. */
export class NoCommonModeError extends BeamerBaseError {
  constructor(outputs: string[]) {
    super(
      `No resolution is supported by all of ${outputs.join(', ')}`,
      'NO_COMMON_MODE',
      1,
      { outputs }
    );
  }
}

/** A `row` entry names an output index or name that is not connected. */
export class UnknownOutputError extends BeamerBaseError {
  constructor(entry: string) {
    super(`Could not find connected output "${entry}"`, 'UNKNOWN_OUTPUT', 1, { entry });
  }
}
