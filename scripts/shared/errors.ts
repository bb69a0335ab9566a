// Structured errors for the vendor build.

/**
 * Error codes for build failures.
 * Scripts branch on these instead of matching messages.
 */
export const ErrorCode = {
  // Invocation
  ERR_INVALID_ARGUMENT: 'ERR_INVALID_ARGUMENT',
  ERR_MISSING_ENV: 'ERR_MISSING_ENV',
  ERR_UNSUPPORTED_PLATFORM: 'ERR_UNSUPPORTED_PLATFORM',

  // External commands
  ERR_COMMAND_FAILED: 'ERR_COMMAND_FAILED',
  ERR_COMMAND_NOT_FOUND: 'ERR_COMMAND_NOT_FOUND',

  // Sources
  ERR_CHECKSUM_MISMATCH: 'ERR_CHECKSUM_MISMATCH',
  ERR_ARCHIVE_LAYOUT: 'ERR_ARCHIVE_LAYOUT',
  ERR_INVALID_CATALOG: 'ERR_INVALID_CATALOG',

  // Outputs
  ERR_MISSING_ARTIFACT: 'ERR_MISSING_ARTIFACT',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface BuildErrorOptions {
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Base error for everything the build scripts throw on purpose.
 */
export class BuildError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCodeType;

  /** Additional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodeType, options?: BuildErrorOptions) {
    super(message, options?.cause === undefined ? undefined : {cause: options.cause});
    this.name = 'BuildError';
    this.code = code;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BuildError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Thrown when an external command exits with a non-zero status.
 */
export class CommandFailedError extends BuildError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;

  constructor(command: string, args: readonly string[], exitCode: number) {
    super(
      `Command failed: ${command} ${args.join(' ')} (exit ${exitCode})`,
      ErrorCode.ERR_COMMAND_FAILED,
      {context: {command, args, exitCode}},
    );
    this.name = 'CommandFailedError';
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
  }
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
