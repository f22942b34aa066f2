/**
 * Structured Error Classes for the catalog test harness
 *
 * Every failure a test can hit maps to one class here, so reports can tell a
 * broken kubectl call apart from a run that legitimately failed.
 */

/**
 * Error codes for standardized error handling
 */
export const ErrorCodes = {
  SUBPROCESS_FAILED: 'SUBPROCESS_FAILED',
  KUBERNETES_API_FAILED: 'KUBERNETES_API_FAILED',
  PARSE_FAILED: 'PARSE_FAILED',
  TIMEOUT: 'TIMEOUT',
  RUN_FAILED: 'RUN_FAILED',
  ASSERTION_FAILED: 'ASSERTION_FAILED',
  UNSUPPORTED: 'UNSUPPORTED',
  INVALID_STATE: 'INVALID_STATE',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  FIXTURE_INVALID: 'FIXTURE_INVALID',
  CANCELLED: 'CANCELLED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all harness errors
 */
export class HarnessError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;
  public override readonly cause: Error | undefined;
  public readonly timestamp: Date;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>, cause?: Error) {
    super(message);
    this.name = 'HarnessError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
      cause: this.cause
        ? {
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
    };
  }

  getUserMessage(): string {
    return `${this.message} (${this.code})`;
  }
}

/**
 * An external command exited non-zero, could not be spawned, or was cancelled.
 * The message always embeds the combined output.
 */
export class CommandFailedError extends HarnessError {
  public readonly program: string;
  public readonly args: readonly string[];
  public readonly exitCode: number;
  public readonly output: string;

  constructor(
    program: string,
    args: readonly string[],
    exitCode: number,
    output: string,
    options: { timedOut?: boolean; cause?: Error } = {},
  ) {
    const verb = options.timedOut ? 'timed out' : `exited with code ${exitCode}`;
    super(
      `${program} ${args.join(' ')} ${verb}\n${output}`,
      options.timedOut ? ErrorCodes.TIMEOUT : ErrorCodes.SUBPROCESS_FAILED,
      { program, args: [...args], exitCode, timedOut: options.timedOut === true },
      options.cause,
    );
    this.name = 'CommandFailedError';
    this.program = program;
    this.args = args;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class KubernetesError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.KUBERNETES_API_FAILED, details);
    this.name = 'KubernetesError';
  }
}

/**
 * Expected pattern or field absent from otherwise successful output
 */
export class ParseError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.PARSE_FAILED, details, cause);
    this.name = 'ParseError';
  }
}

export class RunTimeoutError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.TIMEOUT, details);
    this.name = 'RunTimeoutError';
  }
}

export class RunFailedError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.RUN_FAILED, details);
    this.name = 'RunFailedError';
  }
}

export class AssertionFailedError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.ASSERTION_FAILED, details);
    this.name = 'AssertionFailedError';
  }
}

export class UnsupportedOperationError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.UNSUPPORTED, details);
    this.name = 'UnsupportedOperationError';
  }
}

/**
 * Lifecycle controller asked to make a transition its current state does not allow
 */
export class InvalidStateError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_STATE, details);
    this.name = 'InvalidStateError';
  }
}

export class ConfigurationError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.INVALID_CONFIGURATION, details, cause);
    this.name = 'ConfigurationError';
  }
}

export class FixtureError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, ErrorCodes.FIXTURE_INVALID, details, cause);
    this.name = 'FixtureError';
  }
}

/**
 * The caller aborted before a test could start its next stage
 */
export class CancelledError extends HarnessError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CANCELLED, details);
    this.name = 'CancelledError';
  }
}

/**
 * Type guard to check if an error is a HarnessError
 */
export function isHarnessError(error: unknown): error is HarnessError {
  return error instanceof HarnessError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Message suitable for a one-line report
 */
export function describeError(error: unknown): string {
  if (isHarnessError(error)) {
    return error.getUserMessage();
  }
  return toError(error).message;
}
