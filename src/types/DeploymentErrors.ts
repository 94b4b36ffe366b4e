/**
 * Deployment Errors
 *
 * Typed errors with a stable error_code so logs and ledger reasons can be
 * classified without string matching on messages.
 */

export type DeploymentErrorCode =
  | 'DATA_FORMAT'
  | 'SCRIPT_EXECUTION_FAILED'
  | 'SCRIPT_TIMEOUT'
  | 'CONFIGURATION'
  | 'INVALID_EVENT';

/**
 * Base deployment error
 */
export class DeploymentError extends Error {
  constructor(
    message: string,
    public readonly error_code: DeploymentErrorCode
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A filename token matched syntactically but does not hold a usable value
 * (e.g. `2024_13_40`).
 */
export class DataFormatError extends DeploymentError {
  constructor(message: string) {
    super(message, 'DATA_FORMAT');
  }
}

/**
 * Raised by executors; message becomes the ledger failure_reason.
 */
export class ScriptExecutionError extends DeploymentError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'SCRIPT_EXECUTION_FAILED');
    if (originalError !== undefined) {
      this.cause = originalError;
    }
  }
}

export class ScriptTimeoutError extends DeploymentError {
  constructor(timeoutMs: number) {
    super(`Script execution timed out after ${timeoutMs}ms`, 'SCRIPT_TIMEOUT');
  }
}

export class ConfigurationError extends DeploymentError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
  }
}

export class InvalidEventError extends DeploymentError {
  constructor(message: string) {
    super(message, 'INVALID_EVENT');
  }
}

/** Message of any thrown value, for logs and failure reasons. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
