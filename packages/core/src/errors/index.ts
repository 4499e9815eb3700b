/**
 * Custom Error Classes
 */

/**
 * Base error class for all streamplan errors
 */
export class StreamPlanError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StreamPlanError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid settings
 */
export class ValidationError extends StreamPlanError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Something the caller had to provide before this step was missing
 */
export class PreconditionError extends StreamPlanError {
  constructor(requirement: string, message?: string) {
    super(
      message ?? `Precondition not met: ${requirement}`,
      'PRECONDITION_ERROR',
      { requirement }
    );
    this.name = 'PreconditionError';
  }
}

/**
 * Probe document that cannot be turned into a stream inventory
 */
export class ProbeDocumentError extends StreamPlanError {
  constructor(message: string, issues?: string[]) {
    super(
      `Invalid probe document: ${message}`,
      'PROBE_DOCUMENT_ERROR',
      issues ? { issues } : undefined
    );
    this.name = 'ProbeDocumentError';
  }
}

/**
 * Original-language lookup against an external service failed
 */
export class LookupError extends StreamPlanError {
  constructor(service: string, message: string, details?: Record<string, unknown>) {
    super(
      `${service} lookup failed: ${message}`,
      'LOOKUP_ERROR',
      { service, ...details }
    );
    this.name = 'LookupError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends StreamPlanError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }
}

/**
 * Render any thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
