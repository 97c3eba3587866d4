/**
 * Custom Error Classes
 *
 * Specific error types for the orchestrator and its collaborators.
 * Each error class includes context information and is serializable.
 */

// =============================================================================
// BASE ERROR
// =============================================================================

/**
 * Base error class for all custom errors.
 * Includes context object for additional debugging information.
 */
export class OrchestratorError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    recoverable = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OrchestratorError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();
    this.recoverable = recoverable;

    // Maintains proper stack trace in Node.js
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Serializes the error for logging or transmission.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      recoverable: this.recoverable,
      stack: this.stack,
    };
  }

  /**
   * Creates a string representation for logging.
   */
  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// =============================================================================
// CONFIGURATION ERRORS
// =============================================================================

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigurationError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context, false);
    this.name = 'ConfigurationError';
  }
}

// =============================================================================
// LIFECYCLE ERRORS
// =============================================================================

/**
 * Error thrown when a collaborator factory fails.
 * Initialization is fail-fast: this error is never recovered.
 */
export class CollaboratorConstructionError extends OrchestratorError {
  public readonly slot: string;

  constructor(slot: string, cause: unknown) {
    super(
      `Failed to construct ${slot}: ${getErrorMessage(cause)}`,
      'COLLABORATOR_CONSTRUCTION_ERROR',
      { slot },
      false,
      { cause }
    );
    this.name = 'CollaboratorConstructionError';
    this.slot = slot;
  }
}

/**
 * Error thrown when an operation is attempted in the wrong lifecycle state.
 */
export class OrchestratorStateError extends OrchestratorError {
  constructor(operation: string, status: string) {
    super(
      `Cannot ${operation} while orchestrator is ${status}`,
      'ORCHESTRATOR_STATE_ERROR',
      { operation, status },
      false
    );
    this.name = 'OrchestratorStateError';
  }
}

/**
 * Error thrown when the loop hits its consecutive failure ceiling.
 */
export class RetryLimitExceededError extends OrchestratorError {
  constructor(consecutiveFailures: number, lastError: unknown) {
    super(
      `Loop failed ${consecutiveFailures} times in a row: ${getErrorMessage(lastError)}`,
      'RETRY_LIMIT_EXCEEDED',
      { consecutiveFailures },
      false,
      { cause: lastError }
    );
    this.name = 'RetryLimitExceededError';
  }
}

// =============================================================================
// CYCLE ERRORS
// =============================================================================

/**
 * Error raised by one stage of the cycle pipeline.
 */
export class CycleStageError extends OrchestratorError {
  public readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const detail = causeMessage(cause);
    super(detail || `${stage} stage failed`, 'CYCLE_STAGE_ERROR', { stage }, true, { cause });
    this.name = 'CycleStageError';
    this.stage = stage;
  }
}

// =============================================================================
// PERSISTENCE ERRORS
// =============================================================================

/**
 * Error thrown when the state store cannot be read or written.
 */
export class StateStoreError extends OrchestratorError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'STATE_STORE_ERROR', context, true, { cause });
    this.name = 'StateStoreError';
  }
}

/**
 * Error thrown when database operations fail.
 */
export class DatabaseError extends OrchestratorError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    recoverable = true
  ) {
    super(message, 'DATABASE_ERROR', context, recoverable);
    this.name = 'DatabaseError';
  }
}

/**
 * Error thrown when database connection fails.
 */
export class DatabaseConnectionError extends DatabaseError {
  constructor(reason: string) {
    super(`Database connection failed: ${reason}`, { reason }, true);
    this.name = 'DatabaseConnectionError';
  }
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

/**
 * Type guard to check if an error is an OrchestratorError.
 */
export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}

/**
 * Type guard to check if an error is recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
  if (isOrchestratorError(error)) {
    return error.recoverable;
  }
  return false;
}

/**
 * Wraps an unknown error in an OrchestratorError if it isn't already one.
 */
export function wrapError(error: unknown, defaultCode = 'UNKNOWN_ERROR'): OrchestratorError {
  if (isOrchestratorError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new OrchestratorError(error.message, defaultCode, {
      originalName: error.name,
      originalStack: error.stack,
    });
  }

  return new OrchestratorError(String(error), defaultCode);
}

/**
 * Extracts a user-friendly message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (isOrchestratorError(error)) {
    return error.toString();
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause === undefined || cause === null) {
    return '';
  }
  return String(cause);
}
