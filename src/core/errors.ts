// src/core/errors.ts

/**
 * @file Defines custom error classes for the orchestration core.
 * Every error raised by the library derives from `ApplicationError`, so callers can
 * catch the whole family with a single `instanceof` check.
 */

/**
 * Base class for custom application errors.
 */
export class ApplicationError extends Error {
  /**
   * Optional additional data associated with the error (context, error codes, etc.).
   */
  public readonly metadata?: Record<string, unknown>;

  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;

    // Restores the prototype chain when targeting ES5-style class emit.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error raised when a requested tool is not registered.
 */
export class ToolNotFoundError extends ApplicationError {
  constructor(toolName: string, message?: string) {
    super(message || `Tool "${toolName}" not found.`, { toolName });
    this.name = 'ToolNotFoundError';
  }
}

/**
 * Error thrown during configuration validation or when configuration is missing.
 */
export class ConfigurationError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when an operation cannot be performed due to an invalid state.
 */
export class InvalidStateError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'InvalidStateError';
  }
}

/**
 * Raised when a request targets a session that already has a loop running.
 */
export class SessionBusyError extends InvalidStateError {
  public readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session "${sessionId}" is already processing a request.`, { sessionId });
    this.name = 'SessionBusyError';
    this.sessionId = sessionId;
  }
}

/**
 * Error related to storage operations.
 */
export class StorageError extends ApplicationError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'StorageError';
  }
}

/**
 * Error thrown when an input validation fails.
 */
export class ValidationError extends ApplicationError {
  public readonly validationDetails?: Record<string, string | string[]>;

  constructor(
    message: string,
    validationDetails?: Record<string, string | string[]>,
    metadata?: Record<string, unknown>
  ) {
    super(message, metadata);
    this.name = 'ValidationError';
    this.validationDetails = validationDetails;
  }
}

/**
 * A candidate block of model output that could not be decoded into an action.
 * Recovered locally by the response parser and never surfaced to the user.
 */
export class ParseFailure extends ApplicationError {
  public readonly candidate: string;

  constructor(message: string, candidate: string, metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'ParseFailure';
    this.candidate = candidate;
  }
}

/**
 * Failure reported by a model provider. `retryable` tells the router whether
 * another attempt against the same model is worthwhile.
 */
export class ProviderError extends ApplicationError {
  public readonly status?: number;
  public readonly retryable: boolean;
  /** Delay the provider asked for via `Retry-After`, in milliseconds. */
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { status?: number; retryable: boolean; retryAfterMs?: number },
    metadata?: Record<string, unknown>
  ) {
    super(message, { ...metadata, status: options.status, retryable: options.retryable });
    this.name = 'ProviderError';
    this.status = options.status;
    this.retryable = options.retryable;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Error raised by a tool while executing. Converted into a failed ToolExecution
 * by the dispatcher.
 */
export class ToolError extends ApplicationError {
  constructor(toolName: string, message: string, metadata?: Record<string, unknown>) {
    super(message, { ...metadata, toolName });
    this.name = 'ToolError';
  }
}

/**
 * A tool call or a whole request exceeded its time budget.
 */
export class TimeoutError extends ApplicationError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, metadata?: Record<string, unknown>) {
    super(message, { ...metadata, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The caller cancelled the request (abort signal or closed event stream).
 */
export class CancellationError extends ApplicationError {
  constructor(message = 'Request was cancelled.', metadata?: Record<string, unknown>) {
    super(message, metadata);
    this.name = 'CancellationError';
  }
}
