/**
 * Custom Error Types
 * Structured errors shared by the pipeline, log store and API layer
 */

export class RiskRouterError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = 'RiskRouterError';
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * Log store read/write failed (after retries, or before a client existed)
 */
export class LogStoreError extends RiskRouterError {
  public readonly operation: string;

  constructor(message: string, operation: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, 'LOG_STORE_ERROR', { ...options, retryable: true });
    this.name = 'LogStoreError';
    this.operation = operation;
  }
}

/**
 * Log store has no URL/key configured
 */
export class LogStoreNotConfiguredError extends RiskRouterError {
  constructor() {
    super('Log store is not configured: set SUPABASE_URL and SUPABASE_KEY', 'LOG_STORE_NOT_CONFIGURED');
    this.name = 'LogStoreNotConfiguredError';
  }
}

/**
 * A turn exceeded its wall-clock budget
 */
export class TurnTimeoutError extends RiskRouterError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, sessionId?: string) {
    super(`Request timed out after ${Math.round(timeoutMs / 1000)}s`, 'TURN_TIMEOUT', {
      context: { timeoutMs, sessionId },
    });
    this.name = 'TurnTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A second message arrived while the session still had a turn running
 */
export class SessionBusyError extends RiskRouterError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} already has a turn in progress`, 'SESSION_BUSY', { context: { sessionId } });
    this.name = 'SessionBusyError';
  }
}

/**
 * Model backend call failed
 */
export class ModelBackendError extends RiskRouterError {
  public readonly model: string;

  constructor(message: string, model: string, cause?: unknown) {
    super(message, 'MODEL_BACKEND_ERROR', { cause, context: { model } });
    this.name = 'ModelBackendError';
    this.model = model;
  }
}

/**
 * Tool input or external payload did not have the expected shape
 */
export class ValidationError extends RiskRouterError {
  public readonly field?: string;

  constructor(message: string, options?: { field?: string; context?: Record<string, unknown> }) {
    super(message, 'VALIDATION_ERROR', { context: options?.context });
    this.name = 'ValidationError';
    this.field = options?.field;
  }
}

export function isRiskRouterError(error: unknown): error is RiskRouterError {
  return error instanceof RiskRouterError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
