/**
 * Base error class for all platform errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class PlatformError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'PlatformError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when input or a declaration fails validation. */
export class ValidationError extends PlatformError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Thrown when a task log row cannot be written.
 * Reporting aggregates are built from these rows, so callers must see the failure.
 */
export class TaskLogWriteError extends PlatformError {
  constructor(agentId: string, taskType: string, cause?: Error) {
    super({
      message: `Failed to write task log for agent "${agentId}" (${taskType})`,
      code: 'TASK_LOG_WRITE_FAILED',
      statusCode: 500,
      cause,
      context: { agentId, taskType },
    });
    this.name = 'TaskLogWriteError';
  }
}

/** Thrown when the task registry is modified after the scheduler sealed it. */
export class SchedulerStateError extends PlatformError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'SCHEDULER_STATE_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'SchedulerStateError';
  }
}

/** Thrown when an LLM provider call fails or returns an unusable response. */
export class ProviderError extends PlatformError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `LLM provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Normalize anything thrown into an Error instance. */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
