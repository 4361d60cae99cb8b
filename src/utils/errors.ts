export class SwitchboardError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SwitchboardError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

export class ConfigurationError extends SwitchboardError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends SwitchboardError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(message: string, field: string, value: unknown) {
    super(message, 'VALIDATION_ERROR', { field, value });
    this.name = 'ValidationError';
    this.field = field;
    this.value = value;
  }
}

// Tools

export class DuplicateToolError extends SwitchboardError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is already registered`, 'DUPLICATE_TOOL', { toolName });
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

export class UnknownToolError extends SwitchboardError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is not registered`, 'UNKNOWN_TOOL', { toolName });
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class InvalidExpressionError extends SwitchboardError {
  public readonly expression: string;

  constructor(expression: string, reason: string) {
    super(`Invalid arithmetic expression "${expression}": ${reason}`, 'INVALID_EXPRESSION', {
      expression,
    });
    this.name = 'InvalidExpressionError';
    this.expression = expression;
  }
}

export class ToolExecutionError extends SwitchboardError {
  public readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super(
      `Tool "${toolName}" failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      'TOOL_EXECUTION_ERROR',
      {
        toolName,
        causeCode: cause instanceof SwitchboardError ? cause.code : undefined,
      },
      { cause }
    );
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
  }
}

// Providers

export class ProviderError extends SwitchboardError {
  public readonly provider: string;

  constructor(
    message: string,
    provider: string,
    context?: Record<string, unknown>,
    code = 'PROVIDER_ERROR'
  ) {
    super(message, code, { ...context, provider });
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class ProviderTimeoutError extends ProviderError {
  public readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(`${provider} timed out after ${timeoutMs}ms`, provider, { timeoutMs }, 'PROVIDER_TIMEOUT');
    this.name = 'ProviderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(provider: string, reason: string) {
    super(`${provider} is unavailable: ${reason}`, provider, { reason }, 'PROVIDER_UNAVAILABLE');
    this.name = 'ProviderUnavailableError';
  }
}

export class LLMAuthenticationError extends ProviderUnavailableError {
  constructor(provider: string) {
    super(provider, 'authentication failed. Did you set the environment variable with your key?');
    this.name = 'LLMAuthenticationError';
  }
}

export class LLMRateLimitError extends ProviderError {
  public readonly retryAfterMs?: number;

  constructor(provider: string, retryAfterMs?: number) {
    super(`Rate limited by ${provider}`, provider, { retryAfterMs }, 'PROVIDER_RATE_LIMIT');
    this.name = 'LLMRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

// Orchestration

export class SpecialistError extends SwitchboardError {
  public readonly specialist: string;
  public readonly state: string;

  constructor(message: string, specialist: string, state: string, cause?: unknown) {
    super(message, 'SPECIALIST_FAILED', { specialist, state }, { cause });
    this.name = 'SpecialistError';
    this.specialist = specialist;
    this.state = state;
  }
}

export class NoSpecialistError extends SwitchboardError {
  constructor(requested: string[]) {
    super(
      requested.length > 0
        ? `None of the requested specialists are registered: ${requested.join(', ')}`
        : 'No specialist matched the query and no default specialist is registered',
      'NO_SPECIALIST',
      { requested }
    );
    this.name = 'NoSpecialistError';
  }
}

export class RunCancelledError extends SwitchboardError {
  constructor(runId: string, pending: string[]) {
    super(`Run ${runId} was cancelled before ${pending.join(', ') || 'completion'}`, 'RUN_CANCELLED', {
      runId,
      pending,
    });
    this.name = 'RunCancelledError';
  }
}

export function errorCode(error: unknown): string {
  return error instanceof SwitchboardError ? error.code : 'UNEXPECTED_ERROR';
}

export function formatError(error: unknown): string {
  if (error instanceof SwitchboardError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export type ErrorStage = 'tool' | 'specialist' | 'synthesis' | 'coordinator' | 'cancelled';

export interface RecordedError {
  stage: ErrorStage;
  code: string;
  message: string;
  specialist?: string;
  tool?: string;
}

export function toRecordedError(
  stage: ErrorStage,
  error: unknown,
  origin: { specialist?: string; tool?: string } = {}
): RecordedError {
  return {
    stage,
    code: errorCode(error),
    message: error instanceof Error ? error.message : String(error),
    ...origin,
  };
}
