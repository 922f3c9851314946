/**
 * Error types shared by the LLM clients, the classification service and the routes
 */

export interface LLMErrorOptions {
  correlationId?: string | undefined;
  model?: string | undefined;
  retryable?: boolean | undefined;
  cause?: unknown;
}

/**
 * Base class for every failure raised while talking to an LLM backend.
 * The message is prefixed with the model name so logs stay readable.
 */
export class LLMClientError extends Error {
  readonly correlationId: string | undefined;
  readonly model: string | undefined;
  readonly retryable: boolean;

  constructor(message: string, options: LLMErrorOptions = {}) {
    super(`[${options.model ?? 'Unknown Model'}] ${message}`, { cause: options.cause });
    this.name = new.target.name;
    this.correlationId = options.correlationId;
    this.model = options.model;
    this.retryable = options.retryable ?? false;
  }
}

export class LLMTimeoutError extends LLMClientError {
  constructor(message: string, options: LLMErrorOptions = {}) {
    super(message, { ...options, retryable: true });
  }
}

export class LLMRateLimitError extends LLMClientError {
  constructor(message: string, options: LLMErrorOptions = {}) {
    super(message, { ...options, retryable: true });
  }
}

// Backend answered, but not with a usable classification
export class LLMParseError extends LLMClientError {}

// Inputs rejected before any backend call
export class LLMValidationError extends LLMClientError {}

// Client cannot be built (missing API key, project id, ...)
export class LLMConfigurationError extends LLMClientError {}

/**
 * Raised when an incoming request body does not match the expected shape
 */
export class RequestValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length > 0 ? issues.join('; ') : 'Invalid request');
    this.name = 'RequestValidationError';
    this.issues = issues;
  }
}

/**
 * Upstream errors are retried only when they are transient
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof LLMClientError && error.retryable;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
