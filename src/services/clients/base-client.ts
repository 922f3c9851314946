/**
 * Backend client contract and the shared classification pipeline
 *
 * Concrete clients only implement the transport (`requestClassification`)
 * and the extraction of the model's text (`extractText`). Input validation,
 * prompt building, retries, parsing and logging live here.
 */

import type { LLMSettings } from '../../config.js';
import {
  LLMClientError,
  LLMRateLimitError,
  LLMTimeoutError,
  LLMValidationError,
  errorMessage,
  isRetryableError,
  type LLMErrorOptions,
} from '../../errors.js';
import type {
  LLMClassification,
  LLMClassifyInput,
  LLMProvider,
  PromptPair,
} from '../../types/index.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { buildClassificationPrompt } from '../prompts.js';
import { parseClassificationText } from '../llm-response.js';

export interface LLMClient {
  readonly provider: LLMProvider;
  readonly model: string;
  /** Throws LLMValidationError for input this client would reject */
  validate(input: LLMClassifyInput): void;
  classify(input: LLMClassifyInput): Promise<LLMClassification>;
  close(): Promise<void>;
}

export interface BaseClientOptions extends LLMSettings {
  model: string;
}

export interface ExtractedResponse {
  text: string | null | undefined;
  metadata?: Record<string, unknown>;
}

export abstract class BaseLLMClient<TResponse> implements LLMClient {
  abstract readonly provider: LLMProvider;

  protected constructor(protected readonly options: BaseClientOptions) {}

  get model(): string {
    return this.options.model;
  }

  async classify(input: LLMClassifyInput): Promise<LLMClassification> {
    const { correlationId } = input;
    const startTime = Date.now();

    try {
      this.validate(input);

      if (this.options.enableRequestLogging) {
        console.info('LLM request', {
          correlationId,
          provider: this.provider,
          model: this.model,
          searchResults: input.searchResults?.length ?? 0,
        });
      }

      const prompt = buildClassificationPrompt(input);
      const response = await retryWithBackoff(
        () => this.requestClassification(prompt, correlationId),
        {
          maxRetries: this.options.maxRetries,
          initialDelay: this.options.retryInitialDelayMs,
          maxDelay: this.options.retryMaxDelayMs,
          shouldRetry: isRetryableError,
          onRetry: (error, attempt, delay) => {
            console.warn('Retrying LLM request', {
              correlationId,
              model: this.model,
              attempt,
              delayMs: Math.round(delay),
              error: errorMessage(error),
            });
          },
        }
      );

      const extracted = this.extractText(response);
      const parsed = parseClassificationText(extracted.text, {
        model: this.model,
        correlationId,
        provider: this.provider,
      });
      const processingTimeMs = roundMs(Date.now() - startTime);

      if (this.options.enableResponseLogging) {
        console.info('LLM response', {
          correlationId,
          model: this.model,
          category: parsed.category,
          durationMs: processingTimeMs,
        });
      }

      return {
        ...parsed,
        model: this.model,
        processingTimeMs,
        metadata: extracted.metadata ?? {},
      };
    } catch (error) {
      console.error('LLM classification failed', {
        correlationId,
        model: this.model,
        error: errorMessage(error),
        errorType: error instanceof LLMClientError ? error.name : 'UnexpectedError',
        durationMs: roundMs(Date.now() - startTime),
      });

      if (error instanceof LLMClientError) {
        throw error;
      }
      throw new LLMClientError(`Unexpected error in ${this.constructor.name}`, {
        correlationId,
        model: this.model,
        cause: error,
      });
    }
  }

  async close(): Promise<void> {
    // Nothing to release by default
  }

  validate(input: LLMClassifyInput): void {
    const context = { correlationId: input.correlationId, model: this.model };

    if (!input.paymentText || !input.paymentText.trim()) {
      throw new LLMValidationError('payment_text cannot be empty', context);
    }
    if (input.categories.length === 0) {
      throw new LLMValidationError('categories list cannot be empty', context);
    }
    if (input.categories.length > this.options.maxCategories) {
      throw new LLMValidationError(
        `Too many categories (max ${this.options.maxCategories})`,
        context
      );
    }
    if (input.paymentText.length > this.options.maxPaymentTextLength) {
      throw new LLMValidationError(
        `payment_text too long (max ${this.options.maxPaymentTextLength} chars)`,
        context
      );
    }
  }

  /**
   * Send one request to the backend. Upstream failures must be translated
   * into LLMClientError subclasses so the retry policy can see them.
   */
  protected abstract requestClassification(
    prompt: PromptPair,
    correlationId: string
  ): Promise<TResponse>;

  protected abstract extractText(response: TResponse): ExtractedResponse;
}

/**
 * Pull an HTTP status out of an SDK error without depending on its class
 */
export function statusFromError(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  const match = /status:?\s*(\d{3})/i.exec(errorMessage(error));
  return match?.[1] ? parseInt(match[1], 10) : undefined;
}

/**
 * Map an upstream HTTP status to the matching error type.
 * 5xx is retryable; a missing status is retryable only when the caller says
 * the failure happened at the connection level.
 */
export function upstreamError(
  status: number | undefined,
  message: string,
  options: LLMErrorOptions,
  connectionFailure = false
): LLMClientError {
  if (status === 429) {
    return new LLMRateLimitError(message, options);
  }
  if (status === 408 || status === 504) {
    return new LLMTimeoutError(message, options);
  }
  const retryable = status === undefined ? connectionFailure : status >= 500;
  return new LLMClientError(message, { ...options, retryable });
}

function roundMs(ms: number): number {
  return Math.round(ms * 100) / 100;
}
