/**
 * OpenAI Chat Completions backend (JSON mode)
 */

import OpenAI from 'openai';
import { LLMConfigurationError, LLMTimeoutError } from '../../errors.js';
import type { PromptPair } from '../../types/index.js';
import {
  BaseLLMClient,
  upstreamError,
  type BaseClientOptions,
  type ExtractedResponse,
} from './base-client.js';

export interface OpenAIClientOptions extends BaseClientOptions {
  apiKey: string | undefined;
  maxTokens: number;
}

export class OpenAIClient extends BaseLLMClient<OpenAI.ChatCompletion> {
  readonly provider = 'openai' as const;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(options: OpenAIClientOptions, client?: OpenAI) {
    super(options);
    this.maxTokens = options.maxTokens;

    if (client) {
      this.client = client;
    } else {
      if (!options.apiKey) {
        throw new LLMConfigurationError('OpenAI API key is required.', { model: options.model });
      }
      this.client = new OpenAI({
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: options.timeoutMs,
      });
    }
  }

  protected async requestClassification(
    prompt: PromptPair,
    correlationId: string
  ): Promise<OpenAI.ChatCompletion> {
    try {
      return await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: this.options.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: 'json_object' },
      });
    } catch (error) {
      const options = { correlationId, model: this.model, cause: error };

      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new LLMTimeoutError('OpenAI request timed out', options);
      }
      if (error instanceof OpenAI.APIError) {
        throw upstreamError(
          error.status,
          `OpenAI API error: ${error.message}`,
          options,
          error instanceof OpenAI.APIConnectionError
        );
      }
      throw error;
    }
  }

  protected extractText(completion: OpenAI.ChatCompletion): ExtractedResponse {
    const choice = completion.choices[0];

    return {
      text: choice?.message.content,
      metadata: {
        finishReason: choice?.finish_reason ?? null,
        usage: completion.usage ?? null,
      },
    };
  }
}
