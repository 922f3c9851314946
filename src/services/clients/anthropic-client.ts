/**
 * Claude (Anthropic Messages API) backend
 */

import Anthropic from '@anthropic-ai/sdk';
import { LLMConfigurationError, LLMTimeoutError } from '../../errors.js';
import type { PromptPair } from '../../types/index.js';
import {
  BaseLLMClient,
  upstreamError,
  type BaseClientOptions,
  type ExtractedResponse,
} from './base-client.js';

export interface AnthropicClientOptions extends BaseClientOptions {
  apiKey: string | undefined;
  maxTokens: number;
}

export class AnthropicClient extends BaseLLMClient<Anthropic.Message> {
  readonly provider = 'anthropic' as const;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions, client?: Anthropic) {
    super(options);
    this.maxTokens = options.maxTokens;

    if (client) {
      this.client = client;
    } else {
      if (!options.apiKey) {
        throw new LLMConfigurationError('Anthropic API key is required.', { model: options.model });
      }
      // Retries are handled by the base client
      this.client = new Anthropic({
        apiKey: options.apiKey,
        maxRetries: 0,
        timeout: options.timeoutMs,
      });
    }
  }

  protected async requestClassification(
    prompt: PromptPair,
    correlationId: string
  ): Promise<Anthropic.Message> {
    try {
      return await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: this.options.temperature,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }],
      });
    } catch (error) {
      const options = { correlationId, model: this.model, cause: error };

      if (error instanceof Anthropic.APIConnectionTimeoutError) {
        throw new LLMTimeoutError('Anthropic request timed out', options);
      }
      if (error instanceof Anthropic.APIError) {
        throw upstreamError(
          error.status,
          `Anthropic API error: ${error.message}`,
          options,
          error instanceof Anthropic.APIConnectionError
        );
      }
      throw error;
    }
  }

  protected extractText(message: Anthropic.Message): ExtractedResponse {
    const textBlock = message.content.find(
      (block): block is Anthropic.TextBlock => block.type === 'text'
    );

    return {
      text: textBlock?.text,
      metadata: {
        stopReason: message.stop_reason,
        usage: message.usage,
      },
    };
  }
}
