/**
 * Builds backend clients from configuration and keeps one per (provider, model)
 */

import type { AppConfig } from '../../config.js';
import { errorMessage } from '../../errors.js';
import type { LLMProvider } from '../../types/index.js';
import { AnthropicClient } from './anthropic-client.js';
import type { BaseClientOptions, LLMClient } from './base-client.js';
import { OllamaClient } from './ollama-client.js';
import { OpenAIClient } from './openai-client.js';
import { VertexAIClient } from './vertexai-client.js';

export interface LLMClientProvider {
  getClient(provider: LLMProvider, model: string): LLMClient;
}

export type LLMClientFactory = (provider: LLMProvider, model: string) => LLMClient;

/**
 * Factory that wires each provider's settings from the app config
 */
export function createClientFactory(config: AppConfig): LLMClientFactory {
  return (provider, model) => {
    const base: BaseClientOptions = { ...config.llm, model };

    switch (provider) {
      case 'anthropic':
        return new AnthropicClient({
          ...base,
          apiKey: config.anthropic.apiKey,
          maxTokens: config.anthropic.maxTokens,
        });
      case 'openai':
        return new OpenAIClient({
          ...base,
          apiKey: config.openai.apiKey,
          maxTokens: config.openai.maxTokens,
        });
      case 'vertexai':
        return new VertexAIClient({
          ...base,
          projectId: config.projectId,
          location: config.vertex.location,
          maxOutputTokens: config.vertex.maxOutputTokens,
        });
      case 'ollama':
        return new OllamaClient({ ...base, baseUrl: config.ollama.baseUrl });
    }
  };
}

export class LLMClientManager implements LLMClientProvider {
  private readonly clients = new Map<string, LLMClient>();

  constructor(private readonly factory: LLMClientFactory) {}

  /**
   * Get or create the client for a provider/model pair
   */
  getClient(provider: LLMProvider, model: string): LLMClient {
    const key = `${provider}:${model}`;
    const existing = this.clients.get(key);
    if (existing) {
      return existing;
    }

    const client = this.factory(provider, model);
    this.clients.set(key, client);
    console.info('LLM client created', { provider, model });
    return client;
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Close every cached client; failures are logged and do not stop the others
   */
  async closeAll(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();

    const results = await Promise.allSettled(clients.map((client) => client.close()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        console.warn('Failed to close LLM client', {
          model: clients[index]?.model,
          error: errorMessage(result.reason),
        });
      }
    });
  }
}
