/**
 * Local model server backend (Ollama /api/generate)
 */

import axios, { type AxiosInstance } from 'axios';
import { Agent } from 'http';
import { LLMTimeoutError } from '../../errors.js';
import type { PromptPair } from '../../types/index.js';
import { combinePrompt } from '../prompts.js';
import {
  BaseLLMClient,
  upstreamError,
  type BaseClientOptions,
  type ExtractedResponse,
} from './base-client.js';

export interface OllamaClientOptions extends BaseClientOptions {
  baseUrl: string;
}

export interface OllamaGenerateResponse {
  model?: string;
  response?: unknown;
  done?: boolean;
  eval_duration?: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class OllamaClient extends BaseLLMClient<OllamaGenerateResponse | null> {
  readonly provider = 'ollama' as const;
  private readonly http: AxiosInstance;
  // Only set when this client owns its connection pool
  private readonly agent: Agent | null;

  constructor(options: OllamaClientOptions, http?: AxiosInstance) {
    super(options);
    if (http) {
      this.http = http;
      this.agent = null;
    } else {
      this.agent = new Agent({ keepAlive: true });
      this.http = axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        httpAgent: this.agent,
      });
    }
  }

  async close(): Promise<void> {
    this.agent?.destroy();
  }

  protected async requestClassification(
    prompt: PromptPair,
    correlationId: string
  ): Promise<OllamaGenerateResponse | null> {
    try {
      const response = await this.http.post<OllamaGenerateResponse | null>(
        '/api/generate',
        {
          model: this.model,
          prompt: combinePrompt(prompt),
          stream: false,
          format: 'json',
          options: { temperature: this.options.temperature },
        },
        { headers: { 'X-Correlation-ID': correlationId } }
      );
      return response.data;
    } catch (error) {
      const options = { correlationId, model: this.model, cause: error };

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === undefined && error.code && TIMEOUT_CODES.has(error.code)) {
          throw new LLMTimeoutError('Ollama request timed out', options);
        }
        const message =
          status === undefined
            ? `Ollama unreachable: ${error.message}`
            : `Ollama request failed (status ${status})`;
        throw upstreamError(status, message, options, true);
      }
      throw error;
    }
  }

  protected extractText(data: OllamaGenerateResponse | null): ExtractedResponse {
    return {
      text: typeof data?.response === 'string' ? data.response : null,
      metadata: {
        evalDuration: data?.eval_duration ?? null,
      },
    };
  }
}
