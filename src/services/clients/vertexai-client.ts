/**
 * Gemini on Vertex AI backend
 * Authenticates with Application Default Credentials, so only a project id is needed.
 */

import {
  GoogleGenerativeAIError,
  VertexAI,
  type GenerateContentResult,
  type GenerativeModel,
} from '@google-cloud/vertexai';
import { LLMConfigurationError, LLMTimeoutError } from '../../errors.js';
import type { PromptPair } from '../../types/index.js';
import { combinePrompt } from '../prompts.js';
import {
  BaseLLMClient,
  statusFromError,
  upstreamError,
  type BaseClientOptions,
  type ExtractedResponse,
} from './base-client.js';

export interface VertexAIClientOptions extends BaseClientOptions {
  projectId: string | undefined;
  location: string;
  maxOutputTokens: number;
}

const ABORT_NAMES = new Set(['AbortError', 'TimeoutError']);

/**
 * True when the request was cut off by the SDK timeout. The SDK wraps the
 * fetch failure, so the abort may sit one level down.
 */
export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (ABORT_NAMES.has(error.name)) {
    return true;
  }
  const inner =
    'stackTrace' in error && error.stackTrace !== undefined ? error.stackTrace : error.cause;
  return inner instanceof Error && ABORT_NAMES.has(inner.name);
}

export class VertexAIClient extends BaseLLMClient<GenerateContentResult> {
  readonly provider = 'vertexai' as const;
  private readonly generativeModel: GenerativeModel;

  constructor(options: VertexAIClientOptions, generativeModel?: GenerativeModel) {
    super(options);

    if (generativeModel) {
      this.generativeModel = generativeModel;
    } else {
      if (!options.projectId) {
        throw new LLMConfigurationError(
          'Vertex AI project ID not configured. Set GCP_PROJECT_ID or GOOGLE_CLOUD_PROJECT environment variable.',
          { model: options.model }
        );
      }

      const vertexAI = new VertexAI({
        project: options.projectId,
        location: options.location,
      });
      this.generativeModel = vertexAI.getGenerativeModel(
        {
          model: options.model,
          generationConfig: {
            maxOutputTokens: options.maxOutputTokens,
            temperature: options.temperature,
          },
        },
        { timeout: options.timeoutMs }
      );
    }
  }

  protected async requestClassification(
    prompt: PromptPair,
    correlationId: string
  ): Promise<GenerateContentResult> {
    try {
      // Gemini gets the system prompt inline
      return await this.generativeModel.generateContent({
        contents: [{ role: 'user', parts: [{ text: combinePrompt(prompt) }] }],
      });
    } catch (error) {
      const options = { correlationId, model: this.model, cause: error };

      if (isAbortError(error)) {
        throw new LLMTimeoutError('Vertex AI request timed out', options);
      }
      const status = statusFromError(error);
      // A status-less SDK error means the request never got a response
      throw upstreamError(
        status,
        `Vertex AI error: ${error instanceof Error ? error.message : String(error)}`,
        options,
        status === undefined && error instanceof GoogleGenerativeAIError
      );
    }
  }

  protected extractText(result: GenerateContentResult): ExtractedResponse {
    const candidate = result.response.candidates?.[0];

    return {
      text: candidate?.content?.parts?.[0]?.text,
      metadata: {
        finishReason: candidate?.finishReason ?? null,
      },
    };
  }
}
