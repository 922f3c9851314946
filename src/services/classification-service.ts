/**
 * Classification Service
 * Routes a request to the right backend, optionally adds web search context,
 * and guarantees the returned category is one the caller offered.
 *
 * Flow:
 * 1. Resolve the backend from model type and model name
 * 2. Get the backend client and check the inputs against its limits
 * 3. Search the web (local models only, when asked and configured)
 * 4. Call the backend client
 * 5. Check category membership, coercing to "unknown" when it is not offered
 */

import { randomUUID } from 'crypto';
import { LLMValidationError, errorMessage } from '../errors.js';
import {
  UNKNOWN_CATEGORY,
  type ClassificationRequest,
  type ClassificationResult,
  type LLMProvider,
  type ModelType,
  type SearchResult,
} from '../types/index.js';
import type { LLMClientProvider } from './clients/client-manager.js';
import type { WebSearchProvider } from './search-service.js';

export interface PaymentClassifier {
  classify(request: ClassificationRequest, correlationId?: string): Promise<ClassificationResult>;
}

export interface ClassificationServiceOptions {
  searchMaxResults: number;
}

// Model name prefixes for cloud backends
const CLOUD_PROVIDER_PREFIXES: ReadonlyArray<readonly [string, LLMProvider]> = [
  ['claude', 'anthropic'],
  ['gemini', 'vertexai'],
  ['gpt', 'openai'],
  ['o1', 'openai'],
  ['o3', 'openai'],
  ['o4', 'openai'],
];

/**
 * Pick the backend for a model. Local models always run on Ollama.
 */
export function resolveProvider(modelType: ModelType, modelName: string): LLMProvider {
  if (modelType === 'local') {
    return 'ollama';
  }

  const name = modelName.toLowerCase();
  const match = CLOUD_PROVIDER_PREFIXES.find(([prefix]) => name.startsWith(prefix));
  if (!match) {
    throw new LLMValidationError(`No cloud backend serves model '${modelName}'`, {
      model: modelName,
    });
  }
  return match[1];
}

/**
 * Return the caller's spelling of `category`, or null when it was not offered
 */
export function matchCategory(category: string, allowed: readonly string[]): string | null {
  if (allowed.includes(category)) {
    return category;
  }
  const wanted = category.trim().toLowerCase();
  return allowed.find((candidate) => candidate.trim().toLowerCase() === wanted) ?? null;
}

export class ClassificationService implements PaymentClassifier {
  constructor(
    private readonly clients: LLMClientProvider,
    private readonly searchProvider: WebSearchProvider | null,
    private readonly options: ClassificationServiceOptions = { searchMaxResults: 3 }
  ) {}

  async classify(
    request: ClassificationRequest,
    correlationId: string = randomUUID()
  ): Promise<ClassificationResult> {
    const provider = resolveProvider(request.modelType, request.modelName);
    const client = this.clients.getClient(provider, request.modelName);

    const input = {
      paymentText: request.paymentText,
      categories: request.categories,
      correlationId,
    };
    // Inputs are checked before any search request goes out
    client.validate(input);

    const searchResults =
      request.useSearch && request.modelType === 'local'
        ? await this.collectSearchResults(request.paymentText, correlationId)
        : [];

    const output = await client.classify({ ...input, searchResults });

    let category = matchCategory(output.category, request.categories);
    if (category === null) {
      console.warn('LLM returned a category outside the allowed list', {
        correlationId,
        model: output.model,
        returned: output.category,
        allowed: request.categories,
      });
      category = UNKNOWN_CATEGORY;
    }

    return {
      category,
      reasoning: output.reasoning,
      confidence: output.confidence,
      searchUsed: searchResults.length > 0,
      correlationId,
      provider,
      modelUsed: output.model,
      processingTimeMs: output.processingTimeMs,
    };
  }

  /**
   * Search failures never fail the classification
   */
  private async collectSearchResults(
    paymentText: string,
    correlationId: string
  ): Promise<SearchResult[]> {
    if (!this.searchProvider) {
      console.warn('Search requested but no search provider is configured', { correlationId });
      return [];
    }

    try {
      return await this.searchProvider.search(
        paymentText,
        this.options.searchMaxResults,
        correlationId
      );
    } catch (error) {
      console.warn('Search failed, continuing without search results', {
        correlationId,
        error: errorMessage(error),
      });
      return [];
    }
  }
}
