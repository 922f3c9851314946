/**
 * Web search used to give local models context about unfamiliar merchants
 * Google Custom Search JSON API
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import type { SearchResult } from '../types/index.js';

export const GOOGLE_SEARCH_API_URL = 'https://www.googleapis.com/customsearch/v1';

// The API rejects num > 10
const MAX_RESULTS_PER_REQUEST = 10;

export interface WebSearchProvider {
  search(query: string, numResults: number, correlationId?: string): Promise<SearchResult[]>;
}

export interface GoogleSearchOptions {
  apiKey: string;
  searchEngineId: string;
  timeoutMs?: number;
}

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      })
    )
    .optional(),
});

export class GoogleSearchService implements WebSearchProvider {
  private readonly apiKey: string;
  private readonly searchEngineId: string;
  private readonly http: AxiosInstance;

  constructor(options: GoogleSearchOptions, http?: AxiosInstance) {
    if (!options.apiKey || !options.searchEngineId) {
      throw new Error('Google API key and search engine ID are required');
    }

    this.apiKey = options.apiKey;
    this.searchEngineId = options.searchEngineId;
    this.http = http ?? axios.create({ timeout: options.timeoutMs ?? 10000 });
  }

  /**
   * Returns at most `numResults` results; never throws, failures yield []
   */
  async search(query: string, numResults = 3, correlationId = ''): Promise<SearchResult[]> {
    if (!query || !query.trim()) {
      console.warn('Empty search query provided', { correlationId });
      return [];
    }

    try {
      console.info('Google Search request', { query, numResults, correlationId });

      const response = await this.http.get<unknown>(GOOGLE_SEARCH_API_URL, {
        params: {
          key: this.apiKey,
          cx: this.searchEngineId,
          q: query,
          num: Math.max(1, Math.min(numResults, MAX_RESULTS_PER_REQUEST)),
        },
        headers: correlationId ? { 'X-Correlation-ID': correlationId } : {},
      });

      const data = searchResponseSchema.parse(response.data);
      const results = (data.items ?? []).map((item) => ({
        title: item.title ?? '',
        snippet: item.snippet ?? '',
        link: item.link ?? '',
      }));

      console.info('Google Search response', {
        query,
        resultsCount: results.length,
        correlationId,
      });

      return results;
    } catch (error) {
      console.error('Google Search failed', {
        query,
        error: errorMessage(error),
        correlationId,
      });
      return [];
    }
  }
}

/**
 * Search is optional: null unless both the API key and engine id are configured
 */
export function createSearchService(config: AppConfig): GoogleSearchService | null {
  const { apiKey, engineId, timeoutMs } = config.search;
  if (!apiKey || !engineId) {
    return null;
  }
  return new GoogleSearchService({ apiKey, searchEngineId: engineId, timeoutMs });
}
