/**
 * Shared types for the payment classifier
 */

// ============================================================================
// API Response Types
// ============================================================================

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

// ============================================================================
// Classification Types
// ============================================================================

export type ModelType = 'local' | 'cloud';

// Returned when the model picks a label outside the caller's list
export const UNKNOWN_CATEGORY = 'unknown';

// Body of POST /api/v1/classify
export interface ClassifyRequestBody {
  payment_text: string;
  categories: string[];
  model_type: ModelType;
  model_name: string;
  use_search?: boolean;
}

// Response of POST /api/v1/classify
export interface PaymentClassification {
  category: string;
  reasoning: string;
  search_used: boolean;
}

export interface ClassificationRequest {
  paymentText: string;
  categories: string[];
  modelType: ModelType;
  modelName: string;
  useSearch: boolean;
}

export interface ClassificationResult {
  category: string;
  reasoning: string;
  confidence: number | null;
  searchUsed: boolean;
  correlationId: string;
  provider: LLMProvider;
  modelUsed: string;
  processingTimeMs: number;
}

// ============================================================================
// LLM Backend Types
// ============================================================================

export type LLMProvider = 'anthropic' | 'vertexai' | 'openai' | 'ollama';

export interface LLMClassifyInput {
  paymentText: string;
  categories: string[];
  correlationId: string;
  searchResults?: SearchResult[] | undefined;
}

// What a backend produced, before category membership is checked
export interface LLMClassification {
  category: string;
  reasoning: string;
  confidence: number | null;
  model: string;
  processingTimeMs: number;
  metadata: Record<string, unknown>;
}

export interface PromptPair {
  system: string;
  user: string;
}

// ============================================================================
// Search Types
// ============================================================================

export interface SearchResult {
  title: string;
  snippet: string;
  link: string;
}
