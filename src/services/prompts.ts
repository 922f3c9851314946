/**
 * Prompt templates for payment classification
 */

import type { PromptPair, SearchResult } from '../types/index.js';

export const CLASSIFICATION_SYSTEM_PROMPT = `You are a payment classification expert. Your job is to assign a payment description to exactly one of the categories the user provides.

Guidelines:
1. Analyze the merchant name, description and amount to determine the category
2. Be precise - categorize based on what the payment actually is, not what it could be
3. Only ever answer with one of the listed categories, spelled exactly as listed
4. If no category fits, choose the closest one and lower your confidence
5. Provide a short, clear reasoning for your choice

Always respond with valid JSON matching the expected schema.`;

const RESPONSE_FORMAT = `Respond with JSON in this exact format:
{
  "category": "one_of_the_available_categories",
  "reasoning": "brief explanation of why this category was chosen",
  "confidence": 0.0_to_1.0
}`;

export interface ClassificationPromptInput {
  paymentText: string;
  categories: readonly string[];
  searchResults?: readonly SearchResult[] | undefined;
}

/**
 * Build the system and user prompts for a classification call.
 * Search snippets, when present, are injected between the payment and the category list.
 */
export function buildClassificationPrompt(input: ClassificationPromptInput): PromptPair {
  const searchContext = formatSearchResults(input.searchResults ?? []);

  const sections = [`Classify this payment:\n\n${input.paymentText}`];
  if (searchContext) {
    sections.push(`Web search results about this payment:\n${searchContext}`);
  }
  sections.push(`Available categories: ${input.categories.join(', ')}`);
  sections.push(RESPONSE_FORMAT);

  return {
    system: CLASSIFICATION_SYSTEM_PROMPT,
    user: sections.join('\n\n'),
  };
}

export function formatSearchResults(results: readonly SearchResult[]): string {
  return results.map((result) => `- ${result.title}: ${result.snippet}`).join('\n');
}

/**
 * Single-string form for backends without a separate system role
 */
export function combinePrompt(prompt: PromptPair): string {
  return `${prompt.system}\n\n${prompt.user}`;
}
