/**
 * Parsing of the JSON classification returned by every backend
 */

import { z } from 'zod';
import { LLMParseError } from '../errors.js';

export const classificationOutputSchema = z.object({
  category: z.string(),
  reasoning: z.string(),
  confidence: z.unknown().optional(),
});

export interface ParsedClassification {
  category: string;
  reasoning: string;
  confidence: number | null;
}

/**
 * Extract JSON from LLM response text (handles markdown code blocks)
 */
export function extractJSON(text: string): string {
  let jsonText = text.trim();
  if (jsonText.startsWith('```json')) {
    jsonText = jsonText.slice(7);
  } else if (jsonText.startsWith('```')) {
    jsonText = jsonText.slice(3);
  }
  if (jsonText.endsWith('```')) {
    jsonText = jsonText.slice(0, -3);
  }
  return jsonText.trim();
}

/**
 * Parse raw model text into a classification, or throw LLMParseError
 */
export function parseClassificationText(
  text: string | null | undefined,
  context: { model: string; correlationId: string; provider: string }
): ParsedClassification {
  if (!text || !text.trim()) {
    throw new LLMParseError(`Empty response from ${context.provider}`, context);
  }

  let data: unknown;
  try {
    data = JSON.parse(extractJSON(text));
  } catch (error) {
    throw new LLMParseError(`Invalid JSON response from ${context.provider}: ${text}`, {
      ...context,
      cause: error,
    });
  }

  const parsed = classificationOutputSchema.safeParse(data);
  if (!parsed.success) {
    throw new LLMParseError(`Missing required fields in response from ${context.provider}: ${text}`, {
      ...context,
      cause: parsed.error,
    });
  }

  return {
    category: parsed.data.category,
    reasoning: parsed.data.reasoning,
    confidence: normalizeConfidence(parsed.data.confidence),
  };
}

export function normalizeConfidence(value: unknown): number | null {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    return null;
  }
  return value;
}
