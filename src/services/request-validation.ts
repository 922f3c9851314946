/**
 * Validation of POST /api/v1/classify bodies
 */

import { z } from 'zod';
import type { ValidModels } from '../config.js';
import { RequestValidationError } from '../errors.js';
import type { ClassificationRequest } from '../types/index.js';

export const MAX_REQUEST_CATEGORIES = 20;

export const classifyRequestSchema = z.object({
  payment_text: z
    .string({ required_error: 'payment_text is required' })
    .refine((text) => text.trim().length > 0, 'payment_text cannot be empty'),
  categories: z
    .array(z.string(), { required_error: 'categories is required' })
    .min(1, 'Categories list cannot be empty'),
  model_type: z.enum(['local', 'cloud'], {
    errorMap: () => ({ message: "model_type must be 'local' or 'cloud'" }),
  }),
  model_name: z
    .string({ required_error: 'model_name is required' })
    .trim()
    .min(1, 'Model name cannot be empty'),
  use_search: z.boolean().default(false),
});

/**
 * Trim, drop blanks and remove case-insensitive duplicates (first spelling wins)
 */
export function normalizeCategories(categories: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];

  for (const category of categories) {
    const trimmed = category.trim();
    const key = trimmed.toLowerCase();
    if (trimmed && !seen.has(key)) {
      seen.add(key);
      cleaned.push(trimmed);
    }
  }

  return cleaned;
}

// Every field that fails the schema above reads as undefined here, so the
// cross-field checks still run alongside field-level errors
const crossFieldSchema = z.object({
  categories: classifyRequestSchema.shape.categories.optional().catch(undefined),
  model_type: classifyRequestSchema.shape.model_type.optional().catch(undefined),
  model_name: classifyRequestSchema.shape.model_name.optional().catch(undefined),
  use_search: classifyRequestSchema.shape.use_search.catch(false),
});

type CrossFields = z.infer<typeof crossFieldSchema>;

function crossFieldIssues(fields: CrossFields, validModels: ValidModels): string[] {
  const issues: string[] = [];

  if (fields.categories) {
    const categories = normalizeCategories(fields.categories);
    if (categories.length === 0) {
      issues.push('categories: At least one valid category must be provided');
    } else if (categories.length > MAX_REQUEST_CATEGORIES) {
      issues.push(`categories: Maximum ${MAX_REQUEST_CATEGORIES} categories allowed`);
    }
  }

  if (fields.model_type && fields.model_name !== undefined) {
    const allowedModels = validModels[fields.model_type];
    if (!allowedModels.includes(fields.model_name)) {
      issues.push(
        `model_name: Invalid model '${fields.model_name}' for type '${fields.model_type}'. ` +
          `Valid models: ${allowedModels.join(', ')}`
      );
    }
  }

  if (fields.use_search && fields.model_type === 'cloud') {
    issues.push('use_search: use_search is not supported for cloud models');
  }

  return issues;
}

/**
 * Parse an untrusted request body into a ClassificationRequest
 * @throws RequestValidationError listing every problem found
 */
export function parseClassificationRequest(
  body: unknown,
  validModels: ValidModels
): ClassificationRequest {
  const parsed = classifyRequestSchema.safeParse(body);
  const issues = parsed.success
    ? []
    : parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      );

  const fields = crossFieldSchema.safeParse(body);
  if (fields.success) {
    issues.push(...crossFieldIssues(fields.data, validModels));
  }

  if (!parsed.success || issues.length > 0) {
    throw new RequestValidationError(issues);
  }

  const data = parsed.data;
  return {
    paymentText: data.payment_text,
    categories: normalizeCategories(data.categories),
    modelType: data.model_type,
    modelName: data.model_name,
    useSearch: data.use_search,
  };
}
