/**
 * Classification Routes
 * POST /api/v1/classify
 */

import { randomUUID } from 'crypto';
import { Router, type Request, type Response } from 'express';
import type { ValidModels } from '../config.js';
import {
  LLMClientError,
  LLMParseError,
  LLMRateLimitError,
  LLMTimeoutError,
  LLMValidationError,
  RequestValidationError,
} from '../errors.js';
import { parseClassificationRequest } from '../services/request-validation.js';
import type { PaymentClassifier } from '../services/classification-service.js';
import type { ApiErrorResponse, PaymentClassification } from '../types/index.js';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';

interface ErrorMapping {
  status: number;
  code: string;
  message: string;
}

/**
 * Translate a failure into an HTTP status and error code
 */
export function mapClassificationError(error: unknown): ErrorMapping {
  if (error instanceof RequestValidationError) {
    return { status: 400, code: 'INVALID_REQUEST', message: error.message };
  }
  if (error instanceof LLMValidationError) {
    return { status: 400, code: 'INVALID_REQUEST', message: error.message };
  }
  if (error instanceof LLMTimeoutError) {
    return { status: 408, code: 'LLM_TIMEOUT', message: `Request timeout: ${error.message}` };
  }
  if (error instanceof LLMParseError) {
    return {
      status: 422,
      code: 'LLM_PARSE_ERROR',
      message: `Failed to parse LLM response: ${error.message}`,
    };
  }
  if (error instanceof LLMRateLimitError) {
    return { status: 429, code: 'LLM_RATE_LIMITED', message: `LLM rate limited: ${error.message}` };
  }
  if (error instanceof LLMClientError) {
    return { status: 503, code: 'LLM_SERVICE_ERROR', message: `LLM service error: ${error.message}` };
  }
  return { status: 500, code: 'INTERNAL_ERROR', message: 'Failed to classify payment' };
}

/**
 * Create classification routes
 */
export function createClassificationRoutes(
  classifier: PaymentClassifier,
  validModels: ValidModels
): Router {
  const router = Router();

  /**
   * POST /api/v1/classify
   * Classify a payment description into one of the supplied categories
   *
   * Body: { payment_text, categories, model_type, model_name, use_search? }
   */
  router.post('/classify', async (req: Request, res: Response) => {
    const correlationId = req.get(CORRELATION_ID_HEADER) || randomUUID();
    res.setHeader(CORRELATION_ID_HEADER, correlationId);

    try {
      const request = parseClassificationRequest(req.body, validModels);
      const result = await classifier.classify(request, correlationId);

      const response: PaymentClassification = {
        category: result.category,
        reasoning: result.reasoning,
        search_used: result.searchUsed,
      };
      res.json(response);
    } catch (error) {
      const mapped = mapClassificationError(error);
      if (mapped.status >= 500) {
        console.error('Error classifying payment:', { correlationId, error });
      } else {
        console.warn('Classification request rejected:', {
          correlationId,
          status: mapped.status,
          message: mapped.message,
        });
      }

      const response: ApiErrorResponse = {
        success: false,
        error: { code: mapped.code, message: mapped.message },
      };
      if (error instanceof RequestValidationError) {
        response.error.details = { issues: error.issues };
      }
      res.status(mapped.status).json(response);
    }
  });

  return router;
}
