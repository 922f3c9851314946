import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { AppConfig } from './config.js';
import { createClassificationRoutes } from './routes/classification.js';
import type { PaymentClassifier } from './services/classification-service.js';
import type { ApiErrorResponse } from './types/index.js';

/**
 * Build the Express application around a classifier
 */
export function createApp(config: AppConfig, classifier: PaymentClassifier): Express {
  const app = express();

  // CORS: local frontends plus an optional deployed origin
  const allowedOrigins = ['http://localhost:3000', 'http://localhost:3001'];
  if (config.corsAllowedOrigin) {
    allowedOrigins.push(config.corsAllowedOrigin);
  }
  app.use(
    cors({
      origin: allowedOrigins,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Correlation-ID'],
      exposedHeaders: ['X-Correlation-ID'],
      maxAge: 86400,
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, _res, next) => {
    console.info(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });
    next();
  });

  app.get('/', (_req, res: Response) => {
    res.status(200).json({ message: 'Payment Classifier API root' });
  });

  // Health check endpoint (Cloud Run probes)
  app.get('/healthz', (_req, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/v1', createClassificationRoutes(classifier, config.validModels));

  // 404 handler
  app.use((_req, res: Response) => {
    const response: ApiErrorResponse = {
      success: false,
      error: { code: 'NOT_FOUND', message: 'The requested resource does not exist' },
    };
    res.status(404).json(response);
  });

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const response: ApiErrorResponse = {
        success: false,
        error: { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
      };
      res.status(400).json(response);
      return;
    }

    console.error('Unhandled error:', err);
    const response: ApiErrorResponse = {
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    };
    res.status(500).json(response);
  });

  return app;
}

// body-parser tags its errors with a `type`
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}
