/**
 * app.ts
 * Express application wired to an orchestrator instance
 */

import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

import type { OrchestratorConfig } from './config/schema.js';
import { ERROR_MESSAGES } from './constants/index.js';
import type { DisaggregatedOrchestrator } from './orchestrator.js';
import { createApiRouter } from './routes/orchestrator.js';
import { logger } from './utils/logger.js';

/** Errors raised by body-parser and other middleware carry an HTTP status */
type HttpError = Error & { status?: number; statusCode?: number };

function clientErrorStatus(err: HttpError): number | undefined {
  const status = err.status ?? err.statusCode;
  return status !== undefined && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(
  orchestrator: DisaggregatedOrchestrator,
  config: OrchestratorConfig
): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  const origins = config.security.corsOrigins;
  app.use(cors({ origin: origins.includes('*') ? '*' : origins }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.use('/api', createApiRouter(orchestrator, config.security));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      servers: {
        prefill: orchestrator.registry.list('prefill').length,
        decode: orchestrator.registry.list('decode').length,
      },
    });
  });

  // Error handler
  app.use(
    (
      err: HttpError,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      const status = clientErrorStatus(err);
      if (status !== undefined) {
        logger.warn(`Rejected request: ${err.message}`, { status });
        res.status(status).json({
          error:
            status === 400 ? ERROR_MESSAGES.VALIDATION_FAILED : ERROR_MESSAGES.REQUEST_REJECTED,
          details: err.message,
        });
        return;
      }

      logger.error('Unhandled error:', { error: err });
      res.status(500).json({
        error: ERROR_MESSAGES.INTERNAL_SERVER_ERROR,
        details: err?.message ?? 'Unknown error',
      });
    }
  );

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: ERROR_MESSAGES.NOT_FOUND });
  });

  return app;
}
