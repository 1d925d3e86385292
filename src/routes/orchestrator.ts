/**
 * orchestrator.ts
 * Orchestrator API routes
 */

import { Router, type NextFunction, type Request, type Response } from 'express';

import type { SecurityConfig } from '../config/schema.js';
import { handleGenerate } from '../controllers/generateController.js';
import { clearLogs, getLogs } from '../controllers/logsController.js';
import { getServers, getServersHealth } from '../controllers/serversController.js';
import { createGenerateRateLimiter } from '../middleware/rateLimiter.js';
import { generateRequestSchema, validateBody } from '../middleware/validation.js';
import type { DisaggregatedOrchestrator } from '../orchestrator.js';

/**
 * Wrap async route handlers to catch errors and pass them to Express error handling
 */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res).catch(next);
  };
}

/**
 * Routes mounted under /api
 */
export function createApiRouter(
  orchestrator: DisaggregatedOrchestrator,
  security: SecurityConfig
): Router {
  const router = Router();

  // Generation
  router.post(
    '/generate',
    createGenerateRateLimiter(security),
    validateBody(generateRequestSchema),
    asyncHandler(handleGenerate(orchestrator))
  );

  // Servers
  router.get('/servers', getServers(orchestrator));
  router.get('/servers/health', asyncHandler(getServersHealth(orchestrator)));

  // Logs
  router.get('/logs', getLogs);
  router.post('/logs/clear', clearLogs);

  return router;
}
