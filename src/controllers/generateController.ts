/**
 * generateController.ts
 * Disaggregated generation endpoint
 */

import type { Request, Response } from 'express';

import { ERROR_MESSAGES } from '../constants/index.js';
import type { GenerateRequest } from '../middleware/validation.js';
import type { DisaggregatedOrchestrator } from '../orchestrator.js';
import { logger } from '../utils/logger.js';

/**
 * POST /api/generate
 * Body is validated by `validateBody(generateRequestSchema)` before this runs.
 * Responds 503 when every tier failed; the outcome is the body either way.
 */
export function handleGenerate(orchestrator: DisaggregatedOrchestrator) {
  return async (req: Request, res: Response): Promise<void> => {
    const body: GenerateRequest = req.body;

    try {
      const outcome = await orchestrator.generate(
        body.prompt,
        body.modelType,
        body.maxTokens,
        body.temperature
      );

      logger.info(`Generation for '${body.modelType}' finished`, {
        method: outcome.method,
        totalTime: outcome.totalTime,
      });

      res.status(outcome.method === 'failed' ? 503 : 200).json(outcome);
    } catch (error) {
      logger.error('Generation handler failed:', { error });
      res.status(500).json({
        error: ERROR_MESSAGES.INTERNAL_SERVER_ERROR,
        details: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  };
}
