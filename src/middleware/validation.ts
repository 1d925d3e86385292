/**
 * validation.ts
 * Input validation middleware using Zod
 */

import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import { ERROR_MESSAGES } from '../constants/index.js';

/**
 * Middleware factory that validates the request body against a Zod schema
 * and replaces it with the parsed value
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const details = result.error.issues.map((issue: z.ZodIssue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));

      res.status(400).json({
        error: ERROR_MESSAGES.VALIDATION_FAILED,
        details,
      });
      return;
    }

    req.body = result.data;
    next();
  };
}

export const modelTypeSchema = z
  .string()
  .min(1, 'Model type is required')
  .max(200, 'Model type too long');

export const generateRequestSchema = z.object({
  prompt: z.string().min(1, 'Prompt is required').max(100000, 'Prompt too long'),
  modelType: modelTypeSchema,
  maxTokens: z.number().int().min(1).max(32768).optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type GenerateRequest = z.infer<typeof generateRequestSchema>;
