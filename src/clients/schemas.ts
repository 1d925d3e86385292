/**
 * schemas.ts
 * Response bodies of the prefill/decode server contract
 */

import { z } from 'zod';

export const healthResponseSchema = z.object({
  status: z.string().optional(),
  model: z.string().nullable().optional(),
  loaded: z.boolean(),
});

export const prefillResponseSchema = z.object({
  // Shape depends on the backend kind; interpreted by its capability
  context: z.unknown(),
  prompt: z.string().optional(),
  metrics: z
    .object({
      promptEvalCount: z.number().int().nonnegative().default(0),
      promptEvalDurationNs: z.number().nonnegative().default(0),
      prefillTimeS: z.number().nonnegative().optional(),
    })
    .default({}),
});

export const decodeResponseSchema = z.object({
  generatedText: z.string(),
  decodeTime: z.number().nonnegative().optional(),
  tokensGenerated: z.number().int().nonnegative().default(0),
  tokensPerSec: z.number().nonnegative().optional(),
});

export const generateResponseSchema = z.object({
  response: z.string(),
  generationTime: z.number().nonnegative().optional(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;
export type PrefillResponse = z.infer<typeof prefillResponseSchema>;
export type DecodeResponse = z.infer<typeof decodeResponseSchema>;
export type GenerateResponse = z.infer<typeof generateResponseSchema>;
