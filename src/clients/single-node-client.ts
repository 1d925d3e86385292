/**
 * single-node-client.ts
 * Client for a full generation on one decode server, used by the fallback tier
 */

import { API_ENDPOINTS } from '../constants/index.js';
import type { SamplingParams, ServerDescriptor, SingleNodeResult } from '../orchestrator.types.js';
import { settle, type CallResult } from '../utils/errorClassifier.js';
import { requestJson } from '../utils/fetchWithTimeout.js';
import { logger } from '../utils/logger.js';
import { Timer } from '../utils/timer.js';

import { generateResponseSchema } from './schemas.js';

export interface SingleNodeClientOptions {
  timeoutMs: number;
}

export class SingleNodeClient {
  private readonly timeoutMs: number;

  constructor(options: SingleNodeClientOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  /** POST /generate. No disaggregation, no retry. */
  async generate(
    server: ServerDescriptor,
    prompt: string,
    params: SamplingParams
  ): Promise<CallResult<SingleNodeResult>> {
    const timer = new Timer();

    const result = await settle(async (): Promise<SingleNodeResult> => {
      const body = await requestJson(`${server.baseUrl}${API_ENDPOINTS.BACKEND.GENERATE}`, {
        method: 'POST',
        body: {
          prompt,
          maxTokens: params.maxTokens,
          temperature: params.temperature,
        },
        timeout: this.timeoutMs,
        schema: generateResponseSchema,
      });

      return {
        responseText: body.response,
        generationTimeSeconds: body.generationTime ?? timer.elapsedSeconds(),
      };
    });

    if (!result.ok) {
      logger.warn(`Single-node generation on ${server.id} failed: ${result.error.message}`, {
        kind: result.error.kind,
      });
    }

    return result;
  }
}
