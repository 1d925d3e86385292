/**
 * prefill-client.ts
 * Client for the prefill stage
 */

import { backendFor } from '../backends.js';
import { API_ENDPOINTS } from '../constants/index.js';
import type { PrefillResult, ServerDescriptor } from '../orchestrator.types.js';
import { settle, type CallResult } from '../utils/errorClassifier.js';
import { requestJson } from '../utils/fetchWithTimeout.js';
import { logger } from '../utils/logger.js';
import { Timer } from '../utils/timer.js';

import { prefillResponseSchema } from './schemas.js';

export interface PrefillClientOptions {
  timeoutMs: number;
}

export class PrefillClient {
  private readonly timeoutMs: number;

  constructor(options: PrefillClientOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * POST /prefill. The server's backend kind decides how the returned context is read:
   * a base64 KV cache for tensor-cache servers, the echoed prompt for text-priming ones.
   *
   * Any failure is returned, not thrown, and never retried.
   */
  async prefill(server: ServerDescriptor, prompt: string): Promise<CallResult<PrefillResult>> {
    const backend = backendFor(server.backendKind);
    const timer = new Timer();

    const result = await settle(async (): Promise<PrefillResult> => {
      const body = await requestJson(`${server.baseUrl}${API_ENDPOINTS.BACKEND.PREFILL}`, {
        method: 'POST',
        body: { prompt },
        timeout: this.timeoutMs,
        schema: prefillResponseSchema,
      });

      return {
        serverId: server.id,
        prompt,
        context: backend.readContext(body.context, prompt),
        promptTokenCount: body.metrics.promptEvalCount,
        prefillDurationSeconds: body.metrics.prefillTimeS ?? timer.elapsedSeconds(),
        backendKind: backend.kind,
      };
    });

    if (result.ok) {
      logger.debug(`Prefill on ${server.id} completed`, {
        backend: backend.kind,
        promptTokens: result.value.promptTokenCount,
        prefillTime: result.value.prefillDurationSeconds,
      });
    } else {
      logger.warn(`Prefill on ${server.id} failed: ${result.error.message}`, {
        kind: result.error.kind,
      });
    }

    return result;
  }
}
