/**
 * decode-client.ts
 * Client for the decode stage
 */

import { encodeContext } from '../backends.js';
import { API_ENDPOINTS } from '../constants/index.js';
import { tokensPerSecond } from '../metrics/metrics-aggregator.js';
import type {
  GenerationResult,
  PrefillResult,
  SamplingParams,
  ServerDescriptor,
} from '../orchestrator.types.js';
import { settle, type CallResult } from '../utils/errorClassifier.js';
import { requestJson } from '../utils/fetchWithTimeout.js';
import { logger } from '../utils/logger.js';
import { Timer } from '../utils/timer.js';

import { decodeResponseSchema } from './schemas.js';

export interface DecodeClientOptions {
  timeoutMs: number;
}

export class DecodeClient {
  private readonly timeoutMs: number;

  constructor(options: DecodeClientOptions) {
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * POST /decode with the prompt and the prefill context.
   *
   * A decode backend generally cannot load a cache written by a different
   * technology, so the prompt is the authoritative input and the context is
   * passed along as a hint.
   */
  async decode(
    server: ServerDescriptor,
    prefill: PrefillResult,
    prompt: string,
    params: SamplingParams
  ): Promise<CallResult<GenerationResult>> {
    if (prefill.context.kind !== server.backendKind) {
      logger.debug(
        `Decode server ${server.id} runs ${server.backendKind}; ${prefill.context.kind} context is advisory`
      );
    }

    const timer = new Timer();

    const result = await settle(async (): Promise<GenerationResult> => {
      const body = await requestJson(`${server.baseUrl}${API_ENDPOINTS.BACKEND.DECODE}`, {
        method: 'POST',
        body: {
          prompt,
          context: encodeContext(prefill.context),
          maxNewTokens: params.maxTokens,
          temperature: params.temperature,
        },
        timeout: this.timeoutMs,
        schema: decodeResponseSchema,
      });

      const decodeDurationSeconds = body.decodeTime ?? timer.elapsedSeconds();
      return {
        generatedText: body.generatedText,
        tokensGenerated: body.tokensGenerated,
        decodeDurationSeconds,
        tokensPerSecond:
          body.tokensPerSec ?? tokensPerSecond(body.tokensGenerated, decodeDurationSeconds),
      };
    });

    if (result.ok) {
      logger.debug(`Decode on ${server.id} completed`, {
        tokens: result.value.tokensGenerated,
        decodeTime: result.value.decodeDurationSeconds,
      });
    } else {
      logger.warn(`Decode on ${server.id} failed: ${result.error.message}`, {
        kind: result.error.kind,
      });
    }

    return result;
  }
}
