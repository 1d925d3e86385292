/**
 * metrics-aggregator.ts
 * Per-request timing derived from stage results
 *
 * Nothing here outlives a request: cross-request averages belong to whatever
 * consumes the outcomes, not to the orchestrator.
 */

import type {
  GenerationResult,
  PrefillResult,
  SingleNodeResult,
  StageTiming,
} from '../orchestrator.types.js';

export function tokensPerSecond(tokens: number, seconds: number): number {
  if (seconds <= 0 || tokens <= 0) {
    return 0;
  }
  return tokens / seconds;
}

export function disaggregatedTiming(
  prefill: PrefillResult,
  generation: GenerationResult
): StageTiming {
  const prefillTime = prefill.prefillDurationSeconds;
  const decodeTime = generation.decodeDurationSeconds;
  return {
    prefillTime,
    decodeTime,
    totalTime: prefillTime + decodeTime,
    tokensPerSecond: generation.tokensPerSecond,
  };
}

/**
 * The single-node path reports one generation time and no token count
 */
export function singleNodeTiming(result: SingleNodeResult): StageTiming {
  return {
    prefillTime: 0,
    decodeTime: 0,
    totalTime: result.generationTimeSeconds,
    tokensPerSecond: 0,
  };
}

export function emptyTiming(): StageTiming {
  return { prefillTime: 0, decodeTime: 0, totalTime: 0, tokensPerSecond: 0 };
}
