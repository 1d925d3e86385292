/**
 * orchestrator.types.ts
 * Shared types for prefill/decode orchestration
 */

import type { InferenceErrorKind } from './utils/errorClassifier.js';

/** Which half of the pipeline a server runs. */
export type ServerRole = 'prefill' | 'decode';

/**
 * Serving technology behind a server.
 * - `tensor-cache`: exports its per-layer KV cache as a serialized payload
 * - `text-priming`: cannot export a cache; warms itself and echoes the prompt as context
 */
export type BackendKind = 'tensor-cache' | 'text-priming';

export interface ServerDescriptor {
  /** `host:port`, unique across the registry */
  readonly id: string;
  readonly host: string;
  readonly port: number;
  readonly modelType: string;
  readonly role: ServerRole;
  readonly backendKind: BackendKind;
  readonly baseUrl: string;
  /** Operator-facing name, shown by the status CLI */
  readonly label?: string;
}

export interface HealthStatus {
  serverId: string;
  healthy: boolean;
  checkedAt: number;
  responseTimeMs?: number;
  /** `status` field reported by the server, e.g. "healthy" or "loading" */
  status?: string;
  /** Model the server reports as loaded */
  model?: string | null;
  httpStatus?: number;
  errorKind?: InferenceErrorKind;
  error?: string;
}

export type HealthSnapshot = ReadonlyMap<string, HealthStatus>;

/**
 * Context handed from prefill to decode. Decode treats it as advisory: the
 * prompt is always sent alongside and is the authoritative input.
 */
export type ContextPayload =
  | { kind: 'tensor-cache'; data: string; byteLength: number }
  | { kind: 'text-priming'; text: string };

export interface PrefillResult {
  serverId: string;
  prompt: string;
  context: ContextPayload;
  promptTokenCount: number;
  prefillDurationSeconds: number;
  backendKind: BackendKind;
}

export interface GenerationResult {
  generatedText: string;
  tokensGenerated: number;
  decodeDurationSeconds: number;
  tokensPerSecond: number;
}

export interface SingleNodeResult {
  responseText: string;
  generationTimeSeconds: number;
}

export interface SamplingParams {
  maxTokens: number;
  temperature: number;
}

export type GenerationMethod = 'disaggregated' | 'singleNodeFallback' | 'failed';

export type PipelineStage = 'selection' | 'prefill' | 'decode' | 'fallback';

export interface StageFailure {
  stage: PipelineStage;
  kind: InferenceErrorKind;
  message: string;
  serverId?: string;
}

export interface StageTiming {
  prefillTime: number;
  decodeTime: number;
  totalTime: number;
  tokensPerSecond: number;
}

export interface RequestOutcome extends StageTiming {
  responseText: string;
  method: GenerationMethod;
  prefillServerId?: string;
  decodeServerId?: string;
  errorMessage?: string;
  /** Seconds spent in generate(), health refresh included */
  wallTime: number;
  /** Every degradation step taken on the way to this outcome, in order */
  failures: StageFailure[];
}
