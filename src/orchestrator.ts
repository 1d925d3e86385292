/**
 * orchestrator.ts
 * Disaggregated Orchestrator - prefill/decode routing with single-node fallback
 */

import { DecodeClient } from './clients/decode-client.js';
import { PrefillClient } from './clients/prefill-client.js';
import { SingleNodeClient } from './clients/single-node-client.js';
import type { OrchestratorConfig } from './config/schema.js';
import { ERROR_MESSAGES } from './constants/index.js';
import { HealthMonitor } from './health-monitor.js';
import {
  disaggregatedTiming,
  emptyTiming,
  singleNodeTiming,
} from './metrics/metrics-aggregator.js';
import type {
  HealthSnapshot,
  RequestOutcome,
  SamplingParams,
  StageFailure,
} from './orchestrator.types.js';
import { ServerRegistry } from './server-registry.js';
import { ServerSelector } from './server-selector.js';
import { toInferenceError } from './utils/errorClassifier.js';
import { logger } from './utils/logger.js';
import { Timer } from './utils/timer.js';

/**
 * Collaborators built from configuration unless supplied
 */
export interface OrchestratorDeps {
  registry?: ServerRegistry;
  healthMonitor?: HealthMonitor;
  prefillClient?: PrefillClient;
  decodeClient?: DecodeClient;
  singleNodeClient?: SingleNodeClient;
}

type PartialOutcome = Omit<RequestOutcome, 'wallTime' | 'failures'>;

export class DisaggregatedOrchestrator {
  readonly registry: ServerRegistry;
  readonly healthMonitor: HealthMonitor;
  private readonly selector: ServerSelector;
  private readonly prefillClient: PrefillClient;
  private readonly decodeClient: DecodeClient;
  private readonly singleNodeClient: SingleNodeClient;
  private readonly config: OrchestratorConfig;

  constructor(config: OrchestratorConfig, deps: OrchestratorDeps = {}) {
    this.config = config;
    this.registry = deps.registry ?? ServerRegistry.fromConfig(config.servers);
    this.healthMonitor = deps.healthMonitor ?? new HealthMonitor(this.registry, config.healthCheck);
    this.selector = new ServerSelector(this.registry);
    this.prefillClient =
      deps.prefillClient ?? new PrefillClient({ timeoutMs: config.timeouts.prefillMs });
    this.decodeClient =
      deps.decodeClient ?? new DecodeClient({ timeoutMs: config.timeouts.decodeMs });
    this.singleNodeClient =
      deps.singleNodeClient ?? new SingleNodeClient({ timeoutMs: config.timeouts.generateMs });

    logger.info(
      `Orchestrator initialized with ${this.registry.list('prefill').length} prefill and ${this.registry.list('decode').length} decode servers`
    );
  }

  /**
   * Generate a completion for `prompt` on servers of `modelType`.
   *
   * Tries prefill on one server and decode on another; when that is not
   * possible or either stage fails, falls back to a full generation on a
   * single decode server. Never rejects: every failure ends up in the
   * returned outcome.
   */
  async generate(
    prompt: string,
    modelType: string,
    maxTokens?: number,
    temperature?: number
  ): Promise<RequestOutcome> {
    const timer = new Timer();
    const failures: StageFailure[] = [];
    const params: SamplingParams = {
      maxTokens: maxTokens ?? this.config.generation.defaultMaxTokens,
      temperature: temperature ?? this.config.generation.defaultTemperature,
    };

    let outcome: PartialOutcome;
    try {
      outcome = await this.runPipeline(prompt, modelType, params, failures);
    } catch (error) {
      const failure = toInferenceError(error);
      logger.error(`Unexpected error while generating for '${modelType}': ${failure.message}`, {
        kind: failure.kind,
      });
      failures.push({ stage: 'fallback', kind: failure.kind, message: failure.message });
      outcome = this.failedOutcome(ERROR_MESSAGES.ALL_TIERS_FAILED);
    }

    return { ...outcome, wallTime: timer.elapsedSeconds(), failures };
  }

  private async runPipeline(
    prompt: string,
    modelType: string,
    params: SamplingParams,
    failures: StageFailure[]
  ): Promise<PartialOutcome> {
    const health = await this.healthMonitor.refresh();

    const prefillServer = this.selector.pick('prefill', modelType, health);
    const decodeServer = this.selector.pick('decode', modelType, health);

    if (!prefillServer || !decodeServer) {
      this.recordFailure(failures, {
        stage: 'selection',
        kind: 'no-healthy-server',
        message: ERROR_MESSAGES.NO_HEALTHY_PAIR(modelType),
      });
      return this.fallback(prompt, modelType, params, health, failures);
    }

    logger.info(`Disaggregated route for '${modelType}': ${prefillServer.id} -> ${decodeServer.id}`);

    const prefill = await this.prefillClient.prefill(prefillServer, prompt);
    if (!prefill.ok) {
      this.recordFailure(failures, {
        stage: 'prefill',
        kind: prefill.error.kind,
        message: prefill.error.message,
        serverId: prefillServer.id,
      });
      return this.fallback(prompt, modelType, params, health, failures);
    }

    const generation = await this.decodeClient.decode(decodeServer, prefill.value, prompt, params);
    if (!generation.ok) {
      this.recordFailure(failures, {
        stage: 'decode',
        kind: generation.error.kind,
        message: generation.error.message,
        serverId: decodeServer.id,
      });
      return this.fallback(prompt, modelType, params, health, failures);
    }

    return {
      responseText: generation.value.generatedText,
      method: 'disaggregated',
      prefillServerId: prefillServer.id,
      decodeServerId: decodeServer.id,
      ...disaggregatedTiming(prefill.value, generation.value),
    };
  }

  /**
   * Single-node generation on the first healthy decode server of the
   * snapshot taken at the start of the request
   */
  private async fallback(
    prompt: string,
    modelType: string,
    params: SamplingParams,
    health: HealthSnapshot,
    failures: StageFailure[]
  ): Promise<PartialOutcome> {
    const server = this.selector.pick('decode', modelType, health);
    if (!server) {
      this.recordFailure(failures, {
        stage: 'fallback',
        kind: 'no-healthy-server',
        message: ERROR_MESSAGES.NO_HEALTHY_DECODE(modelType),
      });
      logger.error(`${ERROR_MESSAGES.NO_SERVERS_AVAILABLE} for '${modelType}'`);
      return this.failedOutcome(ERROR_MESSAGES.NO_SERVERS_AVAILABLE);
    }

    logger.info(`Single-node fallback for '${modelType}' on ${server.id}`);

    const result = await this.singleNodeClient.generate(server, prompt, params);
    if (!result.ok) {
      this.recordFailure(failures, {
        stage: 'fallback',
        kind: result.error.kind,
        message: result.error.message,
        serverId: server.id,
      });
      logger.error(`${ERROR_MESSAGES.ALL_TIERS_FAILED} for '${modelType}'`);
      return this.failedOutcome(ERROR_MESSAGES.ALL_TIERS_FAILED);
    }

    return {
      responseText: result.value.responseText,
      method: 'singleNodeFallback',
      decodeServerId: server.id,
      ...singleNodeTiming(result.value),
    };
  }

  private failedOutcome(errorMessage: string): PartialOutcome {
    return {
      responseText: '',
      method: 'failed',
      errorMessage,
      ...emptyTiming(),
    };
  }

  private recordFailure(failures: StageFailure[], failure: StageFailure): void {
    failures.push(failure);
    logger.warn(`Degrading after ${failure.stage} failure: ${failure.message}`, {
      kind: failure.kind,
      ...(failure.serverId ? { serverId: failure.serverId } : {}),
    });
  }
}
