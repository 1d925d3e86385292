/**
 * health-monitor.ts
 * Concurrent /health probes across every registered server
 *
 * Probes run on demand, once per logical request, rather than on a timer:
 * large models get evicted between requests, so a cached "healthy" can point
 * work at a server that has silently dropped its model.
 */

import { healthResponseSchema } from './clients/schemas.js';
import type { HealthCheckConfig } from './config/schema.js';
import { API_ENDPOINTS } from './constants/index.js';
import type { HealthSnapshot, HealthStatus, ServerDescriptor } from './orchestrator.types.js';
import type { ServerRegistry } from './server-registry.js';
import { toInferenceError } from './utils/errorClassifier.js';
import { requestJson } from './utils/fetchWithTimeout.js';
import { logger } from './utils/logger.js';
import { Timer } from './utils/timer.js';

export interface HealthCheckMetrics {
  totalChecks: number;
  successfulChecks: number;
  failedChecks: number;
  averageResponseTime: number;
  lastCheckTime: number;
}

export class HealthMonitor {
  private readonly registry: ServerRegistry;
  private readonly config: HealthCheckConfig;
  private latest?: HealthSnapshot;
  private metrics: HealthCheckMetrics = {
    totalChecks: 0,
    successfulChecks: 0,
    failedChecks: 0,
    averageResponseTime: 0,
    lastCheckTime: 0,
  };

  constructor(registry: ServerRegistry, config: HealthCheckConfig) {
    this.registry = registry;
    this.config = config;
  }

  /**
   * Probe every registered server in parallel.
   * Never rejects; the snapshot has one entry per registered server.
   */
  async refresh(): Promise<HealthSnapshot> {
    const servers = this.registry.list();
    const results = await Promise.all(servers.map(server => this.checkServerHealth(server)));

    const snapshot: HealthSnapshot = new Map(results.map(status => [status.serverId, status]));
    this.latest = snapshot;

    const healthyCount = results.filter(r => r.healthy).length;
    logger.debug(`Health refresh: ${healthyCount}/${results.length} servers healthy`);

    return snapshot;
  }

  /**
   * Probe one server. Healthy only on HTTP 200 with `loaded: true`.
   */
  async checkServerHealth(server: ServerDescriptor): Promise<HealthStatus> {
    const timer = new Timer();

    try {
      const body = await requestJson(`${server.baseUrl}${API_ENDPOINTS.BACKEND.HEALTH}`, {
        timeout: this.config.timeoutMs,
        schema: healthResponseSchema,
      });

      const status: HealthStatus = {
        serverId: server.id,
        healthy: body.loaded,
        checkedAt: Date.now(),
        responseTimeMs: timer.elapsed(),
        status: body.status,
        model: body.model,
        httpStatus: 200,
      };

      if (!body.loaded) {
        logger.debug(`Server ${server.id} is up but has no model loaded`, {
          status: body.status,
        });
      }

      this.updateMetrics(status);
      return status;
    } catch (error) {
      const failure = toInferenceError(error);
      logger.warn(`Health check failed for ${server.id}: ${failure.message}`, {
        kind: failure.kind,
      });

      const status: HealthStatus = {
        serverId: server.id,
        healthy: false,
        checkedAt: Date.now(),
        responseTimeMs: timer.elapsed(),
        httpStatus: failure.status,
        errorKind: failure.kind,
        error: failure.message,
      };

      this.updateMetrics(status);
      return status;
    }
  }

  /**
   * Most recent snapshot, for observability only; routing always uses a fresh refresh
   */
  getLatestSnapshot(): HealthSnapshot | undefined {
    return this.latest;
  }

  getMetrics(): HealthCheckMetrics {
    return { ...this.metrics };
  }

  private updateMetrics(status: HealthStatus): void {
    this.metrics.totalChecks++;
    this.metrics.lastCheckTime = status.checkedAt;

    if (status.healthy) {
      this.metrics.successfulChecks++;
    } else {
      this.metrics.failedChecks++;
    }

    const responseTime = status.responseTimeMs ?? 0;
    const n = this.metrics.totalChecks;
    this.metrics.averageResponseTime =
      (this.metrics.averageResponseTime * (n - 1) + responseTime) / n;
  }
}
