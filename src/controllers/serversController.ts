/**
 * serversController.ts
 * Read-only views of the configured servers and their health
 */

import type { Request, Response } from 'express';

import { ERROR_MESSAGES } from '../constants/index.js';
import type { DisaggregatedOrchestrator } from '../orchestrator.js';
import type { HealthSnapshot } from '../orchestrator.types.js';
import { logger } from '../utils/logger.js';

function snapshotToList(snapshot: HealthSnapshot) {
  return Array.from(snapshot.values());
}

/**
 * Get configured servers with the most recent health status, without probing
 * GET /api/servers
 */
export function getServers(orchestrator: DisaggregatedOrchestrator) {
  return (_req: Request, res: Response): void => {
    const latest = orchestrator.healthMonitor.getLatestSnapshot();
    const servers = orchestrator.registry.list().map(server => ({
      ...server,
      health: latest?.get(server.id) ?? null,
    }));

    res.json({
      servers,
      count: servers.length,
      lastCheckTime: orchestrator.healthMonitor.getMetrics().lastCheckTime || null,
    });
  };
}

/**
 * Probe every server now
 * GET /api/servers/health
 */
export function getServersHealth(orchestrator: DisaggregatedOrchestrator) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const snapshot = await orchestrator.healthMonitor.refresh();
      const statuses = snapshotToList(snapshot);

      res.json({
        servers: statuses,
        healthy: statuses.filter(s => s.healthy).length,
        total: statuses.length,
        metrics: orchestrator.healthMonitor.getMetrics(),
      });
    } catch (error) {
      logger.error('Health refresh failed:', { error });
      res.status(500).json({
        error: ERROR_MESSAGES.INTERNAL_SERVER_ERROR,
        details: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  };
}
