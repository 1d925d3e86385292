/**
 * index.ts
 * Main entry point for the Disaggregated Orchestrator
 */

import 'dotenv/config';

import { createApp } from './app.js';
import { loadConfig } from './config/config.js';
import { API_ENDPOINTS } from './constants/index.js';
import { DisaggregatedOrchestrator } from './orchestrator.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  logger.setLevel(config.logLevel);

  const orchestrator = new DisaggregatedOrchestrator(config);
  const app = createApp(orchestrator, config);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Disaggregated Orchestrator listening on ${config.host}:${config.port}`);
    logger.info(`API endpoints:`);
    logger.info(`  - Generation:   POST   ${API_ENDPOINTS.ORCHESTRATOR.GENERATE}`);
    logger.info(`  - Servers:      GET    ${API_ENDPOINTS.ORCHESTRATOR.SERVERS}`);
    logger.info(`  - Servers:      GET    ${API_ENDPOINTS.ORCHESTRATOR.SERVERS_HEALTH}`);
    logger.info(`  - Logging:      GET    ${API_ENDPOINTS.ORCHESTRATOR.LOGS}`);
    logger.info(`  - Logging:      POST   ${API_ENDPOINTS.ORCHESTRATOR.LOGS_CLEAR}`);
    logger.info(`  - Health check: GET    ${API_ENDPOINTS.ORCHESTRATOR.HEALTH}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, shutting down gracefully...`);

    // Stop accepting new connections; in-flight requests finish first
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start orchestrator:', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
