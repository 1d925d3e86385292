/**
 * api-endpoints.ts
 * Endpoint constants for the backend contract and the orchestrator's own API
 */

export const API_ENDPOINTS = {
  BACKEND: {
    HEALTH: '/health',
    PREFILL: '/prefill',
    DECODE: '/decode',
    GENERATE: '/generate',
  },
  ORCHESTRATOR: {
    GENERATE: '/api/generate',
    SERVERS: '/api/servers',
    SERVERS_HEALTH: '/api/servers/health',
    LOGS: '/api/logs',
    LOGS_CLEAR: '/api/logs/clear',
    HEALTH: '/health',
  },
} as const;

export type BackendEndpoint = (typeof API_ENDPOINTS.BACKEND)[keyof typeof API_ENDPOINTS.BACKEND];
