/**
 * envMapper.ts
 * Maps environment variables to configuration paths
 */

import { logger } from '../utils/logger.js';

/**
 * Environment variable to config path mapping
 * Format: ENV_VAR_NAME: 'nested.config.path'
 */
export const ENV_CONFIG_MAPPING: Record<string, string> = {
  // Server settings
  ORCHESTRATOR_PORT: 'port',
  ORCHESTRATOR_HOST: 'host',
  ORCHESTRATOR_LOG_LEVEL: 'logLevel',

  // Health probes
  ORCHESTRATOR_HC_TIMEOUT: 'healthCheck.timeoutMs',

  // Stage deadlines
  ORCHESTRATOR_PREFILL_TIMEOUT: 'timeouts.prefillMs',
  ORCHESTRATOR_DECODE_TIMEOUT: 'timeouts.decodeMs',
  ORCHESTRATOR_GENERATE_TIMEOUT: 'timeouts.generateMs',

  // Generation defaults
  ORCHESTRATOR_DEFAULT_MAX_TOKENS: 'generation.defaultMaxTokens',
  ORCHESTRATOR_DEFAULT_TEMPERATURE: 'generation.defaultTemperature',

  // Security settings
  ORCHESTRATOR_CORS_ORIGINS: 'security.corsOrigins',
  ORCHESTRATOR_RATE_LIMIT_WINDOW: 'security.rateLimitWindowMs',
  ORCHESTRATOR_RATE_LIMIT_MAX: 'security.rateLimitMax',
};

// Paths whose schema expects a list even when the variable holds a single value
const ARRAY_PATHS = new Set(['security.corsOrigins']);

type EnvValue = string | number | boolean | string[] | number[];

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): EnvValue {
  if (value.toLowerCase() === 'true') {
    return true;
  }
  if (value.toLowerCase() === 'false') {
    return false;
  }

  if (/^-?\d+$/.test(value)) {
    return parseInt(value, 10);
  }
  if (/^-?\d+\.\d+$/.test(value)) {
    return parseFloat(value);
  }

  // Comma-separated lists
  if (value.includes(',')) {
    const items = value.split(',').map(s => s.trim());
    if (items.every(item => /^-?\d+$/.test(item))) {
      return items.map(item => parseInt(item, 10));
    }
    return items;
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value by path, copying every object on the way so the input is left untouched
 */
function setNestedValue(
  obj: Record<string, unknown>,
  path: string,
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path.split('.');
  if (rest.length === 0) {
    return { ...obj, [head]: value };
  }
  const child = obj[head];
  return {
    ...obj,
    [head]: setNestedValue(isRecord(child) ? child : {}, rest.join('.'), value),
  };
}

/**
 * Apply environment variable overrides to config
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  let result = { ...config };
  let appliedCount = 0;

  for (const [envVar, configPath] of Object.entries(ENV_CONFIG_MAPPING)) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') {
      continue;
    }
    let parsedValue: EnvValue = parseEnvValue(raw);
    if (ARRAY_PATHS.has(configPath) && !Array.isArray(parsedValue)) {
      parsedValue = [String(parsedValue)];
    }
    result = setNestedValue(result, configPath, parsedValue);
    appliedCount++;
    logger.debug(`Applied config override from env: ${envVar} -> ${configPath}`);
  }

  if (appliedCount > 0) {
    logger.info(`Applied ${appliedCount} configuration overrides from environment variables`);
  }

  return result;
}
