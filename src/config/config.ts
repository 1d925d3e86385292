/**
 * config.ts
 * Configuration loading: file (JSON or YAML), environment overrides, schema validation
 */

import { existsSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';

import { logger } from '../utils/logger.js';

import { applyEnvOverrides } from './envMapper.js';
import { validateConfig, type OrchestratorConfig, type OrchestratorConfigInput } from './schema.js';

export const DEFAULT_CONFIG_PATH = './config/orchestrator.json';

export const DEFAULT_CONFIG: OrchestratorConfig = validateConfig({});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a configuration file without validating it
 */
export async function readConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const resolvedPath = path.resolve(filePath);
  const content = await fs.readFile(resolvedPath, 'utf-8');
  const ext = path.extname(resolvedPath).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(content) as unknown;
  } else if (ext === '.yaml' || ext === '.yml') {
    // Dynamic import to avoid loading yaml if not used
    const yaml = await import('js-yaml');
    parsed = yaml.load(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}. Use .json, .yaml, or .yml`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new Error(`Configuration file ${resolvedPath} must contain an object`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  /** Explicit file; falls back to ORCHESTRATOR_CONFIG, then DEFAULT_CONFIG_PATH when it exists */
  filePath?: string;
  /** Applied over the file contents, before environment overrides */
  overrides?: OrchestratorConfigInput;
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(
  filePath: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  if (filePath) {
    return filePath;
  }
  if (env.ORCHESTRATOR_CONFIG) {
    return env.ORCHESTRATOR_CONFIG;
  }
  return existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined;
}

/**
 * Build the effective configuration
 * @throws ConfigValidationError when the merged configuration does not satisfy the schema
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<OrchestratorConfig> {
  const env = options.env ?? process.env;
  const configPath = resolveConfigPath(options.filePath, env);

  let raw: Record<string, unknown> = {};
  if (configPath) {
    try {
      raw = await readConfigFile(configPath);
      logger.info(`Configuration loaded from ${path.resolve(configPath)}`);
    } catch (error) {
      logger.error(`Failed to load configuration from ${configPath}:`, { error });
      throw error;
    }
  }

  const merged = applyEnvOverrides({ ...raw, ...options.overrides }, env);
  return validateConfig(merged);
}
