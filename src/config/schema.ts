/**
 * schema.ts
 * Centralized Zod configuration schema with validation
 */

import { z } from 'zod';

/**
 * One prefill or decode server
 */
export const serverEntrySchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  modelType: z.string().min(1),
  backendKind: z.enum(['tensor-cache', 'text-priming']).default('text-priming'),
  label: z.string().min(1).optional(),
});

/**
 * Static server lists per role, in registration order
 */
export const serversConfigSchema = z.object({
  prefill: z.array(serverEntrySchema).default([]),
  decode: z.array(serverEntrySchema).default([]),
});

export const healthCheckConfigSchema = z.object({
  timeoutMs: z.number().int().min(1).default(5000), // 5 seconds
});

/**
 * Per-stage request deadlines
 */
export const timeoutsConfigSchema = z.object({
  prefillMs: z.number().int().min(1).default(30000),
  decodeMs: z.number().int().min(1).default(60000),
  generateMs: z.number().int().min(1).default(60000),
});

export const generationConfigSchema = z.object({
  defaultMaxTokens: z.number().int().min(1).default(100),
  defaultTemperature: z.number().min(0).max(2).default(0.2),
});

export const securityConfigSchema = z.object({
  corsOrigins: z.array(z.string()).default(['*']),
  rateLimitWindowMs: z.number().int().min(1000).default(60000), // 1 minute
  rateLimitMax: z.number().int().min(1).default(60),
});

/**
 * Main orchestrator configuration schema
 */
export const orchestratorConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(5200),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  servers: serversConfigSchema.default({}),
  healthCheck: healthCheckConfigSchema.default({}),
  timeouts: timeoutsConfigSchema.default({}),
  generation: generationConfigSchema.default({}),
  security: securityConfigSchema.default({}),
});

export type ServerEntryConfig = z.infer<typeof serverEntrySchema>;
export type ServersConfig = z.infer<typeof serversConfigSchema>;
export type HealthCheckConfig = z.infer<typeof healthCheckConfigSchema>;
export type TimeoutsConfig = z.infer<typeof timeoutsConfigSchema>;
export type GenerationConfig = z.infer<typeof generationConfigSchema>;
export type SecurityConfig = z.infer<typeof securityConfigSchema>;
export type OrchestratorConfig = z.infer<typeof orchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof orchestratorConfigSchema>;

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly errors: ValidationIssue[];

  constructor(errors: ValidationIssue[]) {
    super(
      `Configuration validation failed:\n${errors.map(e => `  ${e.path}: ${e.message}`).join('\n')}`
    );
    this.errors = errors;
    this.name = 'ConfigValidationError';
  }
}

/**
 * Validate configuration against schema, filling in defaults
 */
export function validateConfig(config: unknown): OrchestratorConfig {
  const result = orchestratorConfigSchema.safeParse(config);

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue: z.ZodIssue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }))
    );
  }

  return result.data;
}
