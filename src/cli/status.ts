/**
 * status.ts
 * Health report for every configured server, grouped by role
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

import type { OrchestratorConfig } from '../config/schema.js';
import { HealthMonitor } from '../health-monitor.js';
import type {
  HealthSnapshot,
  HealthStatus,
  ServerDescriptor,
  ServerRole,
} from '../orchestrator.types.js';
import { ServerRegistry } from '../server-registry.js';

export type SystemState = 'ready' | 'prefill-degraded' | 'decode-degraded' | 'unavailable';

export const SUMMARY_MESSAGES: Record<SystemState, string> = {
  ready: 'All servers healthy: disaggregated inference ready',
  'prefill-degraded': 'Prefill tier degraded: requests will fall back to single-node generation',
  'decode-degraded': 'Decode tier degraded: some requests cannot complete',
  unavailable: 'No complete tier available',
};

export const NO_SERVERS_WARNING = 'No servers configured';

const ROLE_TITLES: Record<ServerRole, string> = {
  prefill: 'PREFILL SERVERS',
  decode: 'DECODE SERVERS',
};

/**
 * Short human-readable state of one probe
 */
export function statusText(status: HealthStatus | undefined): string {
  if (!status) {
    return 'Not checked';
  }
  if (status.healthy) {
    return status.model ? `Healthy (${status.model})` : 'Healthy';
  }
  switch (status.errorKind) {
    case 'timeout':
      return 'Timeout';
    case 'network-unreachable':
      return 'Connection failed';
    case 'non-success-status':
      return status.httpStatus ? `HTTP ${status.httpStatus}` : 'Error response';
    case 'malformed-response':
      return 'Malformed response';
    default:
      return status.status ? `Not loaded (${status.status})` : 'Not loaded';
  }
}

function allHealthy(servers: readonly ServerDescriptor[], snapshot: HealthSnapshot): boolean {
  return servers.every(s => snapshot.get(s.id)?.healthy === true);
}

export function systemState(registry: ServerRegistry, snapshot: HealthSnapshot): SystemState {
  const prefill = registry.list('prefill');
  const decode = registry.list('decode');
  const prefillHealthy = allHealthy(prefill, snapshot);
  const decodeHealthy = allHealthy(decode, snapshot);

  if (prefillHealthy && decodeHealthy) {
    return 'ready';
  }
  if (decodeHealthy && decode.length > 0) {
    return 'prefill-degraded';
  }
  if (prefillHealthy && prefill.length > 0) {
    return 'decode-degraded';
  }
  return 'unavailable';
}

/** 0 when every configured server is healthy, including when none are configured. */
export function exitCodeFor(registry: ServerRegistry, snapshot: HealthSnapshot): number {
  return allHealthy(registry.list(), snapshot) ? 0 : 1;
}

function formatTable(
  servers: readonly ServerDescriptor[],
  snapshot: HealthSnapshot,
  chalk: ChalkInstance
): string[] {
  const header = ['NAME', 'ADDRESS', 'MODEL', 'BACKEND', 'STATUS'];
  const rows = servers.map(server => [
    server.label ?? server.id,
    server.id,
    server.modelType,
    server.backendKind,
    statusText(snapshot.get(server.id)),
  ]);

  const widths = header.map((title, col) =>
    Math.max(title.length, ...rows.map(row => row[col]?.length ?? 0))
  );
  const pad = (cells: string[]): string =>
    cells.map((cell, col) => cell.padEnd(widths[col] ?? 0)).join('  ').trimEnd();

  return [
    chalk.bold(pad(header)),
    ...rows.map((row, i) => {
      const line = pad(row);
      const server = servers[i];
      const healthy = server ? snapshot.get(server.id)?.healthy === true : false;
      return healthy ? chalk.green(line) : chalk.red(line);
    }),
  ];
}

/**
 * Render the report as lines of text
 */
export function formatStatusReport(
  registry: ServerRegistry,
  snapshot: HealthSnapshot,
  chalk: ChalkInstance
): string[] {
  if (registry.size === 0) {
    return [chalk.yellow(NO_SERVERS_WARNING)];
  }

  const lines: string[] = [];
  for (const role of ['prefill', 'decode'] as const) {
    const servers = registry.list(role);
    lines.push(chalk.cyan(ROLE_TITLES[role]));
    if (servers.length === 0) {
      lines.push('  (none)');
    } else {
      lines.push(...formatTable(servers, snapshot, chalk));
    }
    lines.push('');
  }

  const state = systemState(registry, snapshot);
  const message = SUMMARY_MESSAGES[state];
  lines.push(state === 'ready' ? chalk.green(message) : chalk.yellow(message));
  return lines;
}

export interface RunStatusOptions {
  config: OrchestratorConfig;
  json?: boolean;
  color?: boolean;
  write?: (line: string) => void;
  /** Defaults to one built from `config` */
  healthMonitor?: HealthMonitor;
}

/**
 * Probe every configured server once and print the report.
 * Resolves to the process exit code.
 */
export async function runStatus(options: RunStatusOptions): Promise<number> {
  const write = options.write ?? ((line: string) => console.log(line));
  const registry = ServerRegistry.fromConfig(options.config.servers);
  const monitor = options.healthMonitor ?? new HealthMonitor(registry, options.config.healthCheck);

  const snapshot = await monitor.refresh();

  if (options.json) {
    write(
      JSON.stringify(
        {
          state: registry.size === 0 ? null : systemState(registry, snapshot),
          servers: registry.list().map(server => ({
            ...server,
            health: snapshot.get(server.id) ?? null,
          })),
        },
        null,
        2
      )
    );
  } else {
    const colors = options.color === false ? new Chalk({ level: 0 }) : chalk;
    for (const line of formatStatusReport(registry, snapshot, colors)) {
      write(line);
    }
  }

  return exitCodeFor(registry, snapshot);
}
