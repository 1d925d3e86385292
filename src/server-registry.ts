/**
 * server-registry.ts
 * Immutable list of prefill and decode servers, built once from configuration
 */

import { ERROR_MESSAGES } from './constants/index.js';
import {
  ConfigValidationError,
  type ServerEntryConfig,
  type ServersConfig,
} from './config/schema.js';
import type { ServerDescriptor, ServerRole } from './orchestrator.types.js';

export function createDescriptor(entry: ServerEntryConfig, role: ServerRole): ServerDescriptor {
  const id = `${entry.host}:${entry.port}`;
  return Object.freeze({
    id,
    host: entry.host,
    port: entry.port,
    modelType: entry.modelType,
    role,
    backendKind: entry.backendKind,
    baseUrl: `http://${id}`,
    ...(entry.label ? { label: entry.label } : {}),
  });
}

export class ServerRegistry {
  private readonly servers: readonly ServerDescriptor[];
  private readonly byId: ReadonlyMap<string, ServerDescriptor>;

  /**
   * @throws ConfigValidationError when two descriptors share an id
   */
  constructor(servers: readonly ServerDescriptor[]) {
    const byId = new Map<string, ServerDescriptor>();
    const duplicates: string[] = [];

    for (const server of servers) {
      if (byId.has(server.id)) {
        duplicates.push(server.id);
      } else {
        byId.set(server.id, server);
      }
    }

    if (duplicates.length > 0) {
      throw new ConfigValidationError(
        duplicates.map(id => ({ path: 'servers', message: ERROR_MESSAGES.DUPLICATE_SERVER_ID(id) }))
      );
    }

    this.servers = Object.freeze([...servers]);
    this.byId = byId;
  }

  /**
   * Prefill entries are registered before decode entries, each in file order
   */
  static fromConfig(config: ServersConfig): ServerRegistry {
    return new ServerRegistry([
      ...config.prefill.map(entry => createDescriptor(entry, 'prefill')),
      ...config.decode.map(entry => createDescriptor(entry, 'decode')),
    ]);
  }

  /** All servers in registration order, optionally filtered by role. */
  list(role?: ServerRole): readonly ServerDescriptor[] {
    return role ? this.servers.filter(s => s.role === role) : this.servers;
  }

  get(id: string): ServerDescriptor | undefined {
    return this.byId.get(id);
  }

  modelTypes(): string[] {
    return [...new Set(this.servers.map(s => s.modelType))];
  }

  get size(): number {
    return this.servers.length;
  }
}
