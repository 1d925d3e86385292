/**
 * server-selector.ts
 * Deterministic first-fit server selection
 */

import type { HealthSnapshot, ServerDescriptor, ServerRole } from './orchestrator.types.js';
import type { ServerRegistry } from './server-registry.js';

export class ServerSelector {
  private readonly registry: ServerRegistry;

  constructor(registry: ServerRegistry) {
    this.registry = registry;
  }

  /** Configured servers for a role and model type, in registration order. */
  candidates(role: ServerRole, modelType: string): ServerDescriptor[] {
    return this.registry.list(role).filter(s => s.modelType === modelType);
  }

  /**
   * First registered server with this role and model type that is healthy in `health`.
   * No load balancing: with several healthy candidates the earliest one always wins.
   */
  pick(role: ServerRole, modelType: string, health: HealthSnapshot): ServerDescriptor | undefined {
    return this.candidates(role, modelType).find(s => health.get(s.id)?.healthy === true);
  }
}
