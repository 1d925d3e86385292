/**
 * server-selector.test.ts
 * Tests for first-fit server selection
 */

import { describe, it, expect } from 'vitest';

import { validateConfig } from '../../src/config/schema.js';
import type { HealthSnapshot, HealthStatus } from '../../src/orchestrator.types.js';
import { ServerRegistry } from '../../src/server-registry.js';
import { ServerSelector } from '../../src/server-selector.js';

const registry = ServerRegistry.fromConfig(
  validateConfig({
    servers: {
      prefill: [
        { host: 'p1', port: 8000, modelType: 'alpha' },
        { host: 'p2', port: 8000, modelType: 'alpha' },
        { host: 'p3', port: 8000, modelType: 'beta' },
      ],
      decode: [{ host: 'd1', port: 8001, modelType: 'alpha' }],
    },
  }).servers
);

function snapshot(healthy: string[], unhealthy: string[] = []): HealthSnapshot {
  const entries: [string, HealthStatus][] = [
    ...healthy.map((id): [string, HealthStatus] => [id, { serverId: id, healthy: true, checkedAt: 1 }]),
    ...unhealthy.map((id): [string, HealthStatus] => [id, { serverId: id, healthy: false, checkedAt: 1 }]),
  ];
  return new Map(entries);
}

describe('ServerSelector', () => {
  const selector = new ServerSelector(registry);

  it('lists candidates for a role and model type in registration order', () => {
    expect(selector.candidates('prefill', 'alpha').map(s => s.id)).toEqual(['p1:8000', 'p2:8000']);
    expect(selector.candidates('decode', 'beta')).toEqual([]);
  });

  it('picks the first healthy candidate', () => {
    const picked = selector.pick('prefill', 'alpha', snapshot(['p1:8000', 'p2:8000']));

    expect(picked?.id).toBe('p1:8000');
  });

  it('skips unhealthy candidates', () => {
    const picked = selector.pick('prefill', 'alpha', snapshot(['p2:8000'], ['p1:8000']));

    expect(picked?.id).toBe('p2:8000');
  });

  it('treats a server missing from the snapshot as unhealthy', () => {
    const picked = selector.pick('prefill', 'alpha', snapshot(['p2:8000']));

    expect(picked?.id).toBe('p2:8000');
  });

  it('returns undefined when no candidate is healthy', () => {
    expect(selector.pick('prefill', 'alpha', snapshot([], ['p1:8000', 'p2:8000']))).toBeUndefined();
    expect(selector.pick('decode', 'llama', snapshot(['d1:8001']))).toBeUndefined();
  });

  it('never crosses roles or model types', () => {
    const health = snapshot(['p3:8000', 'd1:8001']);

    expect(selector.pick('prefill', 'alpha', health)).toBeUndefined();
    expect(selector.pick('prefill', 'beta', health)?.id).toBe('p3:8000');
  });
});
