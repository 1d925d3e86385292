/**
 * server-registry.test.ts
 * Tests for server descriptors and the registry built from configuration
 */

import { describe, it, expect } from 'vitest';

import { ConfigValidationError } from '../../src/config/schema.js';
import { ServerRegistry, createDescriptor } from '../../src/server-registry.js';
import { DECODE_A, PREFILL_A, twoModelConfig } from '../fixtures/index.js';

describe('createDescriptor', () => {
  it('derives id and base URL from host and port', () => {
    const descriptor = createDescriptor({ ...PREFILL_A, backendKind: 'tensor-cache' }, 'prefill');

    expect(descriptor).toEqual({
      id: '10.0.0.1:8000',
      host: '10.0.0.1',
      port: 8000,
      modelType: 'alpha',
      role: 'prefill',
      backendKind: 'tensor-cache',
      baseUrl: 'http://10.0.0.1:8000',
    });
  });

  it('keeps an operator label when given', () => {
    const descriptor = createDescriptor(
      { ...DECODE_A, backendKind: 'text-priming', label: 'Decode box 1' },
      'decode'
    );

    expect(descriptor.label).toBe('Decode box 1');
  });

  it('returns a frozen descriptor', () => {
    const descriptor = createDescriptor({ ...PREFILL_A, backendKind: 'text-priming' }, 'prefill');

    expect(Object.isFrozen(descriptor)).toBe(true);
  });
});

describe('ServerRegistry', () => {
  it('registers prefill servers before decode servers, in file order', () => {
    const registry = ServerRegistry.fromConfig(twoModelConfig().servers);

    expect(registry.list().map(s => s.id)).toEqual([
      '10.0.0.1:8000',
      '10.0.0.2:8000',
      '10.0.0.11:8001',
      '10.0.0.12:8001',
    ]);
    expect(registry.size).toBe(4);
  });

  it('filters by role', () => {
    const registry = ServerRegistry.fromConfig(twoModelConfig().servers);

    expect(registry.list('decode').map(s => s.id)).toEqual(['10.0.0.11:8001', '10.0.0.12:8001']);
    expect(registry.list('prefill').every(s => s.role === 'prefill')).toBe(true);
  });

  it('looks servers up by id', () => {
    const registry = ServerRegistry.fromConfig(twoModelConfig().servers);

    expect(registry.get('10.0.0.12:8001')?.modelType).toBe('beta');
    expect(registry.get('10.0.0.99:8001')).toBeUndefined();
  });

  it('lists distinct model types', () => {
    const registry = ServerRegistry.fromConfig(twoModelConfig().servers);

    expect(registry.modelTypes()).toEqual(['alpha', 'beta']);
  });

  it('rejects two servers on the same host and port', () => {
    const build = () =>
      ServerRegistry.fromConfig({
        prefill: [{ ...PREFILL_A, backendKind: 'text-priming' }],
        decode: [{ ...PREFILL_A, backendKind: 'text-priming' }],
      });

    expect(build).toThrow(ConfigValidationError);
    expect(build).toThrow("Server '10.0.0.1:8000' is configured more than once");
  });

  it('accepts an empty configuration', () => {
    const registry = ServerRegistry.fromConfig({ prefill: [], decode: [] });

    expect(registry.size).toBe(0);
    expect(registry.modelTypes()).toEqual([]);
  });
});
