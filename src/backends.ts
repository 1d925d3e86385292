/**
 * backends.ts
 * Capabilities of the two serving technologies a prefill server can run
 */

import { ERROR_MESSAGES } from './constants/index.js';
import type { BackendKind, ContextPayload } from './orchestrator.types.js';
import { InferenceError } from './utils/errorClassifier.js';

export interface BackendCapability {
  readonly kind: BackendKind;
  /** Whether prefill hands over a real serialized cache rather than a placeholder */
  readonly exportsCache: boolean;
  /**
   * Interpret the `context` field of a /prefill response.
   * @throws InferenceError of kind `malformed-response`
   */
  readContext(raw: unknown, prompt: string): ContextPayload;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export const TensorCacheBackend: BackendCapability = {
  kind: 'tensor-cache',
  exportsCache: true,
  readContext(raw: unknown): ContextPayload {
    if (typeof raw !== 'string' || raw.length === 0 || raw.length % 4 !== 0) {
      throw new InferenceError('malformed-response', ERROR_MESSAGES.INVALID_TENSOR_CACHE);
    }
    if (!BASE64_PATTERN.test(raw)) {
      throw new InferenceError('malformed-response', ERROR_MESSAGES.INVALID_TENSOR_CACHE);
    }
    return { kind: 'tensor-cache', data: raw, byteLength: Buffer.byteLength(raw, 'base64') };
  },
};

export const TextPrimingBackend: BackendCapability = {
  kind: 'text-priming',
  exportsCache: false,
  readContext(raw: unknown, prompt: string): ContextPayload {
    if (raw === undefined || raw === null) {
      throw new InferenceError('malformed-response', ERROR_MESSAGES.MISSING_CONTEXT);
    }
    if (typeof raw !== 'string') {
      throw new InferenceError('malformed-response', ERROR_MESSAGES.INVALID_TEXT_CONTEXT);
    }
    // Servers of this kind echo the prompt; an empty echo still means "use the prompt"
    return { kind: 'text-priming', text: raw.length > 0 ? raw : prompt };
  },
};

const BACKENDS: Record<BackendKind, BackendCapability> = {
  'tensor-cache': TensorCacheBackend,
  'text-priming': TextPrimingBackend,
};

export function backendFor(kind: BackendKind): BackendCapability {
  return BACKENDS[kind];
}

/**
 * Value sent as `context` in a /decode request
 */
export function encodeContext(payload: ContextPayload): string {
  return payload.kind === 'tensor-cache' ? payload.data : payload.text;
}
