/**
 * errorClassifier.ts
 * Failure taxonomy shared by the health monitor, the stage clients and the orchestrator
 */

/**
 * Kinds of failure an inference request can run into.
 *
 * The first four are stage failures that the orchestrator recovers from by
 * degrading to the next tier. `no-healthy-server` short-circuits to the
 * fallback tier, and `all-tiers-failed` is terminal.
 */
export type InferenceErrorKind =
  | 'network-unreachable'
  | 'timeout'
  | 'non-success-status'
  | 'malformed-response'
  | 'no-healthy-server'
  | 'all-tiers-failed';

export class InferenceError extends Error {
  readonly kind: InferenceErrorKind;
  /** HTTP status for `non-success-status` failures */
  readonly status?: number;

  constructor(kind: InferenceErrorKind, message: string, options: { status?: number } = {}) {
    super(message);
    this.name = 'InferenceError';
    this.kind = kind;
    this.status = options.status;
  }
}

/**
 * Outcome of a single outbound call. Clients return this instead of throwing.
 */
export type CallResult<T> = { ok: true; value: T } | { ok: false; error: InferenceError };

/**
 * Error kinds that stage clients may report, as opposed to the orchestrator-level ones
 */
const STAGE_ERROR_KINDS: ReadonlySet<InferenceErrorKind> = new Set<InferenceErrorKind>([
  'network-unreachable',
  'timeout',
  'non-success-status',
  'malformed-response',
]);

export function isStageFailure(kind: InferenceErrorKind): boolean {
  return STAGE_ERROR_KINDS.has(kind);
}

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}

/**
 * Coerce anything thrown on a call path into an InferenceError.
 * Unknown errors are treated as the peer being unreachable.
 */
export function toInferenceError(error: unknown): InferenceError {
  if (error instanceof InferenceError) {
    return error;
  }
  if (isAbortError(error)) {
    return new InferenceError('timeout', error instanceof Error ? error.message : 'Request aborted');
  }
  if (error instanceof SyntaxError) {
    return new InferenceError('malformed-response', `Invalid JSON: ${error.message}`);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new InferenceError('network-unreachable', message);
}

/**
 * Await a call and fold any rejection into a failed CallResult
 */
export async function settle<T>(call: () => Promise<T>): Promise<CallResult<T>> {
  try {
    return { ok: true, value: await call() };
  } catch (error) {
    return { ok: false, error: toInferenceError(error) };
  }
}
