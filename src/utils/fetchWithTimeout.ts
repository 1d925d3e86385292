/**
 * fetchWithTimeout.ts
 * fetch wrappers with a per-request deadline and typed failures
 */

import type { z } from 'zod';

import { InferenceError } from './errorClassifier.js';
import { safeJsonParse } from './json-utils.js';
import { logger } from './logger.js';

export interface FetchWithTimeoutOptions extends RequestInit {
  timeout?: number;
}

/**
 * Settle like `work`, or reject with an AbortError as soon as `signal` fires
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new DOMException('This operation was aborted', 'AbortError'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new DOMException('This operation was aborted', 'AbortError'));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

async function fetchWithSignal(
  url: string,
  init: RequestInit,
  signal: AbortSignal,
  timeout: number
): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal });
  } catch (error) {
    if (signal.aborted) {
      throw new InferenceError('timeout', `Request timeout after ${timeout}ms: ${url}`);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new InferenceError('network-unreachable', `Fetch failed: ${reason}`);
  }
}

/**
 * Fetch with timeout support. The deadline covers the response headers only;
 * use `requestJson` when the body must arrive in time as well.
 * @throws InferenceError of kind `timeout` when the deadline passes,
 *   `network-unreachable` when the connection fails
 */
export async function fetchWithTimeout(
  url: string,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout = 30000, ...fetchOptions } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeout);

  try {
    return await fetchWithSignal(url, fetchOptions, controller.signal, timeout);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Extract a readable message from an error response.
 * Backends answer failures with `{ error: string }`; anything else falls back to the status line.
 * When `signal` fires before the body arrives, only the status line is reported.
 */
export async function parseErrorResponse(response: Response, signal?: AbortSignal): Promise<string> {
  const statusText = `HTTP ${response.status}`;

  try {
    const text = await (signal ? untilAborted(response.text(), signal) : response.text());
    const json = safeJsonParse(text);
    if (json && typeof json === 'object') {
      if ('error' in json && typeof json.error === 'string') {
        return `${statusText}: ${json.error}`;
      }
      if ('message' in json && typeof json.message === 'string') {
        return `${statusText}: ${json.message}`;
      }
    }
    if (text.length > 0 && text.length < 500) {
      return `${statusText}: ${text}`;
    }
    return statusText;
  } catch {
    return statusText;
  }
}

export interface RequestJsonOptions<S extends z.ZodTypeAny> {
  method?: 'GET' | 'POST';
  body?: unknown;
  timeout: number;
  schema: S;
}

/**
 * Issue a JSON request and validate the 200 response body against `schema`.
 * The deadline covers the whole exchange, body included.
 *
 * @throws InferenceError
 *   - `timeout` when headers or body miss the deadline
 *   - `network-unreachable` from the transport
 *   - `non-success-status` for any status other than 200
 *   - `malformed-response` when the body is not JSON or misses expected fields
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  options: RequestJsonOptions<S>
): Promise<z.output<S>> {
  const { method = 'GET', body, timeout, schema } = options;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeout);

  try {
    const response = await fetchWithSignal(
      url,
      {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      },
      controller.signal,
      timeout
    );

    if (response.status !== 200) {
      const message = await parseErrorResponse(response, controller.signal);
      throw new InferenceError('non-success-status', message, { status: response.status });
    }

    let text: string;
    try {
      text = await untilAborted(response.text(), controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new InferenceError('timeout', `Response body timeout after ${timeout}ms: ${url}`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new InferenceError('network-unreachable', `Reading response from ${url} failed: ${reason}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(text) as unknown;
    } catch (error) {
      logger.debug('Failed to parse response JSON', { url, error });
      throw new InferenceError('malformed-response', `Response from ${url} is not valid JSON`);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue: z.ZodIssue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new InferenceError('malformed-response', `Unexpected response from ${url}: ${issues}`);
    }

    return parsed.data;
  } finally {
    clearTimeout(timeoutId);
  }
}
