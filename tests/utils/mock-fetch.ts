/**
 * Test utilities: in-process stand-in for the global fetch
 *
 * Routes are matched on method and full URL. Anything without a route is
 * treated as a refused connection.
 */

import { vi } from 'vitest';

export interface RecordedCall {
  method: string;
  url: string;
  body: unknown;
}

export type RouteHandler = (call: RecordedCall, signal?: AbortSignal) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status = 200): Response {
  return new Response(text, { status });
}

/**
 * Never answers; rejects like fetch does once the caller aborts
 */
export const hang: RouteHandler = (_call, signal) =>
  new Promise<Response>((_resolve, reject) => {
    signal?.addEventListener('abort', () => {
      reject(new DOMException('This operation was aborted', 'AbortError'));
    });
  });

/**
 * Sends 200 headers, then a body that never finishes
 */
export const stallBody: RouteHandler = () =>
  new Response(new ReadableStream<Uint8Array>({ start() {} }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

/**
 * Rejects the way fetch does when nothing listens on the port
 */
export const refuse: RouteHandler = () => {
  throw new TypeError('fetch failed');
};

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

function parseBody(body: unknown): unknown {
  if (typeof body !== 'string') {
    return undefined;
  }
  try {
    return JSON.parse(body) as unknown;
  } catch {
    return body;
  }
}

export class MockFetch {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, RouteHandler>();

  on(method: 'GET' | 'POST', url: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${url}`, handler);
    return this;
  }

  /** Reply to every matching request with the same JSON body. */
  json(method: 'GET' | 'POST', url: string, body: unknown, status = 200): this {
    return this.on(method, url, () => jsonResponse(body, status));
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const call: RecordedCall = {
      method: init?.method ?? 'GET',
      url: urlOf(input),
      body: parseBody(init?.body),
    };
    this.calls.push(call);

    const handler = this.routes.get(`${call.method} ${call.url}`) ?? refuse;
    return handler(call, init?.signal ?? undefined);
  };

  install(): this {
    vi.stubGlobal('fetch', this.fetch);
    return this;
  }

  /** Calls other than health probes, in order. */
  workCalls(): RecordedCall[] {
    return this.calls.filter(c => !c.url.endsWith('/health'));
  }

  callsTo(url: string): RecordedCall[] {
    return this.calls.filter(c => c.url === url);
  }
}

export function installMockFetch(): MockFetch {
  return new MockFetch().install();
}
