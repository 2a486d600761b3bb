/**
 * Scripted fetch for tests. Each call consumes the next queued reply.
 */

import type { FetchFn } from '../../http/request.js';

export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  /** Header names are lower-cased */
  readonly headers: Record<string, string>;
  readonly body: string | undefined;
}

export type Reply = Response | Error | ((request: RecordedRequest, signal: AbortSignal | undefined) => Promise<Response>);

export interface MockFetch {
  readonly fetch: FetchFn;
  readonly requests: RecordedRequest[];
  enqueue(...replies: Reply[]): void;
  /** Form fields of a recorded request body */
  form(index: number): URLSearchParams;
  /** JSON body of a recorded request */
  json(index: number): unknown;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function emptyResponse(status = 200): Response {
  return new Response(null, { status });
}

export function createMockFetch(...initial: Reply[]): MockFetch {
  const queue: Reply[] = [...initial];
  const requests: RecordedRequest[] = [];

  const fetchFn: FetchFn = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      headers,
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    requests.push(request);

    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`Unexpected request: ${request.method} ${url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (reply instanceof Response) {
      return reply;
    }
    return reply(request, init?.signal ?? undefined);
  };

  const bodyOf = (index: number): string => {
    const body = requests[index]?.body;
    if (body === undefined) {
      throw new Error(`Request ${index} has no body`);
    }
    return body;
  };

  return {
    fetch: fetchFn,
    requests,
    enqueue: (...replies) => {
      queue.push(...replies);
    },
    form: (index) => new URLSearchParams(bodyOf(index)),
    json: (index) => JSON.parse(bodyOf(index)),
  };
}

/**
 * Replies for one successful login: core token, exchange, revoke.
 */
export function loginReplies(options: { expiresIn?: number; accessToken?: string } = {}): Response[] {
  return [
    jsonResponse({
      access_token: 'core-token',
      instance_url: 'https://core.example.com/',
      token_type: 'Bearer',
      refresh_token: 'issued-refresh-token',
    }),
    jsonResponse({
      access_token: options.accessToken ?? 'dc-token',
      instance_url: 'tenant.example.com',
      token_type: 'Bearer',
      issued_token_type: 'urn:ietf:params:oauth:token-type:jwt',
      ...(options.expiresIn !== undefined && { expires_in: options.expiresIn }),
    }),
    emptyResponse(200),
  ];
}
