/**
 * HTTP helper shared by the auth strategies and the REST transport.
 */

import { ApiError } from '../errors/index.js';

export type FetchFn = typeof fetch;

export interface HttpRequestOptions {
  readonly fetch: FetchFn;
  readonly timeoutMs: number;
  readonly correlationId?: string | undefined;
}

/**
 * Issue one request with a timeout. Resolves with the response whatever its
 * status; status handling belongs to the caller. Network failures and
 * timeouts reject with {@link ApiError}.
 */
export async function httpRequest(
  url: string,
  init: RequestInit,
  options: HttpRequestOptions
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    return await options.fetch(url, {
      ...init,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw ApiError.timeout(options.timeoutMs, options.correlationId);
    }
    throw ApiError.fromError(error, options.correlationId);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Read a JSON body, or `undefined` for an empty one.
 */
export async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  return JSON.parse(text);
}

/**
 * Read a JSON body, mapping unparseable content to a malformed-response
 * {@link ApiError}.
 */
export async function readJsonOrThrow(
  response: Response,
  correlationId?: string | undefined
): Promise<unknown> {
  try {
    return await readJson(response);
  } catch (error) {
    throw ApiError.malformed('Response body is not valid JSON', {
      cause: error,
      statusCode: response.status,
      correlationId,
    });
  }
}

/**
 * Normalize a base URL: add `https://` when no scheme is present and drop
 * trailing slashes.
 */
export function normalizeBaseUrl(url: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `https://${url}`;
  return withScheme.replace(/\/+$/, '');
}
