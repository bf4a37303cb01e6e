/**
 * HTTP transport. The binding only builds requests and decodes responses;
 * executing them is left to a transport, `fetchTransport` by default.
 */

import type { HttpRequest } from './requests.js';
import { describeApiErrorBody, textOf } from './responses.js';
import { ok, err, type Result, type TransportError } from './result.js';

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

export type HttpTransport = (request: HttpRequest) => Promise<Result<HttpResponse, TransportError>>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Transport over the WHATWG `fetch` API. Network failures and non-2xx
 * statuses come back as `TransportError` values; nothing is retried.
 */
export function fetchTransport(fetchImpl: FetchLike = globalThis.fetch): HttpTransport {
  return async (request) => {
    let response: Response;
    let body: Uint8Array;
    try {
      response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body ?? undefined,
      });
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      return err({
        kind: 'transport',
        message: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return checkStatus({ status: response.status, headers, body });
  };
}

/**
 * Turn a non-2xx response into an `http-status` error.
 */
export function checkStatus(response: HttpResponse): Result<HttpResponse, TransportError> {
  if (response.status >= 200 && response.status < 300) {
    return ok(response);
  }

  const text = textOf(response.body);
  return err({
    kind: 'http-status',
    status: response.status,
    message: describeApiErrorBody(text) || `HTTP ${response.status}`,
    body: text,
  });
}
