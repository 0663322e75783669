/**
 * Thin GET wrapper over undici's request used by the UMLS and PubMed clients.
 * Tests pass a MockAgent as the dispatcher.
 *
 * @module utils/http
 */

import { request, type Dispatcher } from 'undici';

export interface HttpGetOptions {
  dispatcher?: Dispatcher;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpTextResponse {
  statusCode: number;
  text: string;
}

export function buildUrl(base: string, params: Record<string, string | number | undefined>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * GET a URL and read the whole body as text. Network errors propagate;
 * status codes are left to the caller.
 */
export async function httpGetText(url: string, options: HttpGetOptions = {}): Promise<HttpTextResponse> {
  const response = await request(url, {
    method: 'GET',
    dispatcher: options.dispatcher,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
    signal: options.signal,
  });
  const text = await response.body.text();
  return { statusCode: response.statusCode, text };
}

/** Parse a JSON body; a malformed body is reported as undefined */
export function parseJsonBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
