/**
 * JSON-over-HTTP transport with explicit timeouts
 */

import { RequestTimeoutError, ServiceConnectionError } from './errors';

/**
 * Transport-level response. Non-2xx statuses are returned, not thrown,
 * so callers can interpret them.
 */
export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Raw response body */
  text: string;
  /** Parsed body, undefined when the body is not valid JSON */
  body: unknown;
}

/**
 * Parse a response body, returning undefined for malformed JSON
 */
export const parseJsonBody = (text: string): unknown => {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
};

/**
 * POST a JSON payload and read the response
 *
 * @param url - Target URL
 * @param payload - Body, serialized as JSON
 * @param timeoutMs - Abort after this many milliseconds
 * @param service - Service name used in error messages
 * @returns Response with status and parsed body
 * @throws {RequestTimeoutError} If the request times out
 * @throws {ServiceConnectionError} If the connection fails
 */
export const postJson = async (
  url: string,
  payload: unknown,
  timeoutMs: number,
  service: string
): Promise<HttpResponse> => {
  // Use AbortController for timeout handling
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
      signal: controller.signal,
    });

    const text = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      text,
      body: parseJsonBody(text),
    };
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new RequestTimeoutError(`${service} request`, timeoutMs);
    }
    throw new ServiceConnectionError(service, url, error instanceof Error ? error : undefined);
  } finally {
    clearTimeout(timeout);
  }
};

/**
 * Narrow an unknown JSON value to a plain object
 */
export const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Read a property of an unknown JSON value when it is an object
 */
export const getProperty = (value: unknown, key: string): unknown => {
  return isRecord(value) ? value[key] : undefined;
};
