/**
 * HTTP Tool - JSON requests to external services with a timeout
 *
 * Failures come back classified: non-2xx statuses through errorForStatus,
 * aborts and network faults as retryable transport errors. Retrying is left
 * to the caller's call policy.
 */

import {
  classifyError,
  CollaboratorRequestError,
  CollaboratorTransportError,
  errorForStatus,
} from '../errors';
import { Logger, sleep, truncate } from '../utils';

export interface PollOptions {
  interval_ms: number;
  timeout_ms: number;
}

/**
 * Calls check until it yields a value. A job that never finishes is a
 * request error: retrying would only submit the same work again.
 */
export async function pollUntil<T>(
  collaborator: string,
  description: string,
  check: () => Promise<T | null>,
  options: PollOptions
): Promise<T> {
  const deadline = Date.now() + options.timeout_ms;
  let attempts = 0;

  for (;;) {
    attempts++;
    const result = await check();
    if (result !== null) {
      return result;
    }
    if (Date.now() + options.interval_ms > deadline) {
      throw new CollaboratorRequestError(
        collaborator,
        `${description} did not finish within ${options.timeout_ms}ms (${attempts} polls)`
      );
    }
    await sleep(options.interval_ms);
  }
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST' | 'PUT';
  headers?: Record<string, string>;
  body?: unknown;
  timeout?: number;
}

export class HttpTool {
  static async requestJson(
    collaborator: string,
    url: string,
    options: HttpRequestOptions = {}
  ): Promise<unknown> {
    const { method = 'GET', headers = {}, body, timeout = 30000 } = options;

    Logger.debug('HTTP request', { collaborator, method, url });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          'User-Agent': 'podcast-clip-pipeline/1.0',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
          ...headers,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        throw errorForStatus(
          collaborator,
          response.status,
          `HTTP ${response.status} from ${method} ${url}: ${truncate(text, 200)}`
        );
      }

      try {
        return text ? JSON.parse(text) : {};
      } catch (error) {
        throw new CollaboratorTransportError(
          collaborator,
          `invalid JSON from ${url}: ${truncate(text, 120)}`,
          response.status,
          error
        );
      }
    } catch (error) {
      throw classifyError(collaborator, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
