/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so upstream calls
 * (places search, weather) cannot hang a recommendation cycle.
 * The timer is always cleared in the finally block.
 */

import { logger } from '../lib/logger/structured-logger.js';
import { withTimeout } from '../lib/reliability/timeout-guard.js';

export type FetchErrorKind = 'TIMEOUT' | 'DNS_FAIL' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  requestId?: string;
  stage?: string;
  provider?: string;
}

export class UpstreamFetchError extends Error {
  readonly code = 'UPSTREAM_TIMEOUT';

  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly provider: string,
    public readonly timeoutMs: number,
    public readonly stage: string,
    public readonly host: string
  ) {
    super(message);
    this.name = 'UpstreamFetchError';
  }
}

function classify(err: unknown, timedOut: boolean): FetchErrorKind {
  if (timedOut) return 'TIMEOUT';
  const message = err instanceof Error ? err.message : String(err);
  if (message.includes('ENOTFOUND') || message.includes('getaddrinfo')) return 'DNS_FAIL';
  return 'NETWORK_ERROR';
}

/**
 * Fetch with automatic timeout using AbortController
 *
 * @throws UpstreamFetchError when the request times out or fails at the network level.
 * HTTP error statuses are returned as responses, not thrown.
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig
): Promise<Response> {
  const controller = new AbortController();
  const startTime = Date.now();
  const { host, pathname } = new URL(url);
  let timedOut = false;

  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.timeoutMs);

  // Path only; query strings can carry API keys
  logger.debug({
    requestId: config.requestId,
    event: 'upstream_fetch_start',
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    stage: config.stage
  }, '[FETCH] Outbound request');

  try {
    const response = await fetch(url, { ...options, signal: controller.signal });

    logger.debug({
      requestId: config.requestId,
      event: 'upstream_fetch_done',
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime
    }, '[FETCH] Response received');

    return response;
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const errorKind = classify(err, timedOut);

    logger.warn({
      requestId: config.requestId,
      event: 'upstream_fetch_failed',
      host,
      errorKind,
      durationMs,
      error: err instanceof Error ? err.message : String(err)
    }, `[FETCH] ${errorKind} ${host}`);

    throw new UpstreamFetchError(
      `${config.provider || 'Upstream API'} ${errorKind.toLowerCase().replace('_', ' ')} after ${durationMs}ms`,
      errorKind,
      config.provider || 'unknown',
      config.timeoutMs,
      config.stage || 'unknown',
      host
    );
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Parse a JSON body within what is left of the request budget.
 * fetchWithTimeout only bounds the wait for headers; a stalled body
 * rejects here with TimeoutError.
 */
export function readJsonWithinBudget(
  response: Response,
  startedAt: number,
  timeoutMs: number,
  operation: string
): Promise<unknown> {
  const remainingMs = Math.max(1, timeoutMs - (Date.now() - startedAt));
  return withTimeout<unknown>(response.json(), remainingMs, operation);
}
