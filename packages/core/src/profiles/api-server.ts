/**
 * Kubernetes API server reachability probe
 *
 * A freshly started SSH tunnel needs a moment before it forwards traffic, so
 * activation polls the API server until any HTTP response comes back.
 */

import https from 'node:https';
import { formatError } from '../utils/errors.js';

const INITIAL_RETRY_DELAY_MS = 100;
const MAX_RETRY_DELAY_MS = 5000;
const MIN_REQUEST_TIMEOUT_MS = 1000;

/**
 * Error thrown when the API server did not answer within the grace period.
 * `cause` holds the last network error.
 */
export class ApiServerUnreachableError extends Error {
  constructor(
    public readonly url: string,
    public readonly attempts: number,
    cause: unknown
  ) {
    super(
      `API server at ${url} is not reachable after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${formatError(cause)}`,
      { cause }
    );
    this.name = 'ApiServerUnreachableError';
  }
}

/**
 * Send one request; resolves with the HTTP status code of any response
 */
export type ApiServerProbe = (url: string, timeoutMs: number) => Promise<number>;

/**
 * GET `url` with certificate verification disabled. The tunnel endpoint is
 * `localhost`, which the server certificate does not name.
 */
export function probeApiServer(url: string, timeoutMs: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const request = https.get(url, { rejectUnauthorized: false, timeout: timeoutMs }, (response) => {
      response.resume();
      resolve(response.statusCode ?? 0);
    });
    request.on('timeout', () => {
      request.destroy(new Error(`Request to ${url} timed out after ${timeoutMs}ms`));
    });
    request.on('error', reject);
  });
}

export interface WaitForApiServerOptions {
  /** Grace period for the whole wait */
  timeoutMs: number;
  maxAttempts: number;
  probe?: ApiServerProbe;
  /** Delay before the second attempt; doubles after each failure */
  initialDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll the API server until it answers, the grace period ends, or the
 * attempt budget is spent.
 *
 * @returns HTTP status of the first response
 * @throws ApiServerUnreachableError carrying the last network error
 */
export async function waitForApiServer(url: string, options: WaitForApiServerOptions): Promise<number> {
  const probe = options.probe ?? probeApiServer;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  const deadline = Date.now() + options.timeoutMs;
  let delay = options.initialDelayMs ?? INITIAL_RETRY_DELAY_MS;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const requestTimeout = Math.max(deadline - Date.now(), MIN_REQUEST_TIMEOUT_MS);
    try {
      const status = await probe(url, requestTimeout);
      console.debug(`[profiles] API server at ${url} answered with HTTP ${status}.`);
      return status;
    } catch (error) {
      lastError = error;
    }

    const remaining = deadline - Date.now();
    if (attempt === maxAttempts || remaining <= 0) {
      throw new ApiServerUnreachableError(url, attempt, lastError);
    }
    console.debug(
      `[profiles] API server at ${url} not reachable yet (attempt ${attempt}/${maxAttempts}): ${formatError(lastError)}`
    );
    await sleep(Math.min(delay, remaining));
    delay = Math.min(delay * 2, MAX_RETRY_DELAY_MS);
  }

  // Unreachable: the loop either returns or throws on its last attempt
  throw new ApiServerUnreachableError(url, maxAttempts, lastError);
}
