/**
 * HTTP Module
 *
 * Transport plumbing shared by the two system clients:
 * - Timeout-only retry (three attempts in total)
 * - Request pacing between consecutive calls
 * - Keep-alive axios sessions that can be torn down
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, CreateAxiosDefaults } from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import type { Logger } from '../types/index.js';

export const MAX_TIMEOUT_ATTEMPTS = 3;

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * True when the error is a transport timeout (the only retryable failure)
 */
export function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export interface RetryOptions {
  /** Total attempts, including the first (default 3) */
  attempts?: number;
  /** Delay between attempts in milliseconds */
  backoffMs: number;
}

/**
 * Execute a call, retrying only on transport timeouts.
 * HTTP error statuses and every other failure surface immediately.
 */
export async function withTimeoutRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
  logger: Logger,
  context: string
): Promise<T> {
  const attempts = options.attempts ?? MAX_TIMEOUT_ATTEMPTS;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!isTimeoutError(error) || attempt >= attempts) {
        throw error;
      }
      logger.warn(`${context} timed out`, { attempt, maxAttempts: attempts });
      if (options.backoffMs > 0) {
        await sleep(options.backoffMs);
      }
    }
  }
}

// ============================================================================
// Pacing
// ============================================================================

/**
 * Client-side request pacing between consecutive external calls
 */
export interface Pacer {
  pause(): Promise<void>;
}

/**
 * Fixed delay between calls
 */
export class FixedDelayPacer implements Pacer {
  constructor(readonly delayMs: number) {}

  async pause(): Promise<void> {
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
  }
}

/**
 * No pacing; used in tests and for delays configured as zero
 */
export const noPacing: Pacer = {
  pause: async () => {},
};

export function createPacer(delayMs: number): Pacer {
  return delayMs > 0 ? new FixedDelayPacer(delayMs) : noPacing;
}

// ============================================================================
// Sessions
// ============================================================================

/**
 * An axios instance plus the connection pool it owns
 */
export interface HttpSession {
  http: AxiosInstance;
  close(): void;
}

/**
 * Create a keep-alive session. With a request `adapter` (tests) no
 * connection pool is opened and closing is a no-op.
 */
export function createHttpSession(defaults: CreateAxiosDefaults, adapter?: AxiosAdapter): HttpSession {
  if (adapter) {
    return { http: axios.create({ ...defaults, adapter }), close: () => {} };
  }

  const httpAgent = new HttpAgent({ keepAlive: true });
  const httpsAgent = new HttpsAgent({ keepAlive: true });
  const instance = axios.create({ ...defaults, httpAgent, httpsAgent });

  return {
    http: instance,
    close: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
