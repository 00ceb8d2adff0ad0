/**
 * HTTP session factory: global fetch with a per-request timeout and bounded
 * retry of connection-level failures. Status codes are not inspected here;
 * application-level retry lives in the client.
 */

import { systemClock, type Clock } from './clock.js';
import { TransportError } from './errors.js';

export interface SessionConfig {
  sourceName: string;
  /** Per-request timeout (default: 45000). */
  timeoutMs?: number;
  /** Retries of thrown fetch failures (default: 5). */
  transportRetries?: number;
  /** Delay factor, doubled per retry (default: 500). */
  backoffFactorMs?: number;
  clock?: Clock;
}

export interface HttpSession {
  send(url: string, init: RequestInit): Promise<Response>;
}

export function createSession(config: SessionConfig): HttpSession {
  const {
    sourceName,
    timeoutMs = 45_000,
    transportRetries = 5,
    backoffFactorMs = 500,
    clock = systemClock,
  } = config;

  async function send(url: string, init: RequestInit): Promise<Response> {
    let retries = 0;

    while (true) {
      try {
        return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
      } catch (err) {
        if (retries >= transportRetries) {
          const reason = err instanceof Error ? err.message : String(err);
          throw new TransportError(sourceName, `request failed after ${transportRetries} transport retries: ${reason}`, { cause: err });
        }
        retries++;
        await clock.sleep(backoffFactorMs * 2 ** (retries - 1));
      }
    }
  }

  return { send };
}
