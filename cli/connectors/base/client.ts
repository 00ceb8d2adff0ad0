/**
 * Shared HTTP client: one page request with backoff (exponential unless the
 * policy says constant) on transient statuses. Every connector talks to its vendor through one of these.
 */

import type { Logger } from '../../logger.js';
import { createLogger } from '../../logger.js';
import { systemClock, type Clock } from './clock.js';
import { HttpError, MalformedPayloadError, RetryExhaustedError } from './errors.js';
import type { SlidingWindowRateLimiter } from './rate-limiter.js';
import { createSession, type HttpSession, type SessionConfig } from './session.js';
import type {
  ApiResponse, AuthHeaderFn, QueryParams, RequestDescriptor, RequestOptions, RetryPolicy,
} from './types.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  baseDelayMs: 1000,
  backoff: 'exponential',
  retryStatuses: [429, 500, 502, 503, 504],
  respectRetryAfter: true,
};

/** Configuration for createClient(). */
export interface ClientConfig {
  baseUrl: string;
  authHeaders: AuthHeaderFn;
  /** Source name for error messages (e.g. "BigCommerce"). */
  sourceName: string;
  retry?: Partial<RetryPolicy>;
  /** Query parameters added to every request (keys, signatures). */
  authParams?: () => QueryParams;
  /** Query parameter names replaced by [redacted] in logs and errors. */
  secretParams?: readonly string[];
  /** Extra static headers merged into every request. */
  extraHeaders?: Record<string, string>;
  /** Sleep before each request, in ms. */
  preRequestDelayMs?: number;
  rateLimiter?: SlidingWindowRateLimiter;
  session?: Omit<SessionConfig, 'sourceName' | 'clock'>;
  clock?: Clock;
  logger?: Logger;
}

export interface ConnectorClient {
  readonly sourceName: string;
  send(request: RequestDescriptor): Promise<ApiResponse>;
  request(path: string, options?: RequestOptions): Promise<unknown>;
}

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): URL {
  let target = path;
  if (!/^https?:\/\//.test(path)) {
    const base = baseUrl.replace(/\/+$/, '');
    target = path === '' ? base : `${base}/${path.replace(/^\/+/, '')}`;
  }
  const url = new URL(target);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) url.searchParams.append(key, String(item));
    } else {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
}

export function redactUrl(url: URL, secretParams: readonly string[]): string {
  if (secretParams.length === 0) return url.toString();
  const copy = new URL(url.toString());
  for (const name of secretParams) {
    if (copy.searchParams.has(name)) copy.searchParams.set(name, '[redacted]');
  }
  return copy.toString();
}

function retryAfterMs(res: Response): number | undefined {
  const raw = res.headers.get('Retry-After');
  if (raw === null) return undefined;
  const seconds = parseInt(raw, 10);
  return isNaN(seconds) ? undefined : seconds * 1000;
}

export function createClient(config: ClientConfig): ConnectorClient {
  const {
    baseUrl,
    authHeaders,
    sourceName,
    authParams,
    secretParams = [],
    extraHeaders = {},
    preRequestDelayMs,
    rateLimiter,
    clock = systemClock,
  } = config;
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...config.retry };
  const log = config.logger ?? createLogger(`client:${sourceName}`);
  const session: HttpSession = createSession({ ...config.session, sourceName, clock });

  async function send(request: RequestDescriptor): Promise<ApiResponse> {
    const url = buildUrl(baseUrl, request.path, { ...authParams?.(), ...request.params });
    const safeUrl = redactUrl(url, secretParams);
    const method = request.method ?? 'GET';

    let body: string | undefined;
    let contentType = 'application/json';
    if (request.form) {
      body = new URLSearchParams({ ...request.form }).toString();
      contentType = 'application/x-www-form-urlencoded';
    } else if (request.body !== undefined) {
      body = JSON.stringify(request.body);
    }

    if (preRequestDelayMs) {
      await clock.sleep(preRequestDelayMs);
    }

    let retries = 0;

    while (true) {
      const headers: Record<string, string> = {
        'Content-Type': contentType,
        ...(await authHeaders()),
        ...extraHeaders,
        ...request.headers,
      };

      if (rateLimiter) await rateLimiter.acquire();
      log.debug({ method, url: safeUrl, attempt: retries + 1 }, 'request');

      const res = await session.send(url.toString(), { method, headers, body });

      if (policy.retryStatuses.includes(res.status)) {
        const errorBody = await res.text().catch(() => '');
        if (retries >= policy.maxRetries) {
          throw new RetryExhaustedError(sourceName, res.status, safeUrl, errorBody, retries);
        }
        const computed = policy.backoff === 'constant' ? policy.baseDelayMs : policy.baseDelayMs * 2 ** retries;
        const delayMs = policy.respectRetryAfter ? retryAfterMs(res) ?? computed : computed;
        retries++;
        log.warn({ status: res.status, url: safeUrl, retry: retries, delayMs }, 'transient failure, backing off');
        await clock.sleep(delayMs);
        continue;
      }

      const text = await res.text();

      if (!res.ok) {
        throw new HttpError(sourceName, res.status, safeUrl, text);
      }

      let payload: unknown = null;
      if (text.trim() !== '') {
        try {
          payload = JSON.parse(text);
        } catch {
          log.error({ url: safeUrl, status: res.status, body: text.slice(0, 500) }, 'undecodable response body');
          throw new MalformedPayloadError(sourceName, `response from ${safeUrl} is not valid JSON`, text);
        }
      }

      return { status: res.status, headers: res.headers, payload, url: safeUrl };
    }
  }

  async function request(path: string, options?: RequestOptions): Promise<unknown> {
    const response = await send({ ...options, path });
    return response.payload;
  }

  return { sourceName, send, request };
}
