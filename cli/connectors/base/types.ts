/**
 * Shared types for connector base modules.
 */

/** Function that returns auth headers (sync or async for token exchange). */
export type AuthHeaderFn = () => Record<string, string> | Promise<Record<string, string>>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | ReadonlyArray<string | number>;

export type QueryParams = Readonly<Record<string, QueryValue | undefined>>;

/** A JSON object as returned by a vendor API. */
export type JsonRecord = Record<string, unknown>;

/**
 * One logical request. Never mutated: the pagination driver derives a copy per
 * page with the page token merged in.
 */
export interface RequestDescriptor {
  readonly path: string;
  readonly method?: HttpMethod;
  readonly params?: QueryParams;
  /** JSON body. */
  readonly body?: unknown;
  /** application/x-www-form-urlencoded body; takes precedence over `body`. */
  readonly form?: Readonly<Record<string, string>>;
  readonly headers?: Readonly<Record<string, string>>;
}

/** Options for individual requests made through `ConnectorClient.request`. */
export type RequestOptions = Omit<RequestDescriptor, 'path'>;

export interface ApiResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON body; `null` when the body was empty (e.g. 204). */
  payload: unknown;
  /** Request URL with secret query parameters redacted. */
  url: string;
}

export type PageToken =
  | { kind: 'page'; page: number }
  | { kind: 'offset'; offset: number }
  | { kind: 'cursor'; cursor: string };

export type PageStatus = 'success' | 'failure' | 'retryable-failure';

export interface PageResult {
  status: PageStatus;
  token: PageToken | null;
  payload: unknown;
  records: JsonRecord[];
}

export interface RetryPolicy {
  /** Retries after the first attempt (default: 5). */
  maxRetries: number;
  /** Delay before the first retry (default: 1000). */
  baseDelayMs: number;
  /** 'exponential' doubles the delay on each further retry; 'constant' keeps it (default: 'exponential'). */
  backoff: 'exponential' | 'constant';
  /** Statuses retried with backoff (default: 429, 500, 502, 503, 504). */
  retryStatuses: readonly number[];
  /** Use a numeric Retry-After header instead of the computed delay (default: true). */
  respectRetryAfter: boolean;
}

export interface RateLimit {
  maxRequests: number;
  windowMs: number;
}

export interface CircuitBreaker {
  maxIterations?: number;
  maxElapsedMs?: number;
}

export type MalformedPolicy = 'abort' | 'skip';

/** All connector source names. */
export type ConnectorSource =
  | 'big-commerce'
  | 'blinkfire'
  | 'bump'
  | 'cheq'
  | 'formstack'
  | 'fortress'
  | 'gameday'
  | 'gemini'
  | 'greenhouse'
  | 'mailchimp'
  | 'meta'
  | 'nhl'
  | 'park-hub'
  | 'seatgeek'
  | 'tradable-bits'
  | 'yellow-dog';
