/**
 * Base class for every connector: validated options, one pooled client,
 * an optional shared rate limiter, and driver defaults for pagination.
 */

import { z } from 'zod';
import type { Logger } from '../../logger.js';
import { createLogger } from '../../logger.js';
import { toTable, extractRecords, type RowSchema, type Table } from './accumulator.js';
import { MemoryCheckpointStore, type CheckpointStore } from './checkpoint.js';
import { createClient, type ConnectorClient } from './client.js';
import { systemClock, type Clock } from './clock.js';
import { ConfigError } from './errors.js';
import { mergeOutcomes, type FetchOutcome } from './fetch-session.js';
import { runInBatches } from './pagination.js';
import { SlidingWindowRateLimiter } from './rate-limiter.js';
import type { ApiResponse, ConnectorSource, JsonRecord, QueryParams, RequestDescriptor, RetryPolicy } from './types.js';

// ---- Options ----

export const RateLimitSchema = z.object({
  maxRequests: z.number().int().positive(),
  windowMs: z.number().int().positive(),
}).strict();

export const ConnectorOptionsSchema = z.object({
  timeoutMs: z.number().int().positive(),
  transportRetries: z.number().int().min(0),
  maxRetries: z.number().int().min(0),
  baseDelayMs: z.number().min(0),
  batchSize: z.number().int().positive(),
  rateLimit: RateLimitSchema,
  maxIterations: z.number().int().positive(),
  maxElapsedMs: z.number().int().positive(),
  onMalformedPage: z.enum(['abort', 'skip']),
}).partial().strict();

export type ConnectorOptions = z.infer<typeof ConnectorOptionsSchema>;

/** Validates connector configuration, turning zod issues into one ConfigError. */
export function parseConfig<S extends z.ZodTypeAny>(schema: S, input: unknown, source: string): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(config)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(source, detail);
  }
  return parsed.data;
}

// ---- Base class ----

/** Collaborators a caller may inject; all have working defaults. */
export interface ConnectorDeps {
  clock?: Clock;
  logger?: Logger;
  checkpoints?: CheckpointStore;
  /** Share one limiter between connector instances hitting the same account. */
  rateLimiter?: SlidingWindowRateLimiter;
}

export interface ConnectorSetup {
  source: ConnectorSource;
  displayName: string;
  baseUrl: string;
  /** Caller options, already validated. */
  options?: ConnectorOptions;
  /** Connector defaults underneath the caller's options. */
  defaults?: ConnectorOptions;
  retryStatuses?: readonly number[];
  backoff?: RetryPolicy['backoff'];
  secretParams?: readonly string[];
  extraHeaders?: Record<string, string>;
  preRequestDelayMs?: number;
}

export interface DriverDefaults {
  client: ConnectorClient;
  label: string;
  breaker: { maxIterations?: number; maxElapsedMs?: number };
  onMalformedPage: 'abort' | 'skip';
  clock: Clock;
  logger: Logger;
}

export abstract class Connector {
  readonly source: ConnectorSource;
  readonly displayName: string;
  protected readonly client: ConnectorClient;
  protected readonly log: Logger;
  protected readonly clock: Clock;
  protected readonly options: ConnectorOptions;
  protected readonly checkpoints: CheckpointStore;
  protected readonly rateLimiter?: SlidingWindowRateLimiter;

  protected constructor(setup: ConnectorSetup, deps: ConnectorDeps = {}) {
    this.source = setup.source;
    this.displayName = setup.displayName;
    this.options = { ...setup.defaults, ...setup.options };
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createLogger(`connector:${setup.source}`);
    this.checkpoints = deps.checkpoints ?? new MemoryCheckpointStore();
    this.rateLimiter = deps.rateLimiter
      ?? (this.options.rateLimit ? new SlidingWindowRateLimiter(this.options.rateLimit, this.clock) : undefined);

    const { maxRetries, baseDelayMs, timeoutMs, transportRetries } = this.options;
    this.client = createClient({
      baseUrl: setup.baseUrl,
      sourceName: setup.displayName,
      authHeaders: () => this.authHeaders(),
      authParams: () => this.authParams(),
      secretParams: setup.secretParams,
      extraHeaders: setup.extraHeaders,
      preRequestDelayMs: setup.preRequestDelayMs,
      retry: {
        ...(maxRetries !== undefined ? { maxRetries } : {}),
        ...(baseDelayMs !== undefined ? { baseDelayMs } : {}),
        ...(setup.retryStatuses ? { retryStatuses: setup.retryStatuses } : {}),
        ...(setup.backoff ? { backoff: setup.backoff } : {}),
      },
      session: { timeoutMs, transportRetries },
      rateLimiter: this.rateLimiter,
      clock: this.clock,
      logger: this.log,
    });
  }

  /** Headers attached to every request; async when a token must be fetched first. */
  protected abstract authHeaders(): Record<string, string> | Promise<Record<string, string>>;

  /** Query parameters attached to every request. */
  protected authParams(): QueryParams {
    return {};
  }

  protected get batchSize(): number {
    return this.options.batchSize ?? 25;
  }

  /** Common pagination options for one resource. */
  protected driver(resource: string): DriverDefaults {
    return {
      client: this.client,
      label: `${this.displayName} ${resource}`,
      breaker: { maxIterations: this.options.maxIterations, maxElapsedMs: this.options.maxElapsedMs },
      onMalformedPage: this.options.onMalformedPage ?? 'abort',
      clock: this.clock,
      logger: this.log.child({ resource }),
    };
  }

  /** One unpaginated request. */
  protected async fetchOnce(
    request: RequestDescriptor,
    extract: (res: ApiResponse) => JsonRecord[],
  ): Promise<FetchOutcome> {
    const records = extract(await this.client.send(request));
    this.log.info({ fetch: `${this.displayName} ${request.path}`, requests: 1, records: records.length }, 'fetch complete');
    return { records, requests: 1, state: 'done' };
  }

  /** Runs one fetch per item in concurrent batches and merges the outcomes. */
  protected async fanOut<I>(
    items: readonly I[],
    fetch: (item: I) => Promise<FetchOutcome>,
    options: { batchSize?: number; delayMs?: number } = {},
  ): Promise<FetchOutcome> {
    const outcomes = await runInBatches(items, options.batchSize ?? this.batchSize, item => fetch(item), {
      delayMs: options.delayMs,
      clock: this.clock,
    });
    return mergeOutcomes(outcomes);
  }

  protected records(payload: unknown, key?: string): JsonRecord[] {
    return extractRecords(this.displayName, payload, key);
  }

  protected table(input: FetchOutcome | JsonRecord[], options: { flatten?: string; schema?: RowSchema } = {}): Table {
    return toTable(input, { source: this.displayName, ...options });
  }
}
