/**
 * Pagination driver shared by all connectors.
 * Four dialects cover every vendor: declared page count (fanned out in
 * batches), continuation flag, opaque cursor, and offset/limit.
 */

import type { Logger } from '../../logger.js';
import { createLogger } from '../../logger.js';
import type { CheckpointStore } from './checkpoint.js';
import type { ConnectorClient } from './client.js';
import { systemClock, type Clock } from './clock.js';
import { MalformedPayloadError } from './errors.js';
import { FetchSession, type FetchOutcome } from './fetch-session.js';
import type {
  ApiResponse, CircuitBreaker, JsonRecord, MalformedPolicy, PageResult, PageToken, QueryParams, RequestDescriptor,
} from './types.js';

export type { FetchOutcome };

export type TokenApplier = (request: RequestDescriptor, token: PageToken) => RequestDescriptor;

/** Reads one page: the records plus whatever the dialect needs to continue. */
export type Extractor<P extends { records: JsonRecord[] }> = (response: ApiResponse) => P;

export interface CountPage { records: JsonRecord[]; totalPages: number }
export interface FlagPage { records: JsonRecord[]; more: boolean }
export interface CursorPage { records: JsonRecord[]; cursor: string | null }
export interface OffsetPage { records: JsonRecord[]; total?: number }

export interface DriverOptions {
  client: ConnectorClient;
  request: RequestDescriptor;
  /** Name used in log lines (default: source and path). */
  label?: string;
  breaker?: CircuitBreaker;
  onMalformedPage?: MalformedPolicy;
  /** Merges a page token into the request (default: a query parameter). */
  applyToken?: TokenApplier;
  onPage?: (result: PageResult) => void | Promise<void>;
  clock?: Clock;
  logger?: Logger;
}

interface Context {
  client: ConnectorClient;
  request: RequestDescriptor;
  applyToken: TokenApplier;
  malformed: MalformedPolicy;
  onPage?: (result: PageResult) => void | Promise<void>;
  clock: Clock;
  log: Logger;
  session: FetchSession;
}

interface Fetched<P> {
  result: PageResult;
  /** null when the page was skipped as malformed. */
  page: P | null;
}

// ---- Helpers ----

export function withParams(request: RequestDescriptor, params: QueryParams): RequestDescriptor {
  return { ...request, params: { ...request.params, ...params } };
}

export function tokenValue(token: PageToken): string | number {
  switch (token.kind) {
    case 'page': return token.page;
    case 'offset': return token.offset;
    case 'cursor': return token.cursor;
  }
}

/** Token applier that sets one query parameter. */
export function queryParamToken(name: string): TokenApplier {
  return (request, token) => withParams(request, { [name]: tokenValue(token) });
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError(`Chunk size must be positive, got ${size}`);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) chunks.push(items.slice(i, i + size));
  return chunks;
}

/** Awaits every promise, then rethrows the first failure if there was one. */
async function settleAll<T>(pending: Promise<T>[]): Promise<T[]> {
  const settled = await Promise.allSettled(pending);
  const values: T[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
    values.push(outcome.value);
  }
  return values;
}

/**
 * Runs `fn` over items in sequential batches; items within a batch run
 * concurrently. Used to fan out per-id or per-date requests.
 */
export async function runInBatches<I, O>(
  items: readonly I[],
  batchSize: number,
  fn: (item: I, index: number) => Promise<O>,
  options: { delayMs?: number; clock?: Clock } = {},
): Promise<O[]> {
  const { delayMs, clock = systemClock } = options;
  const results: O[] = [];
  const batches = chunk(items, batchSize);

  for (const [b, batch] of batches.entries()) {
    const offset = b * batchSize;
    results.push(...await settleAll(batch.map((item, i) => fn(item, offset + i))));
    if (delayMs && b < batches.length - 1) await clock.sleep(delayMs);
  }
  return results;
}

function createContext(opts: DriverOptions, defaultApplier: TokenApplier, request: RequestDescriptor = opts.request): Context {
  const clock = opts.clock ?? systemClock;
  const log = opts.logger ?? createLogger('pagination');
  const label = opts.label ?? `${opts.client.sourceName} ${opts.request.path}`;
  return {
    client: opts.client,
    request,
    applyToken: opts.applyToken ?? defaultApplier,
    malformed: opts.onMalformedPage ?? 'abort',
    onPage: opts.onPage,
    clock,
    log,
    session: new FetchSession(label, opts.breaker ?? {}, clock, log),
  };
}

async function fetchPage<P extends { records: JsonRecord[] }>(
  ctx: Context,
  token: PageToken | null,
  extract: Extractor<P>,
): Promise<Fetched<P>> {
  const request = token === null ? ctx.request : ctx.applyToken(ctx.request, token);
  ctx.session.countRequest();

  let fetched: Fetched<P>;
  try {
    const response = await ctx.client.send(request);
    const page = extract(response);
    fetched = { result: { status: 'success', token, payload: response.payload, records: page.records }, page };
  } catch (err) {
    if (!(err instanceof MalformedPayloadError) || ctx.malformed === 'abort') throw err;
    ctx.log.warn({ fetch: ctx.session.label, token, payload: err.payloadExcerpt }, `skipping malformed page: ${err.message}`);
    fetched = { result: { status: 'failure', token, payload: err.payloadExcerpt, records: [] }, page: null };
  }

  await ctx.onPage?.(fetched.result);
  return fetched;
}

const pageToken = (page: number): PageToken => ({ kind: 'page', page });

/**
 * Sequential dialects give up after this many malformed pages in a row under
 * the skip policy; past the end of a listing every page may be malformed.
 */
export const MAX_CONSECUTIVE_SKIPS = 3;

function pageRange(start: number, end: number): number[] {
  const pages: number[] = [];
  for (let p = start; p <= end; p++) pages.push(p);
  return pages;
}

// ---- Dialects ----

export interface CountOptions extends DriverOptions {
  extract: Extractor<CountPage>;
  /** Query parameter for the page number (default: "page"). */
  pageParam?: string;
  firstPage?: number;
  /** Pages requested concurrently per batch (default: 25). */
  batchSize?: number;
  /** Pause between batches, in ms. */
  batchDelayMs?: number;
}

/**
 * The first page declares the total page count; the remaining pages are
 * requested in concurrent batches, each batch fully settled before the next.
 */
export async function paginateCount(opts: CountOptions): Promise<FetchOutcome> {
  const { extract, firstPage = 1, batchSize = 25, batchDelayMs } = opts;
  if (batchSize < 1) throw new RangeError(`batchSize must be positive, got ${batchSize}`);
  const ctx = createContext(opts, queryParamToken(opts.pageParam ?? 'page'));
  const { session } = ctx;

  try {
    session.transition('fetching-first');
    const first = await fetchPage(ctx, pageToken(firstPage), extract);
    session.accept(first.result);

    if (first.page === null) {
      session.truncate('first page was malformed, page count unknown');
      return session.finish();
    }

    const lastPage = firstPage + first.page.totalPages - 1;
    if (first.result.records.length === 0 || lastPage <= firstPage) {
      return session.finish();
    }

    session.transition('fetching-next');
    for (let start = firstPage + 1; start <= lastPage; start += batchSize) {
      if (session.breakerTripped()) break;

      const end = Math.min(start + batchSize - 1, lastPage);
      const batch = await settleAll(pageRange(start, end).map(p => fetchPage(ctx, pageToken(p), extract)));
      for (const fetched of batch) session.accept(fetched.result);

      if (batch.some(f => f.page !== null && f.result.records.length === 0)) break;
      if (batchDelayMs && end < lastPage) await ctx.clock.sleep(batchDelayMs);
    }
    return session.finish();
  } catch (err) {
    throw session.fail(err);
  }
}

export interface FlagOptions extends DriverOptions {
  extract: Extractor<FlagPage>;
  /**
   * Query parameter for the page number (default: "page").
   * null re-sends the same request, for APIs that keep the position server-side.
   */
  pageParam?: string | null;
  firstPage?: number;
}

/** Sequential pages until the response says there is no more, or a page is empty. */
export async function paginateFlag(opts: FlagOptions): Promise<FetchOutcome> {
  const { extract, firstPage = 1 } = opts;
  const pageParam = opts.pageParam === undefined ? 'page' : opts.pageParam;
  const ctx = createContext(opts, queryParamToken(pageParam ?? 'page'));
  const { session } = ctx;

  let skipped = 0;

  try {
    session.transition('fetching-first');
    for (let page = firstPage; ; page++) {
      const fetched = await fetchPage(ctx, pageParam === null ? null : pageToken(page), extract);
      session.accept(fetched.result);

      if (fetched.page === null) {
        if (pageParam === null) {
          session.truncate('malformed page in a server-held session');
          break;
        }
        if (++skipped >= MAX_CONSECUTIVE_SKIPS) {
          session.truncate(`${skipped} malformed pages in a row, last at page ${page}`);
          break;
        }
      } else {
        skipped = 0;
        if (fetched.result.records.length === 0 || !fetched.page.more) break;
      }

      session.transition('fetching-next');
      if (session.breakerTripped()) break;
    }
    return session.finish();
  } catch (err) {
    throw session.fail(err);
  }
}

export interface WindowOptions extends DriverOptions {
  extract: Extractor<FlagPage>;
  /** Query parameter for the page number (default: "page"). */
  pageParam?: string;
  firstPage?: number;
  /** Pages requested concurrently after the first (default: 10). */
  windowSize?: number;
  /** No further window is started once one beginning after this page has been fetched. */
  lastWindowStart?: number;
}

const pageEnded = <P extends FlagPage>(f: Fetched<P>): boolean =>
  f.page !== null && (f.result.records.length === 0 || !f.page.more);

/**
 * For APIs with no page count: the first page alone, then concurrent windows
 * of consecutive page numbers until a page in a window is empty or says
 * there is no more.
 */
export async function paginateWindows(opts: WindowOptions): Promise<FetchOutcome> {
  const { extract, firstPage = 1, windowSize = 10, lastWindowStart } = opts;
  if (windowSize < 1) throw new RangeError(`windowSize must be positive, got ${windowSize}`);
  const ctx = createContext(opts, queryParamToken(opts.pageParam ?? 'page'));
  const { session } = ctx;

  try {
    session.transition('fetching-first');
    const first = await fetchPage(ctx, pageToken(firstPage), extract);
    session.accept(first.result);

    if (first.page === null) {
      session.truncate('first page was malformed');
      return session.finish();
    }
    if (pageEnded(first)) return session.finish();

    session.transition('fetching-next');
    for (let start = firstPage + 1; ; start += windowSize) {
      if (session.breakerTripped()) break;

      const end = start + windowSize - 1;
      const window = await settleAll(pageRange(start, end).map(p => fetchPage(ctx, pageToken(p), extract)));
      for (const fetched of window) session.accept(fetched.result);

      if (window.some(pageEnded)) break;
      if (window.every(f => f.page === null)) {
        session.truncate(`every page from ${start} to ${end} was malformed`);
        break;
      }
      if (lastWindowStart !== undefined && start > lastWindowStart) {
        session.truncate(`stopped at page ${end} (no window starts after page ${lastWindowStart})`);
        break;
      }
    }
    return session.finish();
  } catch (err) {
    throw session.fail(err);
  }
}

export interface CursorOptions extends DriverOptions {
  extract: Extractor<CursorPage>;
  /** Query parameter carrying the cursor (default: "cursor"). */
  cursorParam?: string;
  initialCursor?: string;
  /**
   * Persist each continuation cursor. Unless `resume` is false, the fetch
   * starts from the stored cursor.
   */
  checkpoint?: { store: CheckpointStore; name: string; resume?: boolean };
}

/**
 * Sequential cursor loop: each cursor comes from the immediately preceding
 * response. A missing cursor or an empty page ends the fetch.
 */
export async function paginateCursor(opts: CursorOptions): Promise<FetchOutcome> {
  const { extract, checkpoint } = opts;
  const ctx = createContext(opts, queryParamToken(opts.cursorParam ?? 'cursor'));
  const { session } = ctx;

  try {
    let cursor: string | null = opts.initialCursor
      ?? (checkpoint && checkpoint.resume !== false ? await checkpoint.store.load(checkpoint.name) : undefined)
      ?? null;
    const seen = new Set<string>(cursor === null ? [] : [cursor]);

    session.transition('fetching-first');
    while (true) {
      const fetched = await fetchPage(ctx, cursor === null ? null : { kind: 'cursor', cursor }, extract);
      session.accept(fetched.result);

      if (fetched.page === null) {
        session.truncate(`malformed page at cursor ${cursor ?? '(start)'}, next cursor unknown`);
        break;
      }

      const next = fetched.page.cursor;
      if (fetched.result.records.length === 0 || next === null) break;

      if (seen.has(next)) {
        session.truncate(`cursor ${next} was returned twice`);
        break;
      }
      seen.add(next);
      if (checkpoint) await checkpoint.store.save(checkpoint.name, next);

      session.transition('fetching-next');
      if (session.breakerTripped()) break;
      cursor = next;
    }
    return session.finish();
  } catch (err) {
    throw session.fail(err);
  }
}

export interface OffsetOptions extends DriverOptions {
  extract: Extractor<OffsetPage>;
  /** Page size (default: 100). */
  limit?: number;
  /** Query param name for offset (default: "offset"). */
  offsetParam?: string;
  /** Query param name for limit (default: "limit"). */
  limitParam?: string;
}

/** Increments the offset by `limit` until a short page or the declared total. */
export async function paginateOffset(opts: OffsetOptions): Promise<FetchOutcome> {
  const { extract, limit = 100, offsetParam = 'offset', limitParam = 'limit' } = opts;
  const ctx = createContext(opts, queryParamToken(offsetParam), withParams(opts.request, { [limitParam]: limit }));
  const { session } = ctx;
  let skipped = 0;

  try {
    session.transition('fetching-first');
    for (let offset = 0; ; offset += limit) {
      const fetched = await fetchPage(ctx, { kind: 'offset', offset }, extract);
      session.accept(fetched.result);

      if (fetched.page === null) {
        if (++skipped >= MAX_CONSECUTIVE_SKIPS) {
          session.truncate(`${skipped} malformed pages in a row, last at offset ${offset}`);
          break;
        }
      } else {
        skipped = 0;
        const count = fetched.result.records.length;
        const total = fetched.page.total;
        if (count === 0) break;
        if (total !== undefined ? offset + limit >= total : count < limit) break;
      }

      session.transition('fetching-next');
      if (session.breakerTripped()) break;
    }
    return session.finish();
  } catch (err) {
    throw session.fail(err);
  }
}
