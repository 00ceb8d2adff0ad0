import { describe, it, expect } from 'vitest';
import {
  paginateCount, paginateFlag, paginateWindows, paginateCursor, paginateOffset, runInBatches, chunk,
  type CountPage, type CursorPage, type Extractor,
} from '../../connectors/base/pagination.js';
import { extractRecords, getPath, requireNumber } from '../../connectors/base/accumulator.js';
import { MemoryCheckpointStore } from '../../connectors/base/checkpoint.js';
import type { ConnectorClient } from '../../connectors/base/client.js';
import { HttpError, MalformedPayloadError } from '../../connectors/base/errors.js';
import type { PageResult, RequestDescriptor } from '../../connectors/base/types.js';
import { FakeClock } from './_helpers.js';

// In-process client: the handler maps each request to a payload (or throws)
function fakeClient(handler: (req: RequestDescriptor) => unknown) {
  const requests: RequestDescriptor[] = [];
  const events: string[] = [];
  let inFlight = 0;
  let maxInFlight = 0;

  const client: ConnectorClient = {
    sourceName: 'Test',
    async send(req) {
      requests.push(req);
      const tag = String(req.params?.page ?? req.params?.cursor ?? req.params?.offset ?? '-');
      events.push(`start:${tag}`);
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await Promise.resolve();
      inFlight--;
      events.push(`end:${tag}`);
      return { status: 200, headers: new Headers(), payload: handler(req), url: req.path };
    },
    async request(path, options) {
      return (await client.send({ ...options, path })).payload;
    },
  };
  return { client, requests, events, maxInFlight: () => maxInFlight };
}

const countExtract: Extractor<CountPage> = res => ({
  records: extractRecords('Test', res.payload, 'data'),
  totalPages: requireNumber('Test', res.payload, 'total'),
});

const cursorExtract: Extractor<CursorPage> = res => {
  const next = getPath(res.payload, 'next_cursor');
  return { records: extractRecords('Test', res.payload, 'items'), cursor: typeof next === 'string' ? next : null };
};

/** Every page holds one record `{ page }` and declares `total` pages. */
function countPages(total: number, overrides: Record<number, unknown> = {}) {
  return fakeClient(req => {
    const page = Number(req.params?.page);
    return page in overrides ? overrides[page] : { data: [{ page }], total };
  });
}

const pagesOf = (requests: RequestDescriptor[]) => requests.map(r => r.params?.page);

describe('paginateCount', () => {
  it('issues exactly one request when the first page declares one page', async () => {
    const { client, requests } = countPages(1);

    const outcome = await paginateCount({ client, request: { path: 'items' }, extract: countExtract });

    expect(requests).toHaveLength(1);
    expect(outcome).toEqual({ records: [{ page: 1 }], requests: 1, state: 'done' });
  });

  it('fetches the remaining pages in concurrent batches', async () => {
    const { client, requests, events, maxInFlight } = countPages(7);

    const outcome = await paginateCount({ client, request: { path: 'items' }, extract: countExtract, batchSize: 5 });

    expect(pagesOf(requests)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(maxInFlight()).toBe(5);
    // Page 7 starts only once the whole first batch has settled
    const start7 = events.indexOf('start:7');
    for (const p of [2, 3, 4, 5, 6]) expect(events.indexOf(`end:${p}`)).toBeLessThan(start7);
    expect(outcome.records.map(r => r.page)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(outcome.requests).toBe(7);
  });

  it('stops when the first page is empty', async () => {
    const { client, requests } = countPages(5, { 1: { data: [], total: 5 } });

    const outcome = await paginateCount({ client, request: { path: 'items' }, extract: countExtract });

    expect(requests).toHaveLength(1);
    expect(outcome.records).toEqual([]);
    expect(outcome.state).toBe('done');
  });

  it('stops after the batch in which a page comes back empty', async () => {
    const { client, requests } = countPages(10, { 3: { data: [], total: 10 } });

    const outcome = await paginateCount({ client, request: { path: 'items' }, extract: countExtract, batchSize: 3 });

    expect(pagesOf(requests)).toEqual([1, 2, 3, 4]);
    expect(outcome.records.map(r => r.page)).toEqual([1, 2, 4]);
  });

  it('pauses between batches but not after the last one', async () => {
    const clock = new FakeClock();
    const { client } = countPages(7);

    await paginateCount({ client, request: { path: 'items' }, extract: countExtract, batchSize: 5, batchDelayMs: 100, clock });

    expect(clock.sleeps).toEqual([100]);
  });

  it('uses the configured page parameter and first page', async () => {
    const { client, requests } = fakeClient(req => ({ data: [{ p: req.params?.pageNumber }], total: 2 }));

    const outcome = await paginateCount({
      client, request: { path: 'items' }, extract: countExtract, pageParam: 'pageNumber', firstPage: 0,
    });

    expect(requests.map(r => r.params?.pageNumber)).toEqual([0, 1]);
    expect(outcome.records).toEqual([{ p: 0 }, { p: 1 }]);
  });

  it('truncates once the iteration ceiling is reached at a batch boundary', async () => {
    const { client, requests } = countPages(10);

    const outcome = await paginateCount({
      client, request: { path: 'items' }, extract: countExtract, batchSize: 2, breaker: { maxIterations: 3 },
    });

    expect(pagesOf(requests)).toEqual([1, 2, 3]);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('stopped after 3 requests (iteration ceiling 3)');
    expect(outcome.records).toHaveLength(3);
  });

  it('rejects with the page error after the rest of the batch settles', async () => {
    const { client, requests } = fakeClient(req => {
      const page = Number(req.params?.page);
      if (page === 3) throw new HttpError('Test', 400, 'items?page=3', 'bad page');
      return { data: [{ page }], total: 4 };
    });

    await expect(paginateCount({ client, request: { path: 'items' }, extract: countExtract }))
      .rejects.toBeInstanceOf(HttpError);
    expect(pagesOf(requests)).toEqual([1, 2, 3, 4]);
  });

  it('aborts on a malformed page by default', async () => {
    const { client } = countPages(3, { 2: { data: 'oops', total: 3 } });

    await expect(paginateCount({ client, request: { path: 'items' }, extract: countExtract }))
      .rejects.toThrow('Test: expected a record list at "data"');
  });

  it('skips a malformed page under the skip policy', async () => {
    const { client } = countPages(3, { 2: { data: 'oops', total: 3 } });
    const seen: PageResult[] = [];

    const outcome = await paginateCount({
      client, request: { path: 'items' }, extract: countExtract, onMalformedPage: 'skip', onPage: r => { seen.push(r); },
    });

    expect(outcome.records.map(r => r.page)).toEqual([1, 3]);
    expect(outcome.state).toBe('done');
    expect(seen.map(r => r.status)).toEqual(['success', 'failure', 'success']);
  });

  it('truncates when the first page is malformed under the skip policy', async () => {
    const { client } = countPages(3, { 1: { data: [], total: 'many' } });

    const outcome = await paginateCount({ client, request: { path: 'items' }, extract: countExtract, onMalformedPage: 'skip' });

    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('first page was malformed, page count unknown');
  });

  it('rejects a batch size below one', async () => {
    const { client } = countPages(1);
    await expect(paginateCount({ client, request: { path: 'items' }, extract: countExtract, batchSize: 0 }))
      .rejects.toThrow(RangeError);
  });
});

describe('paginateFlag', () => {
  const flagExtract: Extractor<{ records: Record<string, unknown>[]; more: boolean }> = res => ({
    records: extractRecords('Test', res.payload, 'results'),
    more: getPath(res.payload, 'more') === true,
  });

  it('follows pages until the response says there are no more', async () => {
    const { client, requests } = fakeClient(req => {
      const page = Number(req.params?.page);
      return { results: [{ page }], more: page < 3 };
    });

    const outcome = await paginateFlag({ client, request: { path: 'orders' }, extract: flagExtract });

    expect(pagesOf(requests)).toEqual([1, 2, 3]);
    expect(outcome.records).toEqual([{ page: 1 }, { page: 2 }, { page: 3 }]);
  });

  it('stops on an empty page even when more is set', async () => {
    const { client, requests } = fakeClient(req => {
      const page = Number(req.params?.page);
      return { results: page === 2 ? [] : [{ page }], more: true };
    });

    await paginateFlag({ client, request: { path: 'orders' }, extract: flagExtract });

    expect(requests).toHaveLength(2);
  });

  it('re-sends the same request when the position is held by the server', async () => {
    const slices = [[{ id: 1 }], [{ id: 2 }], []];
    let call = 0;
    const { client, requests } = fakeClient(() => ({ results: slices[call++], more: true }));
    const request = { path: 'fans', params: { search_uid: 'u1' } };

    const outcome = await paginateFlag({ client, request, extract: flagExtract, pageParam: null });

    expect(requests).toEqual([request, request, request]);
    expect(outcome.records).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it('truncates a server-held session at a malformed page under the skip policy', async () => {
    let call = 0;
    const { client, requests } = fakeClient(() => (call++ === 0 ? { results: [{ id: 1 }], more: true } : { results: null }));

    const outcome = await paginateFlag({
      client, request: { path: 'fans' }, extract: flagExtract, pageParam: null, onMalformedPage: 'skip',
    });

    expect(requests).toHaveLength(2);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('malformed page in a server-held session');
    expect(outcome.records).toEqual([{ id: 1 }]);
  });

  it('skips an isolated malformed page and carries on', async () => {
    const { client, requests } = fakeClient(req => {
      const page = Number(req.params?.page);
      return page === 2 ? { results: 'oops' } : { results: [{ page }], more: page < 3 };
    });

    const outcome = await paginateFlag({ client, request: { path: 'orders' }, extract: flagExtract, onMalformedPage: 'skip' });

    expect(pagesOf(requests)).toEqual([1, 2, 3]);
    expect(outcome.state).toBe('done');
    expect(outcome.records).toEqual([{ page: 1 }, { page: 3 }]);
  });

  it('gives up after three malformed pages in a row under the skip policy', async () => {
    const { client, requests } = fakeClient(req => {
      const page = Number(req.params?.page);
      return page === 1 ? { results: [{ page }], more: true } : { error: 'no such page' };
    });

    const outcome = await paginateFlag({ client, request: { path: 'menu' }, extract: flagExtract, onMalformedPage: 'skip' });

    expect(pagesOf(requests)).toEqual([1, 2, 3, 4]);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('3 malformed pages in a row, last at page 4');
    expect(outcome.records).toEqual([{ page: 1 }]);
  });

  it('truncates at the iteration ceiling', async () => {
    const { client, requests } = fakeClient(req => ({ results: [{ page: req.params?.page }], more: true }));

    const outcome = await paginateFlag({
      client, request: { path: 'orders' }, extract: flagExtract, breaker: { maxIterations: 2 },
    });

    expect(requests).toHaveLength(2);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('stopped after 2 requests (iteration ceiling 2)');
  });

  it('truncates at the time ceiling', async () => {
    const clock = new FakeClock();
    const { client, requests } = fakeClient(req => {
      clock.advance(400);
      return { results: [{ page: req.params?.page }], more: true };
    });

    const outcome = await paginateFlag({
      client, request: { path: 'orders' }, extract: flagExtract, breaker: { maxElapsedMs: 1000 }, clock,
    });

    expect(requests).toHaveLength(3);
    expect(outcome.notice).toBe('stopped after 1200ms (time ceiling 1000ms)');
  });
});

describe('paginateCursor', () => {
  /** Responses keyed by the cursor they answer ('' for the first request). */
  function cursorPages(pages: Record<string, unknown>) {
    return fakeClient(req => pages[String(req.params?.cursor ?? '')]);
  }

  it('stops after the response without a next cursor, with no further request', async () => {
    const { client, requests } = cursorPages({
      '': { items: [{ id: 'a' }], next_cursor: 'c1' },
      c1: { items: [{ id: 'b' }], next_cursor: 'c2' },
      c2: { items: [{ id: 'c' }] },
    });

    const outcome = await paginateCursor({ client, request: { path: 'sales' }, extract: cursorExtract });

    expect(requests.map(r => r.params?.cursor)).toEqual([undefined, 'c1', 'c2']);
    expect(outcome.records).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
    expect(outcome.state).toBe('done');
  });

  it('stops on an empty page even with a next cursor', async () => {
    const { client, requests } = cursorPages({
      '': { items: [{ id: 'a' }], next_cursor: 'c1' },
      c1: { items: [], next_cursor: 'c2' },
    });

    await paginateCursor({ client, request: { path: 'sales' }, extract: cursorExtract });

    expect(requests).toHaveLength(2);
  });

  it('truncates when a cursor comes back twice', async () => {
    const { client, requests } = cursorPages({
      '': { items: [{ id: 'a' }], next_cursor: 'c1' },
      c1: { items: [{ id: 'b' }], next_cursor: 'c1' },
    });

    const outcome = await paginateCursor({ client, request: { path: 'sales' }, extract: cursorExtract });

    expect(requests).toHaveLength(2);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('cursor c1 was returned twice');
    expect(outcome.records).toHaveLength(2);
  });

  it('sends the cursor under the configured parameter', async () => {
    const { client, requests } = fakeClient(req =>
      req.params?.after === undefined ? { items: [{ id: 1 }], next_cursor: 'x' } : { items: [{ id: 2 }] });

    await paginateCursor({ client, request: { path: 'leads' }, extract: cursorExtract, cursorParam: 'after' });

    expect(requests.map(r => r.params?.after)).toEqual([undefined, 'x']);
  });

  it('stores each next cursor and resumes from the stored one', async () => {
    const pages = {
      '': { items: [{ id: 'a' }], next_cursor: 'c1' },
      c1: { items: [{ id: 'b' }], next_cursor: 'c2' },
      c2: { items: [{ id: 'c' }] },
    };
    const store = new MemoryCheckpointStore();

    await paginateCursor({ client: cursorPages(pages).client, request: { path: 'sales' }, extract: cursorExtract, checkpoint: { store, name: 'sales' } });
    expect(store.entries()).toEqual({ sales: 'c2' });

    const resumed = cursorPages(pages);
    const outcome = await paginateCursor({ client: resumed.client, request: { path: 'sales' }, extract: cursorExtract, checkpoint: { store, name: 'sales' } });
    expect(resumed.requests.map(r => r.params?.cursor)).toEqual(['c2']);
    expect(outcome.records).toEqual([{ id: 'c' }]);
  });

  it('ignores the stored cursor when resume is off', async () => {
    const store = new MemoryCheckpointStore({ sales: 'c9' });
    const { client, requests } = cursorPages({ '': { items: [{ id: 'a' }] } });

    await paginateCursor({
      client, request: { path: 'sales' }, extract: cursorExtract, checkpoint: { store, name: 'sales', resume: false },
    });

    expect(requests.map(r => r.params?.cursor)).toEqual([undefined]);
  });

  it('prefers an explicit initial cursor over the stored one', async () => {
    const store = new MemoryCheckpointStore({ sales: 'c9' });
    const { client, requests } = cursorPages({ c5: { items: [{ id: 'a' }] } });

    await paginateCursor({
      client, request: { path: 'sales' }, extract: cursorExtract, initialCursor: 'c5', checkpoint: { store, name: 'sales' },
    });

    expect(requests.map(r => r.params?.cursor)).toEqual(['c5']);
  });

  it('truncates at a malformed page under the skip policy', async () => {
    const { client } = cursorPages({
      '': { items: [{ id: 'a' }], next_cursor: 'c1' },
      c1: { items: 'broken' },
    });

    const outcome = await paginateCursor({
      client, request: { path: 'sales' }, extract: cursorExtract, onMalformedPage: 'skip',
    });

    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('malformed page at cursor c1, next cursor unknown');
    expect(outcome.records).toEqual([{ id: 'a' }]);
  });

  it('aborts on a malformed page by default', async () => {
    const { client } = cursorPages({ '': { items: [1, 2] } });

    await expect(paginateCursor({ client, request: { path: 'sales' }, extract: cursorExtract }))
      .rejects.toBeInstanceOf(MalformedPayloadError);
  });
});

describe('paginateOffset', () => {
  it('advances by the limit until the declared total is covered', async () => {
    const { client, requests } = fakeClient(req => ({
      members: [{ at: req.params?.offset }, { at: Number(req.params?.offset) + 1 }],
      total_items: 5,
    }));

    const outcome = await paginateOffset({
      client,
      request: { path: 'lists' },
      limit: 2,
      extract: res => ({
        records: extractRecords('Test', res.payload, 'members'),
        total: requireNumber('Test', res.payload, 'total_items'),
      }),
    });

    expect(requests.map(r => r.params)).toEqual([
      { limit: 2, offset: 0 },
      { limit: 2, offset: 2 },
      { limit: 2, offset: 4 },
    ]);
    expect(outcome.records).toHaveLength(6);
  });

  it('stops on a short page when no total is declared', async () => {
    const { client, requests } = fakeClient(req => ({
      rows: req.params?.offset === 0 ? [{ a: 1 }, { a: 2 }, { a: 3 }] : [{ a: 4 }],
    }));

    const outcome = await paginateOffset({
      client,
      request: { path: 'rows' },
      limit: 3,
      limitParam: 'count',
      extract: res => ({ records: extractRecords('Test', res.payload, 'rows') }),
    });

    expect(requests.map(r => r.params)).toEqual([{ count: 3, offset: 0 }, { count: 3, offset: 3 }]);
    expect(outcome.records).toHaveLength(4);
  });

  it('gives up after three malformed pages in a row under the skip policy', async () => {
    const { client, requests } = fakeClient(req => (req.params?.offset === 0 ? { rows: [{ a: 1 }, { a: 2 }] } : { rows: {} }));

    const outcome = await paginateOffset({
      client,
      request: { path: 'rows' },
      limit: 2,
      onMalformedPage: 'skip',
      extract: res => ({ records: extractRecords('Test', res.payload, 'rows') }),
    });

    expect(requests.map(r => r.params?.offset)).toEqual([0, 2, 4, 6]);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('3 malformed pages in a row, last at offset 6');
  });
});

describe('paginateWindows', () => {
  const windowExtract: Extractor<{ records: Record<string, unknown>[]; more: boolean }> = res => {
    const records = extractRecords('Test', res.payload, 'rows');
    return { records, more: records.length >= 2 };
  };

  /** Pages 1..full hold two rows; later pages are empty. */
  function windowPages(full: number, overrides: Record<number, unknown> = {}) {
    return fakeClient(req => {
      const page = Number(req.params?.page);
      if (page in overrides) return overrides[page];
      return { rows: page <= full ? [{ page }, { page }] : [] };
    });
  }

  it('stops after the first page when it is short', async () => {
    const { client, requests } = windowPages(0, { 1: { rows: [{ page: 1 }] } });

    const outcome = await paginateWindows({ client, request: { path: 'orders' }, extract: windowExtract, windowSize: 4 });

    expect(requests).toHaveLength(1);
    expect(outcome).toEqual({ records: [{ page: 1 }], requests: 1, state: 'done' });
  });

  it('requests each window concurrently and stops after the window holding the last page', async () => {
    const { client, requests, maxInFlight } = windowPages(6);

    const outcome = await paginateWindows({ client, request: { path: 'orders' }, extract: windowExtract, windowSize: 4 });

    expect(pagesOf(requests)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(maxInFlight()).toBe(4);
    expect(outcome.state).toBe('done');
    expect(outcome.records).toHaveLength(12);
  });

  it('starts no window after one that began past the last window start', async () => {
    const { client, requests } = windowPages(100);

    const outcome = await paginateWindows({
      client, request: { path: 'orders' }, extract: windowExtract, windowSize: 3, lastWindowStart: 4,
    });

    // Windows 2-4 and 5-7; 5 is past the last start
    expect(requests).toHaveLength(7);
    expect(outcome.state).toBe('truncated');
    expect(outcome.notice).toBe('stopped at page 7 (no window starts after page 4)');
  });

  it('truncates when a whole window is malformed under the skip policy', async () => {
    const { client, requests } = fakeClient(req => (req.params?.page === 1 ? { rows: [{ a: 1 }, { a: 2 }] } : { rows: null }));

    const outcome = await paginateWindows({
      client, request: { path: 'orders' }, extract: windowExtract, windowSize: 3, onMalformedPage: 'skip',
    });

    expect(requests).toHaveLength(4);
    expect(outcome.notice).toBe('every page from 2 to 4 was malformed');
    expect(outcome.records).toHaveLength(2);
  });
});

describe('runInBatches', () => {
  it('keeps input order and pauses between batches', async () => {
    const clock = new FakeClock();

    const results = await runInBatches([1, 2, 3, 4, 5], 2, async (n, i) => `${i}:${n * 10}`, { delayMs: 50, clock });

    expect(results).toEqual(['0:10', '1:20', '2:30', '3:40', '4:50']);
    expect(clock.sleeps).toEqual([50, 50]);
  });
});

describe('chunk', () => {
  it('splits into fixed-size groups with a short tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('rejects a size below one', () => {
    expect(() => chunk([1], 0)).toThrow('Chunk size must be positive, got 0');
  });
});
