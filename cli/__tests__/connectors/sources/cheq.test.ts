import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CheqConnector } from '../../../connectors/cheq.js';
import { MalformedPayloadError } from '../../../connectors/base/index.js';
import { FakeClock, jsonResponse, requestHeaders, requestedUrls, routeFetch, stubFetch, type FetchStub } from '../_helpers.js';

let mockFetch: FetchStub;
let connector: CheqConnector;

beforeEach(() => {
  mockFetch = stubFetch();
  connector = new CheqConnector({ apiKey: 'test-key' }, { clock: new FakeClock() });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('CheqConnector', () => {
  it('pages orders until end is set, filtering on every payment status', async () => {
    routeFetch(mockFetch, url => {
      const page = Number(url.searchParams.get('page'));
      return jsonResponse({ results: [{ order: page }], end: page === 2 });
    });

    const table = await connector.getSales(new Date('2024-03-05T00:00:00Z'), new Date('2024-03-05T23:59:59Z'));

    const urls = requestedUrls(mockFetch);
    expect(urls).toHaveLength(2);
    expect(urls[0].pathname).toBe('/api/orders');
    expect(urls[0].searchParams.get('start_range')).toBe('2024-03-05T00:00:00Z');
    expect(urls[0].searchParams.get('end_range')).toBe('2024-03-05T23:59:59Z');
    expect(urls[0].searchParams.getAll('payment_status')).toEqual(['1', '2', '3', '4', '5', '6', '7', '8']);
    expect(urls[1].searchParams.get('page')).toBe('2');
    expect(requestHeaders(mockFetch, 0)['x-api-key']).toBe('test-key');
    expect(table.rows).toEqual([{ order: 1 }, { order: 2 }]);
  });

  it('narrows to the requested payment statuses', async () => {
    routeFetch(mockFetch, () => jsonResponse({ results: [], end: true }));

    await connector.getSales(new Date('2024-03-05T00:00:00Z'), new Date('2024-03-06T00:00:00Z'), { paymentStatuses: [2, 5] });

    expect(requestedUrls(mockFetch)[0].searchParams.getAll('payment_status')).toEqual(['2', '5']);
  });

  it('wraps a single menu object as one row', async () => {
    routeFetch(mockFetch, () => jsonResponse({ results: { id: 'menu-1', name: 'Main' }, end: true }));

    const table = await connector.getMenu();

    expect(table.rows).toEqual([{ id: 'menu-1', name: 'Main' }]);
  });

  it('rejects a page without an end flag', async () => {
    routeFetch(mockFetch, () => jsonResponse({ results: [] }));

    const err = await connector.getMenu().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MalformedPayloadError);
    expect(err).toMatchObject({ message: 'Cheq: expected a boolean at "end"' });
  });

  it('stops skipping after three malformed pages in a row and reports it', async () => {
    const skipping = new CheqConnector({ apiKey: 'test-key', options: { onMalformedPage: 'skip' } }, { clock: new FakeClock() });
    routeFetch(mockFetch, url => (url.searchParams.get('page') === '1'
      ? jsonResponse({ results: { id: 'menu-1' }, end: false })
      : jsonResponse({ error: 'no such page' })));

    const table = await skipping.getMenu();

    expect(requestedUrls(mockFetch).map(u => u.searchParams.get('page'))).toEqual(['1', '2', '3', '4']);
    expect(table.rows).toEqual([{ id: 'menu-1' }]);
    expect(table.notice).toBe('3 malformed pages in a row, last at page 4');
  });
});
