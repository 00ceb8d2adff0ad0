import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TradableBitsConnector } from '../../../connectors/tradable-bits.js';
import { FakeClock, jsonResponse, requestHeaders, requestedUrls, routeFetch, stubFetch, type FetchStub } from '../_helpers.js';

let mockFetch: FetchStub;
let connector: TradableBitsConnector;

beforeEach(() => {
  mockFetch = stubFetch();
  connector = new TradableBitsConnector({ apiKey: 'test-key', apiSecret: 'test-secret' }, { clock: new FakeClock() });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('TradableBitsConnector', () => {
  it('sends both key headers and flattens with dots', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [{ id: 1, owner: { name: 'A' } }] }));

    const table = await connector.getCampaigns();

    expect(requestHeaders(mockFetch, 0)).toMatchObject({ 'api-key': 'test-key', 'api-secret': 'test-secret' });
    expect(table).toMatchObject({ columns: ['id', 'owner.name'], rows: [{ id: 1, 'owner.name': 'A' }] });
  });

  it('re-sends the search uid until the server returns an empty slice', async () => {
    let slices = 0;
    routeFetch(mockFetch, url => {
      if (!url.searchParams.has('search_uid')) {
        return jsonResponse({ meta: { search_uid: 's1' }, data: [{ fan_id: 1 }] });
      }
      slices++;
      return jsonResponse({ data: slices === 1 ? [{ fan_id: 2 }] : [] });
    });

    const table = await connector.getFans();

    expect(requestedUrls(mockFetch).map(u => u.search)).toEqual(['', '?search_uid=s1', '?search_uid=s1']);
    expect(table.rows).toEqual([{ fan_id: 1 }, { fan_id: 2 }]);
  });

  it('stops after the first fans request when it is empty', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ meta: { search_uid: 's1' }, data: [] }));

    const table = await connector.getFans();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(table.rows).toEqual([]);
  });

  it('walks activities backward from the newest', async () => {
    routeFetch(mockFetch, url => (url.searchParams.has('max_activity_id')
      ? jsonResponse({ meta: { min_activity_id: 80 }, data: [] })
      : jsonResponse({ meta: { min_activity_id: 90 }, data: [{ activity_id: 100 }] })));

    const table = await connector.getActivities();

    expect(requestedUrls(mockFetch).map(u => u.search)).toEqual(['', '?max_activity_id=90']);
    expect(table.rows).toEqual([{ activity_id: 100 }]);
  });

  it('walks activities forward from a known id', async () => {
    routeFetch(mockFetch, url => (url.searchParams.get('min_activity_id') === '10'
      ? jsonResponse({ meta: { max_activity_id: 12 }, data: [{ activity_id: 11 }, { activity_id: 12 }] })
      : jsonResponse({ meta: { max_activity_id: 12 }, data: [] })));

    const table = await connector.getActivities({ sinceId: 10 });

    expect(requestedUrls(mockFetch).map(u => u.search)).toEqual(['?min_activity_id=10', '?min_activity_id=12']);
    expect(table.rows).toHaveLength(2);
  });
});
