import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FortressConfigSchema, FortressConnector, normalizeIds, type FortressConfig } from '../../../connectors/fortress.js';
import { parseConfig } from '../../../connectors/base/index.js';
import {
  FakeClock, jsonResponse, requestBody, requestHeaders, requestInit, requestedUrls, routeFetch, stubFetch, type FetchStub,
} from '../_helpers.js';

let mockFetch: FetchStub;
let clock: FakeClock;

const config: FortressConfig = {
  apiKey: 'test-key',
  username: 'user',
  password: 'test-password',
  appId: 'app',
  agencyCode: 'AG',
  seasons: { '2023-24': 'https://crm.example.com/2324/api/CRM/' },
  pageSize: 2,
};

const query = {
  endpoint: 'members' as const,
  season: '2023-24',
  from: new Date('2024-03-01T00:00:00Z'),
  to: new Date('2024-03-02T00:00:00Z'),
};

beforeEach(() => {
  mockFetch = stubFetch();
  clock = new FakeClock();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('normalizeIds', () => {
  it('replaces non-numeric ids and leaves digits alone', () => {
    expect(normalizeIds({ accountID: 'A12', seat: 14, fbMemberID: '0031', name: 'x' }))
      .toEqual({ accountID: '999', seat: 14, fbMemberID: '0031', name: 'x' });
  });
});

describe('FortressConnector', () => {
  it('requires the season table', () => {
    const { seasons: _seasons, ...rest } = config;
    expect(() => parseConfig(FortressConfigSchema, rest, 'Fortress'))
      .toThrow('Fortress: invalid configuration — seasons: Required');
  });

  it('posts each page number in the body, one page per batch', async () => {
    let page = 0;
    routeFetch(mockFetch, () => {
      page++;
      return jsonResponse(
        { data: [{ accountID: `A${page}`, seat: page }], statistics: { numberOfPages: 3 } },
        200,
        { Date: 'Fri, 01 Mar 2024 17:00:00 GMT' },
      );
    });

    const table = await new FortressConnector(config, { clock }).getData(query);

    expect(requestedUrls(mockFetch).map(String)).toEqual(Array(3).fill(
      'https://crm.example.com/2324/api/CRM/MemberInformation_PagingStatistics/',
    ));
    expect(requestInit(mockFetch, 0).method).toBe('POST');
    expect(requestHeaders(mockFetch, 0).authorization).toBe('Basic dXNlcjp0ZXN0LXBhc3N3b3Jk');
    expect(requestBody(mockFetch, 0)).toEqual({
      Header: { Client_AppID: 'app', Client_APIKey: 'test-key', Client_AgencyCode: 'AG', UniqID: 1 },
      PageSize: 2,
      FromDateTime: '2024-03-01T00:00:00',
      ToDateTime: '2024-03-02T00:00:00',
      PageNumber: 1,
    });
    expect(mockFetch.mock.calls.map((_, i) => requestBody(mockFetch, i))).toMatchObject([
      { PageNumber: 1 }, { PageNumber: 2 }, { PageNumber: 3 },
    ]);
    expect(clock.sleeps).toEqual([4500]);
    expect(table.rows).toEqual([
      { accountID: '999', seat: 1, response_datetime: '2024-03-01 12:00:00' },
      { accountID: '999', seat: 2, response_datetime: '2024-03-01 12:00:00' },
      { accountID: '999', seat: 3, response_datetime: '2024-03-01 12:00:00' },
    ]);
  });

  it('rejects an unknown season before any request', async () => {
    const connector = new FortressConnector(config, { clock });

    await expect(connector.getData({ ...query, season: '1999-00' }))
      .rejects.toThrow('Fortress: unknown season "1999-00" (known: 2023-24)');
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
