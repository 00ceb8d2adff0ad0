import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  LONG_LIVED_TOKEN_CHECKPOINT, MetaConnector, appSecretProof, audiencePayload, sha256,
} from '../../../connectors/meta.js';
import { MemoryCheckpointStore } from '../../../connectors/base/index.js';
import {
  FakeClock, jsonResponse, requestForm, requestInit, requestedUrls, routeFetch, stubFetch, type FetchStub,
} from '../_helpers.js';

const EMAIL_HASH = '08168cd80dfd534ab0f10af10f1303fe00af2d43ab5c1432360d137f8197e17a';
const EMPTY_HASH = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const PHONE_HASH = '087b70dc5471064780d76c826ddf2cbbeab0ad578692b833b4c93db2e045b38b';

let mockFetch: FetchStub;
let clock: FakeClock;
let checkpoints: MemoryCheckpointStore;
let connector: MetaConnector;

const users = {
  columns: ['email', 'phone'],
  rows: [{ email: 'a@example.com', phone: 5551234 }, { email: 'a@example.com', phone: null }],
};

beforeEach(() => {
  mockFetch = stubFetch();
  clock = new FakeClock(1_700_000_000_500);
  checkpoints = new MemoryCheckpointStore();
  connector = new MetaConnector(
    { appId: 'app', appSecret: 'test-secret', accessToken: 'test-token', adAccountId: 'act_1' },
    { clock, checkpoints },
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('hashing', () => {
  it('hashes values as strings and missing values as empty', () => {
    expect(sha256('a@example.com')).toBe(EMAIL_HASH);
    expect(sha256(5551234)).toBe(PHONE_HASH);
    expect(sha256(null)).toBe(EMPTY_HASH);
  });

  it('signs the access token with the app secret', () => {
    expect(appSecretProof('test-secret', 'test-token'))
      .toBe('4bd72343ca044f8aab1d98f07606cdb1cf47df0c089ff7b5b2df44e40d869970');
  });

  it('builds the upload body in column order', () => {
    expect(audiencePayload(users.columns, users.rows)).toEqual({
      schema: ['EMAIL', 'PHONE'],
      data: [[EMAIL_HASH, PHONE_HASH], [EMAIL_HASH, EMPTY_HASH]],
    });
  });
});

describe('MetaConnector', () => {
  it('defaults the graph version and signs every request', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ id: '42' }));

    const created = await connector.createAudience('Fans', 'Season ticket holders');

    const url = requestedUrls(mockFetch)[0];
    expect(url.origin + url.pathname).toBe('https://graph.facebook.com/v20.0/act_1/customaudiences');
    expect(url.searchParams.get('access_token')).toBe('test-token');
    expect(url.searchParams.get('appsecret_proof')).toBe('4bd72343ca044f8aab1d98f07606cdb1cf47df0c089ff7b5b2df44e40d869970');
    expect(requestForm(mockFetch, 0)).toEqual({
      name: 'Fans',
      subtype: 'CUSTOM',
      description: 'Season ticket holders',
      customer_file_source: 'USER_PROVIDED_ONLY',
    });
    expect(created).toEqual({ id: '42' });
  });

  it('deletes users with a DELETE carrying the hashed payload', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ num_received: 2 }));

    const report = await connector.deleteAudienceUsers('aud1', users);

    expect(requestedUrls(mockFetch)[0].pathname).toBe('/v20.0/aud1/users');
    expect(requestInit(mockFetch, 0).method).toBe('DELETE');
    expect(JSON.parse(requestForm(mockFetch, 0).payload)).toEqual(audiencePayload(users.columns, users.rows));
    expect(report).toMatchObject({ succeeded: 1, failed: 0 });
  });

  it('replaces users under one session flagged as the last batch', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ session_id: 1 }));

    await connector.replaceAudienceUsers('aud1', users);

    expect(requestedUrls(mockFetch)[0].pathname).toBe('/v20.0/aud1/usersreplace');
    expect(JSON.parse(requestForm(mockFetch, 0).session))
      .toEqual({ session_id: 1_700_000_000, batch_seq: 1, last_batch_flag: true });
  });

  it('pages lead forms while paging.next is present', async () => {
    routeFetch(mockFetch, url => (url.searchParams.get('after') === 'c1'
      ? jsonResponse({ data: [{ id: 'f2' }], paging: { cursors: { after: 'c2' } } })
      : jsonResponse({ data: [{ id: 'f1' }], paging: { cursors: { after: 'c1' }, next: 'https://graph.facebook.com/next' } })));

    const table = await connector.getLeadgenForms('page1');

    expect(requestedUrls(mockFetch).map(u => u.pathname)).toEqual(['/v20.0/page1/leadgen_forms', '/v20.0/page1/leadgen_forms']);
    expect(table.rows).toEqual([{ id: 'f1' }, { id: 'f2' }]);
  });

  it('stores the long-lived token and signs later requests with it', async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ access_token: 'long-token' }))
      .mockResolvedValueOnce(jsonResponse({ operation_status: { code: 200 } }));

    await expect(connector.cacheLongLivedToken()).resolves.toBe('long-token');
    await connector.getAudienceInfo('aud1');

    const [exchange, info] = requestedUrls(mockFetch);
    expect(exchange.searchParams.get('grant_type')).toBe('fb_exchange_token');
    expect(exchange.searchParams.get('fb_exchange_token')).toBe('test-token');
    expect(info.searchParams.get('access_token')).toBe('long-token');
    expect(info.searchParams.get('appsecret_proof')).toBe('39c6d6312d94eeb22edf7343b00fdea5fd9bda8e6cd6da6e0257724b47a48382');
    await expect(checkpoints.load(LONG_LIVED_TOKEN_CHECKPOINT)).resolves.toBe('long-token');
  });
});
