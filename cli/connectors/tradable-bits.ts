import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, getPath, isRecord, mergeOutcomes, paginateCursor, paginateFlag, parseConfig,
  MalformedPayloadError, type ApiResponse, type ConnectorDeps, type FetchOptions, type JsonRecord, type Table,
} from './base/index.js';

export const TradableBitsConfigSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type TradableBitsConfig = z.input<typeof TradableBitsConfigSchema>;

function idCursor(payload: unknown, key: string): string | null {
  const id = getPath(payload, key);
  if (typeof id === 'number' || (typeof id === 'string' && id !== '')) return String(id);
  return null;
}

export class TradableBitsConnector extends Connector {
  private readonly apiKey: string;
  private readonly apiSecret: string;

  constructor(config: TradableBitsConfig, deps?: ConnectorDeps) {
    const { apiKey, apiSecret, options } = parseConfig(TradableBitsConfigSchema, config, 'Tradable Bits');
    super({
      source: 'tradable-bits',
      displayName: 'Tradable Bits',
      baseUrl: 'https://tradablebits.com/api/v1/crm',
      options,
    }, deps);
    this.apiKey = apiKey;
    this.apiSecret = apiSecret;
  }

  protected authHeaders(): Record<string, string> {
    return { 'Api-Key': this.apiKey, 'Api-Secret': this.apiSecret };
  }

  async getCampaigns(opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: 'campaigns' }, res => this.dataOf(res));
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  /**
   * The first request opens a search on the server; the same `search_uid`
   * is then re-sent, each time returning the next slice, until one is empty.
   */
  async getFans(opts: FetchOptions = {}): Promise<Table> {
    let searchUid = '';
    const first = await this.fetchOnce({ path: 'fans' }, res => {
      const uid = getPath(res.payload, 'meta.search_uid');
      if (typeof uid !== 'string' && typeof uid !== 'number') {
        throw new MalformedPayloadError(this.displayName, 'fans response has no meta.search_uid', res.payload);
      }
      searchUid = String(uid);
      return this.dataOf(res);
    });
    if (first.records.length === 0) return this.table(first, { flatten: '.', schema: opts.schema });

    const rest = await paginateFlag({
      ...this.driver('fans'),
      request: { path: 'fans', params: { search_uid: searchUid } },
      pageParam: null,
      extract: res => ({ records: this.dataOf(res), more: true }),
    });
    return this.table(mergeOutcomes([first, rest]), { flatten: '.', schema: opts.schema });
  }

  /**
   * With `sinceId`, walks forward from that activity id; otherwise walks
   * backward from the newest activity.
   */
  async getActivities(opts: FetchOptions & { sinceId?: number } = {}): Promise<Table> {
    const forward = opts.sinceId !== undefined;
    const outcome = await paginateCursor({
      ...this.driver('activities'),
      request: { path: 'activities' },
      cursorParam: forward ? 'min_activity_id' : 'max_activity_id',
      initialCursor: forward ? String(opts.sinceId) : undefined,
      extract: res => ({
        records: this.dataOf(res),
        cursor: idCursor(res.payload, forward ? 'meta.max_activity_id' : 'meta.min_activity_id'),
      }),
    });
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  /** Records live under `data` when present; otherwise the body is the record(s). */
  private dataOf(res: ApiResponse): JsonRecord[] {
    if (isRecord(res.payload) && 'data' in res.payload) return this.records(res.payload, 'data');
    if (isRecord(res.payload)) return [res.payload];
    return this.records(res.payload);
  }
}
