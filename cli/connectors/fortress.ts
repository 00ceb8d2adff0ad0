import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, paginateCount, parseConfig, requireNumber, tokenValue,
  type ConnectorDeps, type FetchOptions, type JsonRecord, type Table,
} from './base/index.js';
import { isoSeconds, zonedDateTime } from './base/dates.js';

export const FORTRESS_ENDPOINTS = {
  attendance: 'TimeAttendanceInformation_Paging/',
  events: 'EventInformation_PagingStatistics/',
  members: 'MemberInformation_PagingStatistics/',
  tickets: 'TicketInformation_PagingStatistics/',
} as const;

export type FortressEndpoint = keyof typeof FORTRESS_ENDPOINTS;

export const FortressConfigSchema = z.object({
  apiKey: z.string().min(1),
  username: z.string().min(1),
  password: z.string().min(1),
  appId: z.string().min(1),
  agencyCode: z.string().min(1),
  /** CRM base URL per season label, e.g. { "2024-25": "https://.../api/CRM" }. */
  seasons: z.record(z.string(), z.string().url()),
  /** Zone the `response_datetime` column is expressed in. */
  timeZone: z.string().default('America/New_York'),
  pageSize: z.number().int().positive().default(1000),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type FortressConfig = z.input<typeof FortressConfigSchema>;

/** Columns that must hold digits; anything else is replaced by this placeholder. */
const NUMERIC_ID_COLUMNS = ['fbMemberID', 'accountID', 'seat'];
export const NON_NUMERIC_ID = '999';

export function normalizeIds(record: JsonRecord): JsonRecord {
  const normalized: JsonRecord = { ...record };
  for (const column of NUMERIC_ID_COLUMNS) {
    if (column in normalized && !/^\d+$/.test(String(normalized[column]))) normalized[column] = NON_NUMERIC_ID;
  }
  return normalized;
}

export interface FortressQuery extends FetchOptions {
  endpoint: FortressEndpoint;
  from: Date;
  to: Date;
  season: string;
}

/**
 * Fortress CRM paging endpoints. Every call is a POST whose body carries the
 * API key and the page number; pages are fetched one at a time.
 */
export class FortressConnector extends Connector {
  private readonly config: z.output<typeof FortressConfigSchema>;

  constructor(config: FortressConfig, deps?: ConnectorDeps) {
    const parsed = parseConfig(FortressConfigSchema, config, 'Fortress');
    super({
      source: 'fortress',
      displayName: 'Fortress',
      // Request paths are absolute season URLs
      baseUrl: '',
      options: parsed.options,
      defaults: { batchSize: 1, maxRetries: 5, baseDelayMs: 2000 },
    }, deps);
    this.config = parsed;
  }

  protected authHeaders(): Record<string, string> {
    const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
    return { Authorization: `Basic ${credentials}` };
  }

  get seasons(): string[] {
    return Object.keys(this.config.seasons);
  }

  async getData(query: FortressQuery): Promise<Table> {
    const baseUrl = this.config.seasons[query.season];
    if (baseUrl === undefined) {
      throw new RangeError(`Fortress: unknown season "${query.season}" (known: ${this.seasons.join(', ')})`);
    }
    const body = {
      Header: {
        Client_AppID: this.config.appId,
        Client_APIKey: this.config.apiKey,
        Client_AgencyCode: this.config.agencyCode,
        UniqID: 1,
      },
      PageSize: this.config.pageSize,
      FromDateTime: isoSeconds(query.from),
      ToDateTime: isoSeconds(query.to),
    };

    const responseDates: string[] = [];
    const outcome = await paginateCount({
      ...this.driver(query.endpoint),
      request: { path: `${baseUrl.replace(/\/+$/, '')}/${FORTRESS_ENDPOINTS[query.endpoint]}`, method: 'POST', body },
      applyToken: (request, token) => ({ ...request, body: { ...body, PageNumber: tokenValue(token) } }),
      batchSize: this.batchSize,
      batchDelayMs: 4500,
      extract: res => {
        const date = res.headers.get('date');
        if (date !== null) responseDates.push(date);
        return {
          records: this.records(res.payload, 'data'),
          totalPages: requireNumber(this.displayName, res.payload, 'statistics.numberOfPages'),
        };
      },
    });

    // Stamp rows with the server time of the first response
    const stamp = responseDates.length > 0 ? zonedDateTime(new Date(responseDates[0]), this.config.timeZone) : null;
    const records = outcome.records.map(r => ({ ...normalizeIds(r), response_datetime: stamp }));
    return this.table({ ...outcome, records }, { schema: query.schema });
  }
}
