import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, getPath, paginateCount, parseConfig, requireNumber,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type QueryParams, type Table,
} from './base/index.js';
import { isoDate, isoSeconds, startOfDay } from './base/dates.js';

export const BumpConfigSchema = z.object({
  accessToken: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type BumpConfig = z.input<typeof BumpConfigSchema>;

export interface BumpPageOptions extends FetchOptions {
  /** Records per page (default: 5000). */
  perPage?: number;
}

/** Pause between page batches; the reports API throttles bursts hard. */
const BATCH_PAUSE_MS = 45_000;

/** Timestamp format of the sales report: microseconds, always zero here. */
export function salesTimestamp(date: Date): string {
  return `${isoSeconds(date)}.000000Z`;
}

export class BumpConnector extends Connector {
  private readonly accessToken: string;

  constructor(config: BumpConfig, deps?: ConnectorDeps) {
    const { accessToken, options } = parseConfig(BumpConfigSchema, config, 'Bump');
    super({
      source: 'bump',
      displayName: 'Bump',
      baseUrl: 'https://core-xt-api.bump5050.net',
      options,
      defaults: { batchSize: 5, maxRetries: 3, baseDelayMs: 60_000 },
      backoff: 'constant',
    }, deps);
    this.accessToken = accessToken;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  async getEventDetails(startDate: Date, endDate: Date, opts: BumpPageOptions = {}): Promise<Table> {
    const outcome = await this.report('reports/events/details', opts, {
      minDate: isoDate(startDate),
      maxDate: isoDate(endDate),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getLocations(opts: BumpPageOptions = {}): Promise<Table> {
    return this.table(await this.report('reports/locations', opts), { flatten: '_', schema: opts.schema });
  }

  async getNonprofits(opts: BumpPageOptions = {}): Promise<Table> {
    return this.table(await this.report('reports/nonprofits', opts), { flatten: '_', schema: opts.schema });
  }

  async getCustomers(opts: BumpPageOptions = {}): Promise<Table> {
    return this.table(await this.report('reports/customers', opts), { flatten: '_', schema: opts.schema });
  }

  /** Sales from the start of `startDate` to the last second of the day after `endDate` begins. */
  async getSales(startDate: Date, endDate: Date, opts: BumpPageOptions = {}): Promise<Table> {
    const outcome = await this.report('reports/sales', opts, {
      minDate: salesTimestamp(startOfDay(startDate)),
      maxDate: salesTimestamp(new Date(endDate.getTime() + 86_400_000 - 1000)),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  /** Only the first page carries `totalPages`; without it there is one page. */
  private report(path: string, opts: BumpPageOptions, params: QueryParams = {}): Promise<FetchOutcome> {
    return paginateCount({
      ...this.driver(path),
      request: { path, params: { ...params, count: opts.perPage ?? 5000 } },
      batchSize: this.batchSize,
      batchDelayMs: BATCH_PAUSE_MS,
      extract: res => ({
        records: this.records(res.payload, 'items'),
        totalPages: getPath(res.payload, 'totalPages') === undefined
          ? 1
          : requireNumber(this.displayName, res.payload, 'totalPages'),
      }),
    });
  }
}
