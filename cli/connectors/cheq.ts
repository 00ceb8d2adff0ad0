import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, MalformedPayloadError, getPath, isRecord, paginateFlag, parseConfig,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type JsonRecord, type QueryParams, type Table,
} from './base/index.js';
import { isoSeconds } from './base/dates.js';

export const CheqConfigSchema = z.object({
  apiKey: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type CheqConfig = z.input<typeof CheqConfigSchema>;

/** Every order payment status the API knows. */
export const ALL_PAYMENT_STATUSES = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export class CheqConnector extends Connector {
  private readonly apiKey: string;

  constructor(config: CheqConfig, deps?: ConnectorDeps) {
    const { apiKey, options } = parseConfig(CheqConfigSchema, config, 'Cheq');
    super({ source: 'cheq', displayName: 'Cheq', baseUrl: 'https://api.cheq.tools/api', options }, deps);
    this.apiKey = apiKey;
  }

  protected authHeaders(): Record<string, string> {
    return { 'x-api-key': this.apiKey };
  }

  async getSales(
    startDate: Date,
    endDate: Date,
    opts: FetchOptions & { paymentStatuses?: readonly number[] } = {},
  ): Promise<Table> {
    const outcome = await this.pages('orders', {
      start_range: `${isoSeconds(startDate)}Z`,
      end_range: `${isoSeconds(endDate)}Z`,
      payment_status: opts.paymentStatuses ?? ALL_PAYMENT_STATUSES,
    });
    return this.table(outcome, opts);
  }

  async getMenu(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.pages('menus'), opts);
  }

  /** Pages until the response carries `end: true`. */
  private pages(path: string, params: QueryParams = {}): Promise<FetchOutcome> {
    return paginateFlag({
      ...this.driver(path),
      request: { path, params },
      extract: res => {
        const end = getPath(res.payload, 'end');
        if (typeof end !== 'boolean') {
          throw new MalformedPayloadError(this.displayName, 'expected a boolean at "end"', res.payload);
        }
        return { records: this.results(res.payload), more: !end };
      },
    });
  }

  /** `results` is a list on order pages and a single object on menu pages. */
  private results(payload: unknown): JsonRecord[] {
    const results = getPath(payload, 'results');
    if (isRecord(results)) return [results];
    return this.records(payload, 'results');
  }
}
