import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, parseConfig, paginateCount, paginateWindows, requireNumber,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type Table,
} from './base/index.js';

export const BigCommerceConfigSchema = z.object({
  storeHash: z.string().min(1),
  apiToken: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type BigCommerceConfig = z.input<typeof BigCommerceConfigSchema>;

const PAGE_LIMIT = 50;
/** v2 endpoints have no page count; no window starts after this page. */
const V2_LAST_WINDOW_START = 25;

export class BigCommerceConnector extends Connector {
  private readonly apiToken: string;

  constructor(config: BigCommerceConfig, deps?: ConnectorDeps) {
    const { storeHash, apiToken, options } = parseConfig(BigCommerceConfigSchema, config, 'BigCommerce');
    super({
      source: 'big-commerce',
      displayName: 'BigCommerce',
      baseUrl: `https://api.bigcommerce.com/stores/${encodeURIComponent(storeHash)}`,
      options,
      extraHeaders: { Accept: 'application/json' },
    }, deps);
    this.apiToken = apiToken;
  }

  protected authHeaders(): Record<string, string> {
    return { 'X-Auth-Token': this.apiToken };
  }

  // ---- v3 catalog ----

  async getBrands(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v3('catalog/brands'), opts);
  }

  async getCatalogProducts(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v3('catalog/products'), opts);
  }

  async getCustomers(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v3('customers'), opts);
  }

  async getProductCategories(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v3('catalog/categories'), opts);
  }

  async getVariants(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v3('catalog/variants'), opts);
  }

  // ---- v2 ----

  async getOrders(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v2('orders', 35), opts);
  }

  async getCustomerGroups(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.v2('customer_groups', 5), opts);
  }

  // ---- Per-order fan-out ----

  async getOrderProducts(orderIds: readonly number[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fanOut(orderIds, id => this.v2(`orders/${id}/products`, 2));
    return this.table(outcome, opts);
  }

  async getTransactions(orderIds: readonly number[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fanOut(orderIds, id => this.v3(`orders/${id}/transactions`, 2));
    return this.table(outcome, opts);
  }

  // ---- Pagination ----

  /** v3 responses declare `meta.pagination.total_pages`. */
  private v3(endpoint: string, batchSize = this.batchSize): Promise<FetchOutcome> {
    return paginateCount({
      ...this.driver(endpoint),
      request: { path: `v3/${endpoint}`, params: { limit: PAGE_LIMIT } },
      batchSize,
      extract: res => ({
        records: this.records(res.payload, 'data'),
        totalPages: requireNumber(this.displayName, res.payload, 'meta.pagination.total_pages'),
      }),
    });
  }

  /**
   * v2 returns a bare array per page, and 204 with no body past the last page.
   * Pages after the first are requested in concurrent windows.
   */
  private v2(endpoint: string, windowSize: number): Promise<FetchOutcome> {
    return paginateWindows({
      ...this.driver(endpoint),
      request: { path: `v2/${endpoint}`, params: { limit: PAGE_LIMIT } },
      windowSize,
      lastWindowStart: V2_LAST_WINDOW_START,
      extract: res => {
        const records = res.payload === null ? [] : this.records(res.payload);
        return { records, more: records.length >= PAGE_LIMIT };
      },
    });
  }
}
