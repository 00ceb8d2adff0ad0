import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, paginateOffset, parseConfig, requireNumber,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type Table,
} from './base/index.js';

export const MailchimpConfigSchema = z.object({
  apiKey: z.string().regex(/^.+-[a-z0-9]+$/, 'must end with -<data center>, e.g. "abc123-us6"'),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type MailchimpConfig = z.input<typeof MailchimpConfigSchema>;

export interface MailchimpPageOptions extends FetchOptions {
  /** Records per request (default: 1000, the API maximum). */
  perPage?: number;
}

/** The data center is the suffix after the last dash of the key. */
export function dataCenter(apiKey: string): string {
  return apiKey.slice(apiKey.lastIndexOf('-') + 1);
}

export class MailchimpConnector extends Connector {
  private readonly apiKey: string;

  constructor(config: MailchimpConfig, deps?: ConnectorDeps) {
    const { apiKey, options } = parseConfig(MailchimpConfigSchema, config, 'Mailchimp');
    super({
      source: 'mailchimp',
      displayName: 'Mailchimp',
      baseUrl: `https://${dataCenter(apiKey)}.api.mailchimp.com/3.0`,
      options,
    }, deps);
    this.apiKey = apiKey;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  async getLists(opts: MailchimpPageOptions = {}): Promise<Table> {
    const outcome = await this.offsetPages('lists', 'lists', opts.perPage);
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getListMembers(listId: string, opts: MailchimpPageOptions = {}): Promise<Table> {
    const outcome = await this.offsetPages(`lists/${encodeURIComponent(listId)}/members`, 'members', opts.perPage);
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  private offsetPages(path: string, key: string, perPage = 1000): Promise<FetchOutcome> {
    return paginateOffset({
      ...this.driver(path),
      request: { path },
      limit: perPage,
      limitParam: 'count',
      extract: res => ({
        records: this.records(res.payload, key),
        total: requireNumber(this.displayName, res.payload, 'total_items'),
      }),
    });
  }
}
