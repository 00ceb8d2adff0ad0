import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, MalformedPayloadError, isRecord, parseConfig,
  type ConnectorDeps, type FetchOptions, type JsonRecord, type Table,
} from './base/index.js';

export const ParkHubConfigSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  apiKey: z.string().min(1),
  organizationId: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type ParkHubConfig = z.input<typeof ParkHubConfigSchema>;

/** Partner API JSON endpoints: events, lots and the service status. */
export class ParkHubConnector extends Connector {
  private readonly username: string;
  private readonly password: string;
  private readonly apiKey: string;
  private readonly organizationId: string;

  constructor(config: ParkHubConfig, deps?: ConnectorDeps) {
    const { username, password, apiKey, organizationId, options } = parseConfig(ParkHubConfigSchema, config, 'ParkHub');
    super({
      source: 'park-hub',
      displayName: 'ParkHub',
      baseUrl: 'https://partners.v2.parkhub.com',
      options,
      defaults: { maxRetries: 5, baseDelayMs: 500 },
    }, deps);
    this.username = username;
    this.password = password;
    this.apiKey = apiKey;
    this.organizationId = organizationId;
  }

  protected authHeaders(): Record<string, string> {
    return {
      Authorization: `Basic ${Buffer.from(`${this.username}:${this.password}`).toString('base64')}`,
      'x-api-key': this.apiKey,
    };
  }

  async getEvents(opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: `events/${encodeURIComponent(this.organizationId)}` }, res =>
      this.records(res.payload, 'events'));
    return this.table(outcome, opts);
  }

  async getLots(opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: `lots/${encodeURIComponent(this.organizationId)}` }, res =>
      this.records(res.payload, 'lots'));
    return this.table(outcome, opts);
  }

  async getSiteStatus(): Promise<JsonRecord> {
    const payload = await this.client.request('status');
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, 'expected an object from status', payload);
    return payload;
  }
}
