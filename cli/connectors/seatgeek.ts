import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, createClient, getPath, paginateCursor, parseConfig,
  MalformedPayloadError, type ConnectorClient, type ConnectorDeps, type FetchOptions, type JsonRecord, type Table,
} from './base/index.js';

export const SeatGeekConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  /** Skips the token exchange when set. */
  bearerToken: z.string().min(1).optional(),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type SeatGeekConfig = z.input<typeof SeatGeekConfigSchema>;

const BASE_URL = 'https://ringside.seatgeek.com/v1';
const AUTH_URL = 'https://auth.seatgeek.com/oauth/token';

export const TOKEN_CHECKPOINT = 'seatgeek-bearer-token';
export const SALES_CURSOR_CHECKPOINT = 'seatgeek-sales-cursor';

/** Sales keys arrive as `_id` or with stray quotes; dates carry a zone suffix we drop. */
export function cleanSaleRecord(record: JsonRecord): JsonRecord {
  const cleaned: JsonRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const name = key.startsWith('_') ? key.slice(1) : key.replaceAll('"', '');
    cleaned[name] = name === 'transaction_date' && typeof value === 'string' ? value.slice(0, 19) : value;
  }
  return cleaned;
}

export class SeatGeekConnector extends Connector {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private bearerToken?: string;
  private readonly authClient: ConnectorClient;

  constructor(config: SeatGeekConfig, deps?: ConnectorDeps) {
    const { clientId, clientSecret, bearerToken, options } = parseConfig(SeatGeekConfigSchema, config, 'SeatGeek');
    super({
      source: 'seatgeek',
      displayName: 'SeatGeek',
      baseUrl: BASE_URL,
      options,
      defaults: { maxIterations: 750_000 },
      extraHeaders: { Accept: 'application/json' },
    }, deps);
    this.clientId = clientId;
    this.clientSecret = clientSecret;
    this.bearerToken = bearerToken;
    this.authClient = createClient({
      baseUrl: AUTH_URL,
      sourceName: 'SeatGeek',
      authHeaders: () => ({}),
      clock: this.clock,
      logger: this.log,
    });
  }

  protected async authHeaders(): Promise<Record<string, string>> {
    this.bearerToken ??= await this.checkpoints.load(TOKEN_CHECKPOINT) ?? await this.cacheAuthenticationToken();
    return { Authorization: `Bearer ${this.bearerToken}` };
  }

  /** Exchanges the client credentials for a bearer token and stores it for later runs. */
  async cacheAuthenticationToken(): Promise<string> {
    const payload = await this.authClient.request('', {
      method: 'POST',
      body: {
        client_id: this.clientId,
        client_secret: this.clientSecret,
        audience: 'https://ringside.seatgeek.com',
        grant_type: 'client_credentials',
      },
    });
    const token = getPath(payload, 'access_token');
    if (typeof token !== 'string' || token === '') {
      throw new MalformedPayloadError(this.displayName, 'token response has no access_token', '(token response withheld)');
    }
    await this.checkpoints.save(TOKEN_CHECKPOINT, token);
    this.bearerToken = token;
    this.log.info({ checkpoint: TOKEN_CHECKPOINT }, 'bearer token cached');
    return token;
  }

  /**
   * All sales, resuming from the last stored cursor unless `fromStart` is set.
   * Each continuation cursor is stored as soon as its page is accepted.
   */
  async getSales(opts: FetchOptions & { fromStart?: boolean } = {}): Promise<Table> {
    const outcome = await paginateCursor({
      ...this.driver('sales'),
      request: { path: 'sales' },
      checkpoint: { store: this.checkpoints, name: SALES_CURSOR_CHECKPOINT, resume: !opts.fromStart },
      extract: res => {
        const cursor = getPath(res.payload, 'cursor');
        const more = getPath(res.payload, 'has_more') === true;
        return {
          records: this.records(res.payload, 'data').map(cleanSaleRecord),
          cursor: more && typeof cursor === 'string' && cursor !== '' ? cursor : null,
        };
      },
    });
    return this.table(outcome, opts);
  }
}
