import { createHash, createHmac } from 'crypto';
import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, getPath, isRecord, paginateCursor, parseConfig, writeBatches,
  MalformedPayloadError, type ConnectorDeps, type FetchOptions, type HttpMethod, type JsonRecord, type QueryParams,
  type Table, type WriteReport,
} from './base/index.js';

export const MetaConfigSchema = z.object({
  appId: z.string().min(1),
  appSecret: z.string().min(1),
  accessToken: z.string().min(1),
  adAccountId: z.string().min(1),
  apiVersion: z.string().regex(/^v\d+\.\d+$/).default('v20.0'),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type MetaConfig = z.input<typeof MetaConfigSchema>;

export const LONG_LIVED_TOKEN_CHECKPOINT = 'meta-access-token-long';

/** Rows per audience upload request. */
const AUDIENCE_BATCH_SIZE = 5000;

export function sha256(value: unknown): string {
  return createHash('sha256').update(value === null || value === undefined ? '' : String(value)).digest('hex');
}

/** HMAC-SHA256 of the access token keyed by the app secret, as hex. */
export function appSecretProof(appSecret: string, accessToken: string): string {
  return createHmac('sha256', appSecret).update(accessToken).digest('hex');
}

/** Audience upload body: upper-cased schema and SHA-256 hashed cells in column order. */
export function audiencePayload(columns: readonly string[], rows: readonly JsonRecord[]): { schema: string[]; data: string[][] } {
  return {
    schema: columns.map(c => c.toUpperCase()),
    data: rows.map(row => columns.map(c => sha256(row[c]))),
  };
}

export class MetaConnector extends Connector {
  private readonly config: z.output<typeof MetaConfigSchema>;
  private accessToken: string;

  constructor(config: MetaConfig, deps?: ConnectorDeps) {
    const parsed = parseConfig(MetaConfigSchema, config, 'Meta');
    super({
      source: 'meta',
      displayName: 'Meta',
      baseUrl: `https://graph.facebook.com/${parsed.apiVersion}`,
      options: parsed.options,
      secretParams: ['access_token', 'appsecret_proof', 'client_secret', 'fb_exchange_token'],
    }, deps);
    this.config = parsed;
    this.accessToken = parsed.accessToken;
  }

  protected authHeaders(): Record<string, string> {
    return {};
  }

  protected authParams(): QueryParams {
    return {
      access_token: this.accessToken,
      appsecret_proof: appSecretProof(this.config.appSecret, this.accessToken),
    };
  }

  // ---- Audiences ----

  async createAudience(name: string, description: string): Promise<JsonRecord> {
    return this.object(`${this.config.adAccountId}/customaudiences`, 'POST', {
      name,
      subtype: 'CUSTOM',
      description,
      customer_file_source: 'USER_PROVIDED_ONLY',
    });
  }

  async getAudienceInfo(audienceId: string): Promise<JsonRecord> {
    const payload = await this.client.request(audienceId, {
      params: { fields: 'operation_status,time_updated,approximate_count_lower_bound,approximate_count_upper_bound' },
    });
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, 'audience info is not an object', payload);
    return payload;
  }

  addAudienceUsers(audienceId: string, users: Table): Promise<WriteReport> {
    return this.uploadUsers(audienceId, users, 'users', 'POST');
  }

  deleteAudienceUsers(audienceId: string, users: Table): Promise<WriteReport> {
    return this.uploadUsers(audienceId, users, 'users', 'DELETE');
  }

  /**
   * Replaces the audience's users. All batches share one session id; the
   * last batch carries `last_batch_flag` so the swap happens once.
   */
  replaceAudienceUsers(audienceId: string, users: Table): Promise<WriteReport> {
    const sessionId = Math.floor(this.clock.now() / 1000);
    return writeBatches({
      rows: users.rows,
      batchSize: AUDIENCE_BATCH_SIZE,
      pauseMs: 3000,
      clock: this.clock,
      logger: this.log,
      send: (batch, index, total) => this.client.request(`${audienceId}/usersreplace`, {
        method: 'POST',
        form: {
          payload: JSON.stringify(audiencePayload(users.columns, batch)),
          session: JSON.stringify({ session_id: sessionId, batch_seq: index + 1, last_batch_flag: index === total - 1 }),
        },
      }),
    });
  }

  // ---- Lead ads ----

  async getLeadgenForms(pageId: string, opts: FetchOptions = {}): Promise<Table> {
    return this.graphList(`${pageId}/leadgen_forms`, opts);
  }

  async getFormSubmissions(formId: string, opts: FetchOptions = {}): Promise<Table> {
    return this.graphList(`${formId}/leads`, opts);
  }

  // ---- Tokens ----

  /** Exchanges the current token for a long-lived one, stores it, and uses it from now on. */
  async cacheLongLivedToken(): Promise<string> {
    const payload = await this.client.request('oauth/access_token', {
      params: {
        grant_type: 'fb_exchange_token',
        client_id: this.config.appId,
        client_secret: this.config.appSecret,
        fb_exchange_token: this.accessToken,
      },
    });
    const token = getPath(payload, 'access_token');
    if (typeof token !== 'string' || token === '') {
      throw new MalformedPayloadError(this.displayName, 'token response has no access_token', '(token response withheld)');
    }
    await this.checkpoints.save(LONG_LIVED_TOKEN_CHECKPOINT, token);
    this.accessToken = token;
    this.log.info({ checkpoint: LONG_LIVED_TOKEN_CHECKPOINT }, 'long-lived token cached');
    return token;
  }

  // ---- Helpers ----

  private uploadUsers(audienceId: string, users: Table, edge: string, method: HttpMethod): Promise<WriteReport> {
    return writeBatches({
      rows: users.rows,
      batchSize: AUDIENCE_BATCH_SIZE,
      pauseMs: 1000,
      clock: this.clock,
      logger: this.log,
      send: batch => this.client.request(`${audienceId}/${edge}`, {
        method,
        form: { payload: JSON.stringify(audiencePayload(users.columns, batch)) },
      }),
    });
  }

  private async object(path: string, method: HttpMethod, form: Record<string, string>): Promise<JsonRecord> {
    const payload = await this.client.request(path, { method, form });
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, `expected an object from ${path}`, payload);
    return payload;
  }

  /** Graph API lists: `data` plus `paging.cursors.after`, present only while `paging.next` is. */
  private async graphList(path: string, opts: FetchOptions): Promise<Table> {
    const outcome = await paginateCursor({
      ...this.driver(path),
      request: { path },
      cursorParam: 'after',
      extract: res => {
        const after = getPath(res.payload, 'paging.cursors.after');
        const hasNext = typeof getPath(res.payload, 'paging.next') === 'string';
        return {
          records: this.records(res.payload, 'data'),
          cursor: hasNext && typeof after === 'string' ? after : null,
        };
      },
    });
    return this.table(outcome, opts);
  }
}
