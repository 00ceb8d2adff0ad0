import { z } from 'zod';
import {
  ConfigError, Connector, ConnectorOptionsSchema, createClient, getPath, isRecord, paginateFlag, parseConfig,
  MalformedPayloadError, type ApiResponse, type ConnectorClient, type ConnectorDeps, type FetchOptions, type Table,
} from './base/index.js';

export const YellowDogConfigSchema = z.object({
  accessToken: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  clientId: z.string().min(1).optional(),
  options: ConnectorOptionsSchema.optional(),
}).strict().refine(
  c => c.accessToken !== undefined || (c.username !== undefined && c.password !== undefined && c.clientId !== undefined),
  { message: 'provide accessToken, or username, password and clientId' },
);

export type YellowDogConfig = z.input<typeof YellowDogConfigSchema>;

const AUTH_URL = 'https://auth.yellowdogsoftware.com/token';
const PAGE_SIZE = 500;

/** More pages remain while the `x-pagination` header has a non-empty `nextPageLink`. */
export function hasNextPage(source: string, res: ApiResponse): boolean {
  const header = res.headers.get('x-pagination');
  if (header === null) throw new MalformedPayloadError(source, 'response has no x-pagination header', res.payload);
  let parsed: unknown;
  try {
    parsed = JSON.parse(header);
  } catch {
    throw new MalformedPayloadError(source, 'x-pagination header is not JSON', header);
  }
  const next = getPath(parsed, 'nextPageLink');
  return typeof next === 'string' && next !== '';
}

export class YellowDogConnector extends Connector {
  private accessToken?: string;
  private readonly login?: { userName: string; password: string; clientId: string };
  private readonly authClient: ConnectorClient;

  constructor(config: YellowDogConfig, deps?: ConnectorDeps) {
    const { accessToken, username, password, clientId, options } = parseConfig(YellowDogConfigSchema, config, 'Yellow Dog');
    super({
      source: 'yellow-dog',
      displayName: 'Yellow Dog',
      baseUrl: 'https://fetch.yellowdogsoftware.com/api/v3',
      options,
      defaults: { rateLimit: { maxRequests: 2, windowMs: 1000 } },
    }, deps);
    this.accessToken = accessToken;
    if (username !== undefined && password !== undefined && clientId !== undefined) {
      this.login = { userName: username, password, clientId };
    }
    this.authClient = createClient({
      baseUrl: AUTH_URL,
      sourceName: 'Yellow Dog',
      authHeaders: () => ({}),
      clock: this.clock,
      logger: this.log,
    });
  }

  protected async authHeaders(): Promise<Record<string, string>> {
    this.accessToken ??= await this.authenticate();
    return { Authorization: `Bearer ${this.accessToken}` };
  }

  async getItems(opts: FetchOptions = {}): Promise<Table> {
    return this.pages('items', opts);
  }

  async getRecipes(opts: FetchOptions = {}): Promise<Table> {
    return this.pages('recipes', opts);
  }

  async getRecipeTypes(opts: FetchOptions = {}): Promise<Table> {
    return this.pages('recipetypes', opts);
  }

  async getDimensions(opts: FetchOptions = {}): Promise<Table> {
    return this.pages('dimensions', opts);
  }

  private async authenticate(): Promise<string> {
    if (!this.login) throw new ConfigError(this.displayName, 'no access token and no login credentials');
    const payload = await this.authClient.request('', { method: 'POST', body: this.login });
    const token = getPath(payload, 'result.accessToken');
    if (typeof token !== 'string' || token === '') {
      throw new MalformedPayloadError(this.displayName, 'login response has no result.accessToken', '(login response withheld)');
    }
    return token;
  }

  private async pages(endpoint: string, opts: FetchOptions): Promise<Table> {
    const outcome = await paginateFlag({
      ...this.driver(endpoint),
      request: { path: endpoint, params: { pageSize: PAGE_SIZE } },
      pageParam: 'pageNumber',
      extract: res => ({
        records: isRecord(res.payload) ? [res.payload] : this.records(res.payload),
        more: hasNextPage(this.displayName, res),
      }),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }
}
