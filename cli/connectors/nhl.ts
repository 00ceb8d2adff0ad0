import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, MalformedPayloadError, isRecord, parseConfig,
  type ConnectorDeps, type FetchOptions, type JsonRecord, type QueryParams, type Table,
} from './base/index.js';
import { isoDate } from './base/dates.js';

export const NhlConfigSchema = z.object({
  baseUrl: z.string().url().default('https://statsapi.web.nhl.com/api/v1'),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type NhlConfig = z.input<typeof NhlConfigSchema>;

/** Public stats API: no credentials, nested objects flattened with `.`. */
export class NhlConnector extends Connector {
  constructor(config: NhlConfig = {}, deps?: ConnectorDeps) {
    const { baseUrl, options } = parseConfig(NhlConfigSchema, config, 'NHL');
    super({
      source: 'nhl',
      displayName: 'NHL',
      baseUrl,
      options,
      defaults: { maxRetries: 5, baseDelayMs: 500 },
    }, deps);
  }

  protected authHeaders(): Record<string, string> {
    return {};
  }

  getTeams(opts: FetchOptions = {}): Promise<Table> {
    return this.list('teams', {}, 'teams', opts);
  }

  getVenues(opts: FetchOptions = {}): Promise<Table> {
    return this.list('venues', {}, 'venues', opts);
  }

  getSeasons(opts: FetchOptions = {}): Promise<Table> {
    return this.list('seasons', {}, 'seasons', opts);
  }

  getGameTypes(opts: FetchOptions = {}): Promise<Table> {
    return this.list('gameTypes', {}, undefined, opts);
  }

  getGameStatuses(opts: FetchOptions = {}): Promise<Table> {
    return this.list('gameStatus', {}, undefined, opts);
  }

  getPositions(opts: FetchOptions = {}): Promise<Table> {
    return this.list('positions', {}, undefined, opts);
  }

  /** Games of one day; a day without games has no entry under `dates`. */
  async getSchedule(date: Date, gameType: string, opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce(
      { path: 'schedule', params: { date: isoDate(date), gameType } },
      res => {
        const [day] = this.records(res.payload, 'dates');
        return day ? this.records(day, 'games') : [];
      },
    );
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  /** The whole standings document as one flattened row. */
  async getStandings(season: string, opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce(
      { path: 'standings', params: { season, standingsType: 'byLeague' } },
      res => [this.document(res.payload, 'standings')],
    );
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  async getPerson(playerId: number, opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: `people/${playerId}` }, res => [this.document(res.payload, 'people')]);
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  async getBoxscore(gameId: number): Promise<JsonRecord> {
    return this.document(await this.client.request(`game/${gameId}/boxscore`), 'boxscore');
  }

  async getLinescore(gameId: number): Promise<JsonRecord> {
    return this.document(await this.client.request(`game/${gameId}/linescore`), 'linescore');
  }

  private async list(path: string, params: QueryParams, key: string | undefined, opts: FetchOptions): Promise<Table> {
    const outcome = await this.fetchOnce({ path, params }, res => this.records(res.payload, key));
    return this.table(outcome, { flatten: '.', schema: opts.schema });
  }

  private document(payload: unknown, what: string): JsonRecord {
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, `expected an object for ${what}`, payload);
    return payload;
  }
}

