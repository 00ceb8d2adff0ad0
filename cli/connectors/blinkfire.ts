import { z } from 'zod';
import {
  ConfigError, Connector, ConnectorOptionsSchema, MalformedPayloadError, extractRecords, flattenRecord, getPath, isRecord,
  paginateCursor, parseConfig, tokenValue,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type JsonRecord, type QueryParams, type Table, type TokenApplier,
} from './base/index.js';
import { isoDate } from './base/dates.js';

export const BlinkfireConfigSchema = z.object({
  apiToken: z.string().min(1),
  entityId: z.string().min(1),
  /** Peer group the global ranking report compares against. */
  entityGroup: z.string().min(1).optional(),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type BlinkfireConfig = z.input<typeof BlinkfireConfigSchema>;

export interface CursorListOptions extends FetchOptions {
  /** Records per page (default: 10). */
  limit?: number;
}

export const STREAMING_MEDIUMS = ['youtube', 'twitch', 'huya'] as const;
export type StreamingMedium = typeof STREAMING_MEDIUMS[number];

export function isStreamingMedium(value: string): value is StreamingMedium {
  return STREAMING_MEDIUMS.some(m => m === value);
}

/** Mediums the channel demographics endpoint is asked about, per day. */
export const DEMOGRAPHIC_MEDIUMS = ['facebook', 'twitter', 'instagram'] as const;

/**
 * One row per channel: `{day, mediums: [{medium, channels: [...]}]}` becomes
 * channel columns plus `day` and `mediums_medium`.
 */
export function audienceRows(source: string, payload: unknown): JsonRecord[] {
  const rows: JsonRecord[] = [];
  const day = getPath(payload, 'day');
  for (const medium of extractRecords(source, payload, 'mediums')) {
    for (const channel of extractRecords(source, medium, 'channels')) {
      rows.push({ ...flattenRecord(channel, '_'), day, mediums_medium: medium.medium });
    }
  }
  return rows;
}

/** One row per asset under `entity.by_asset`, tagged with the report day and entity. */
export function assetRows(source: string, payload: unknown): JsonRecord[] {
  return extractRecords(source, payload, 'entity.by_asset').map(asset => ({
    ...flattenRecord(asset, '_'),
    end_date: getPath(payload, 'end_date'),
    entity_id: getPath(payload, 'entity_id'),
    entity_entity_name: getPath(payload, 'entity.entity_name'),
  }));
}

/** One row per medium of each game day under `by_day`. */
export function dailyEngagementRows(source: string, payload: unknown): JsonRecord[] {
  const rows: JsonRecord[] = [];
  const endDate = getPath(payload, 'end_date');
  for (const day of extractRecords(source, payload, 'by_day')) {
    for (const medium of extractRecords(source, day, 'by_medium')) {
      rows.push({ ...flattenRecord(medium, '_'), end_date: endDate, by_day_game_day: day.game_day });
    }
  }
  return rows;
}

/** One row per scene under `entity.scenes`. */
export function sceneValueRows(source: string, payload: unknown): JsonRecord[] {
  return extractRecords(source, payload, 'entity.scenes').map(scene => ({
    ...flattenRecord(scene, '_'),
    entity_id: getPath(payload, 'entity.id'),
    end_date: getPath(payload, 'end_date'),
    post_branding: getPath(payload, 'post_branding'),
  }));
}

export class BlinkfireConnector extends Connector {
  private readonly apiToken: string;
  private readonly entityId: string;
  private readonly entityGroup?: string;

  constructor(config: BlinkfireConfig, deps?: ConnectorDeps) {
    const { apiToken, entityId, entityGroup, options } = parseConfig(BlinkfireConfigSchema, config, 'Blinkfire');
    super({
      source: 'blinkfire',
      displayName: 'Blinkfire',
      baseUrl: 'https://api.blinkfire.com/developer/api/v1',
      options,
    }, deps);
    this.apiToken = apiToken;
    this.entityId = entityId;
    this.entityGroup = entityGroup;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiToken}` };
  }

  async getTeams(opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: `teams/${this.entityId}` }, res => {
      if (!isRecord(res.payload)) return this.records(res.payload);
      return [res.payload];
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getVenues(opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fetchOnce({ path: 'venues', params: { team: this.entityId } }, res =>
      this.records(res.payload, 'venues').map(venue => ({ ...venue, team: getPath(res.payload, 'team') })));
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getBrands(opts: CursorListOptions = {}): Promise<Table> {
    const outcome = await this.cursorList('brands', {
      params: { sponsoring: this.entityId }, limit: opts.limit, rows: payload => this.records(payload, 'brands'),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getPeople(opts: CursorListOptions = {}): Promise<Table> {
    const outcome = await this.cursorList('people', {
      params: { team: this.entityId }, limit: opts.limit, rows: payload => this.records(payload, 'people'),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  async getDeliveredInsights(opts: CursorListOptions = {}): Promise<Table> {
    const outcome = await this.cursorList('user/insights/delivered', {
      params: { entity: this.entityId }, limit: opts.limit, rows: payload => this.records(payload, 'delivered_insights'),
    });
    return this.table(outcome, { flatten: '_', schema: opts.schema });
  }

  /** One request per day, fanned out in batches. */
  async getAudiences(dates: readonly Date[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.fanOut(dates, date => this.fetchOnce(
      { path: `audiences/${this.entityId}`, params: { day: isoDate(date) } },
      res => audienceRows(this.displayName, res.payload),
    ));
    return this.table(outcome, opts);
  }

  // ---- Demographics: one JSON document per request ----

  /** One request per day and medium. */
  async getDemographicsChannel(dates: readonly Date[]): Promise<Table> {
    const requests = dates.flatMap(date => DEMOGRAPHIC_MEDIUMS.map(medium => ({ date, medium })));
    const outcome = await this.fanOut(requests, ({ date, medium }) => this.document('demographics/channel', {
      entity_id: this.entityId,
      medium_name: medium,
      search_date: isoDate(date),
    }));
    return this.table(outcome);
  }

  async getDemographicsEntity(dates: readonly Date[]): Promise<Table> {
    const outcome = await this.fanOut(dates, date => this.document('demographics/entity', {
      entity_id: this.entityId,
      search_date: isoDate(date),
    }));
    return this.table(outcome);
  }

  async getDemographicsViewers(dates: readonly Date[]): Promise<Table> {
    return this.table(await this.daily(`reports/viewership_demographics/${this.entityId}`, dates, { breakdown: 'channel' }));
  }

  // ---- Reports: one request per day ----

  async getGlobalRankingReport(dates: readonly Date[]): Promise<Table> {
    if (!this.entityGroup) throw new ConfigError(this.displayName, 'entityGroup is required for the global ranking report');
    const outcome = await this.daily(`reports/global_ranking/${this.entityId}`, dates, { entity_group: this.entityGroup });
    return this.table(outcome);
  }

  async getAssetReport(dates: readonly Date[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.daily(`reports/assets/${this.entityId}`, dates, {}, payload => assetRows(this.displayName, payload));
    return this.table(outcome, opts);
  }

  async getSponsorshipReport(dates: readonly Date[]): Promise<Table> {
    return this.table(await this.daily(`reports/sponsors/${this.entityId}`, dates));
  }

  async getDailyEngagementReport(dates: readonly Date[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.daily(
      `reports/daily_engagement/${this.entityId}`, dates, {}, payload => dailyEngagementRows(this.displayName, payload),
    );
    return this.table(outcome, opts);
  }

  async getStreamingReport(dates: readonly Date[], medium: StreamingMedium): Promise<Table> {
    return this.table(await this.daily(`reports/${medium}_report/${this.entityId}`, dates));
  }

  async getSceneValueReport(dates: readonly Date[], opts: FetchOptions = {}): Promise<Table> {
    const outcome = await this.daily(
      `reports/scene_value/${this.entityId}`, dates, {}, payload => sceneValueRows(this.displayName, payload),
    );
    return this.table(outcome, opts);
  }

  async getCustomReport(dates: readonly Date[], reportId: string): Promise<Table> {
    return this.table(await this.daily(`reports/custom_reports/${encodeURIComponent(reportId)}`, dates));
  }

  // ---- Posts: cursor pages per day, one row per page ----

  /** Follow-up pages carry only the cursor and limit. */
  async getPosts(dates: readonly Date[], opts: CursorListOptions = {}): Promise<Table> {
    const outcome = await this.fanOut(dates, date => this.cursorList('posts', {
      params: { entity: this.entityId, start_date: isoDate(date), end_date: isoDate(date) },
      carry: {},
      limit: opts.limit,
      rows: payload => [this.asRow(payload)],
    }));
    return this.table(outcome, opts);
  }

  async getSponsorshipPosts(dates: readonly Date[], opts: CursorListOptions = {}): Promise<Table> {
    const author = { author: 'totals' };
    const outcome = await this.fanOut(dates, date => this.cursorList(`reports/sponsors/${this.entityId}/posts`, {
      params: { ...author, start_date: isoDate(date), end_date: isoDate(date) },
      carry: author,
      limit: opts.limit,
      rows: payload => [this.asRow(payload)],
    }));
    return this.table(outcome, opts);
  }

  /** Fans out one request per day with `start_date` and `end_date` both set to it. */
  private daily(
    path: string,
    dates: readonly Date[],
    params: QueryParams = {},
    rows?: (payload: unknown) => JsonRecord[],
  ): Promise<FetchOutcome> {
    return this.fanOut(dates, date => this.document(
      path,
      { ...params, start_date: isoDate(date), end_date: isoDate(date) },
      rows,
    ));
  }

  /** One request; by default its whole JSON object becomes one row. */
  private document(path: string, params: QueryParams, rows?: (payload: unknown) => JsonRecord[]): Promise<FetchOutcome> {
    return this.fetchOnce({ path, params }, res => (rows ? rows(res.payload) : [this.asRow(res.payload)]));
  }

  private asRow(payload: unknown): JsonRecord {
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, 'expected a JSON object', payload);
    return payload;
  }

  /**
   * Cursor lists: the response's `next_page` goes back as `cursor`. Follow-up
   * requests send `carry` with the cursor and limit, or the first request's
   * params when no `carry` is given.
   */
  private cursorList(
    path: string,
    list: { params: QueryParams; limit?: number; carry?: QueryParams; rows: (payload: unknown) => JsonRecord[] },
  ): Promise<FetchOutcome> {
    const limit = list.limit ?? 10;
    const { carry } = list;
    const applyToken: TokenApplier | undefined = carry
      ? (_request, token) => ({ path, params: { ...carry, cursor: tokenValue(token), limit } })
      : undefined;
    return paginateCursor({
      ...this.driver(path),
      request: { path, params: { ...list.params, limit } },
      applyToken,
      extract: res => {
        const next = getPath(res.payload, 'next_page');
        return {
          records: list.rows(res.payload),
          cursor: typeof next === 'string' && next !== '' ? next : null,
        };
      },
    });
  }
}
