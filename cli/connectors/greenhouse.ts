import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, isRecord, paginateCursor, parseConfig,
  MalformedPayloadError, type ConnectorDeps, type JsonRecord, type QueryParams, type Table,
} from './base/index.js';

export const GreenhouseConfigSchema = z.object({
  apiKey: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type GreenhouseConfig = z.input<typeof GreenhouseConfigSchema>;

/** Parses an RFC 8288 Link header into rel → URL. */
export function parseLinkHeader(header: string | null): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;
  for (const part of header.split(',')) {
    const match = /<([^>]*)>\s*;\s*rel="?([^";]+)"?/.exec(part.trim());
    if (match) links[match[2]] = match[1];
  }
  return links;
}

/**
 * Harvest API client. List methods return tables, with a notice when the
 * `Link: <...>; rel="next"` chain was cut short.
 */
export class GreenhouseConnector extends Connector {
  private readonly apiKey: string;

  constructor(config: GreenhouseConfig, deps?: ConnectorDeps) {
    const { apiKey, options } = parseConfig(GreenhouseConfigSchema, config, 'Greenhouse');
    super({
      source: 'greenhouse',
      displayName: 'Greenhouse',
      baseUrl: 'https://harvest.greenhouse.io/v1',
      options,
      defaults: { rateLimit: { maxRequests: 1, windowMs: 100 } },
    }, deps);
    this.apiKey = apiKey;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Basic ${Buffer.from(`${this.apiKey}:`).toString('base64')}` };
  }

  getAllJobs(params: QueryParams = {}): Promise<Table> {
    return this.allPages('jobs', params);
  }

  getJob(jobId: number, params: QueryParams = {}): Promise<JsonRecord> {
    return this.one(`jobs/${jobId}`, params);
  }

  getAllCandidates(params: QueryParams = {}): Promise<Table> {
    return this.allPages('candidates', params);
  }

  getCandidate(candidateId: number, params: QueryParams = {}): Promise<JsonRecord> {
    return this.one(`candidates/${candidateId}`, params);
  }

  getAllApplications(params: QueryParams = {}): Promise<Table> {
    return this.allPages('applications', params);
  }

  getApplication(applicationId: number, params: QueryParams = {}): Promise<JsonRecord> {
    return this.one(`applications/${applicationId}`, params);
  }

  getAllJobPosts(params: QueryParams = {}): Promise<Table> {
    return this.allPages('job_posts', params);
  }

  getJobPost(jobPostId: number, params: QueryParams = {}): Promise<JsonRecord> {
    return this.one(`job_posts/${jobPostId}`, params);
  }

  private async one(path: string, params: QueryParams): Promise<JsonRecord> {
    const payload = await this.client.request(path, { params });
    if (!isRecord(payload)) throw new MalformedPayloadError(this.displayName, `expected an object from ${path}`, payload);
    return payload;
  }

  /** The next URL already carries the query, so the cursor replaces the whole request. */
  private async allPages(path: string, params: QueryParams): Promise<Table> {
    const outcome = await paginateCursor({
      ...this.driver(path),
      request: { path, params },
      applyToken: (_request, token) => ({ path: token.kind === 'cursor' ? token.cursor : path }),
      extract: res => ({
        records: this.records(res.payload),
        cursor: parseLinkHeader(res.headers.get('link')).next ?? null,
      }),
    });
    return this.table(outcome);
  }
}
