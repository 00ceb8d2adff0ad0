import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, flattenRecord, getPath, isRecord, paginateCount, parseConfig, requireNumber,
  type ConnectorDeps, type FetchOptions, type FetchOutcome, type JsonRecord, type QueryParams, type Table,
} from './base/index.js';

export const FormstackConfigSchema = z.object({
  apiToken: z.string().min(1),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type FormstackConfig = z.input<typeof FormstackConfigSchema>;

const PER_PAGE = 100;

/** Replaces the nested `data` object of a submission with its flattened fields. */
export function expandSubmissionData(row: JsonRecord): JsonRecord {
  const { data, ...rest } = row;
  if (!isRecord(data)) return row;
  return { ...rest, ...flattenRecord(data, '.') };
}

export class FormstackConnector extends Connector {
  private readonly apiToken: string;

  constructor(config: FormstackConfig, deps?: ConnectorDeps) {
    const { apiToken, options } = parseConfig(FormstackConfigSchema, config, 'Formstack');
    super({
      source: 'formstack',
      displayName: 'Formstack',
      baseUrl: 'https://www.formstack.com/api/v2',
      options,
      extraHeaders: { Accept: 'application/json' },
    }, deps);
    this.apiToken = apiToken;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiToken}` };
  }

  async getForms(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.paged('form.json', 'forms'), opts);
  }

  async getFolders(opts: FetchOptions = {}): Promise<Table> {
    return this.table(await this.paged('folder.json', 'folders'), opts);
  }

  /** Submissions of one form, optionally only those after `minTime`. */
  async getFormSubmissions(formId: number, opts: FetchOptions & { minTime?: string } = {}): Promise<Table> {
    const outcome = await this.submissions(formId, opts.minTime);
    return this.table(outcome, opts);
  }

  /** Submissions of every form in a folder, with each submission's `data` expanded into columns. */
  async getAllSubmissionsInFolder(
    folderId: number,
    skipFormIds: readonly number[] = [],
    opts: FetchOptions = {},
  ): Promise<Table> {
    const forms = await this.paged('form.json', 'forms');
    const skip = new Set(skipFormIds.map(String));
    const formIds = [...new Set(
      forms.records
        .filter(form => String(form.folder) === String(folderId))
        .map(form => String(form.id))
        .filter(id => !skip.has(id)),
    )];

    const outcome = await this.fanOut(formIds, id => this.submissions(Number(id)));
    return this.table({ ...outcome, records: outcome.records.map(expandSubmissionData) }, opts);
  }

  private async submissions(formId: number, minTime?: string): Promise<FetchOutcome> {
    const outcome = await this.paged(`form/${formId}/submission.json`, 'submissions', {
      data: 'true',
      expand_data: 'true',
      ...(minTime !== undefined ? { min_time: minTime } : {}),
    });
    return { ...outcome, records: outcome.records.map(r => ({ ...r, form_id: formId })) };
  }

  /**
   * `total: 0` means no records at all; a response without `pages` is the
   * only page.
   */
  private paged(path: string, key: string, params: QueryParams = {}): Promise<FetchOutcome> {
    return paginateCount({
      ...this.driver(path),
      request: { path, params: { ...params, per_page: PER_PAGE } },
      extract: res => {
        if (requireNumber(this.displayName, res.payload, 'total') === 0) return { records: [], totalPages: 1 };
        const pages = getPath(res.payload, 'pages') === undefined
          ? 1
          : requireNumber(this.displayName, res.payload, 'pages');
        return { records: this.records(res.payload, key), totalPages: pages };
      },
    });
  }
}
