/**
 * Error taxonomy shared by every connector.
 * Each error names the connector it came from so CLI output stays readable
 * when several sources run in one job.
 */

const EXCERPT_LENGTH = 500;

export function excerpt(text: string): string {
  return text.length > EXCERPT_LENGTH ? `${text.slice(0, EXCERPT_LENGTH)}…` : text;
}

export class ConnectorError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: ErrorOptions) {
    super(`${source}: ${message}`, options);
    this.name = 'ConnectorError';
    this.source = source;
  }
}

/** Connection refused, DNS failure or timeout after transport retries. */
export class TransportError extends ConnectorError {
  constructor(source: string, message: string, options?: ErrorOptions) {
    super(source, message, options);
    this.name = 'TransportError';
  }
}

export class HttpError extends ConnectorError {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(source: string, status: number, url: string, body: string, message?: string) {
    super(source, message ?? `HTTP ${status} for ${url}${body ? ` — ${excerpt(body)}` : ''}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
    this.body = excerpt(body);
  }
}

export class RetryExhaustedError extends HttpError {
  readonly attempts: number;

  constructor(source: string, status: number, url: string, body: string, attempts: number) {
    super(source, status, url, body, `HTTP ${status} for ${url} still failing after ${attempts} retries`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class MalformedPayloadError extends ConnectorError {
  readonly payloadExcerpt: string;

  constructor(source: string, message: string, payload: unknown) {
    super(source, message);
    this.name = 'MalformedPayloadError';
    this.payloadExcerpt = excerpt(typeof payload === 'string' ? payload : safeStringify(payload));
  }
}

export interface RowIssue {
  row: number;
  path: string;
  message: string;
}

export class SchemaValidationError extends ConnectorError {
  readonly issues: RowIssue[];
  readonly failedRows: number;

  constructor(source: string, issues: RowIssue[], failedRows: number) {
    const first = issues.slice(0, 3).map(i => `row ${i.row} ${i.path || '(row)'}: ${i.message}`).join('; ');
    super(source, `${failedRows} row(s) failed schema validation — ${first}`);
    this.name = 'SchemaValidationError';
    this.issues = issues;
    this.failedRows = failedRows;
  }
}

export class ConfigError extends ConnectorError {
  constructor(source: string, message: string) {
    super(source, `invalid configuration — ${message}`);
    this.name = 'ConfigError';
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
