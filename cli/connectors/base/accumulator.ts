/**
 * Result accumulator: locates record lists in page payloads and materializes
 * fetched records as a validated table.
 */

import { z } from 'zod';
import { MalformedPayloadError, SchemaValidationError, type RowIssue } from './errors.js';
import type { FetchOutcome } from './fetch-session.js';
import type { JsonRecord } from './types.js';

export interface Table<Row extends JsonRecord = JsonRecord> {
  /** Column names in first-seen order. */
  columns: string[];
  rows: Row[];
  /** Present when pagination was cut short by the circuit breaker. */
  notice?: string;
}

/** Shape check applied to every row of a fetched table. */
export type RowSchema = z.ZodType<JsonRecord, z.ZodTypeDef, unknown>;

/** Options accepted by every connector fetch method. */
export interface FetchOptions {
  schema?: RowSchema;
}

export interface TableOptions<Row extends JsonRecord> {
  source: string;
  schema?: z.ZodType<Row, z.ZodTypeDef, unknown>;
  /** Flatten nested objects into `parent<sep>child` columns. */
  flatten?: string;
}

/** Rows reported in a SchemaValidationError; the count covers every failure. */
const MAX_REPORTED_ISSUES = 20;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Follows a dotted key ("meta.pagination.total_pages") into a payload. */
export function getPath(payload: unknown, dottedKey: string): unknown {
  let current: unknown = payload;
  for (const part of dottedKey.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Returns the record list found at `dottedKey` (or the payload itself).
 * Anything other than an array of objects is a malformed page.
 */
export function extractRecords(source: string, payload: unknown, dottedKey?: string): JsonRecord[] {
  const list = dottedKey ? getPath(payload, dottedKey) : payload;
  if (!Array.isArray(list)) {
    const where = dottedKey ? `"${dottedKey}"` : 'response body';
    throw new MalformedPayloadError(source, `expected a record list at ${where}`, payload);
  }
  const records: JsonRecord[] = [];
  for (const [i, item] of list.entries()) {
    if (!isRecord(item)) {
      throw new MalformedPayloadError(source, `record ${i} is not an object`, payload);
    }
    records.push(item);
  }
  return records;
}

/** Reads a required numeric field; numeric strings are accepted. */
export function requireNumber(source: string, payload: unknown, dottedKey: string): number {
  const raw = getPath(payload, dottedKey);
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedPayloadError(source, `expected a number at "${dottedKey}"`, payload);
  }
  return value;
}

export function flattenRecord(record: JsonRecord, sep: string, prefix = ''): JsonRecord {
  const flat: JsonRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const column = prefix ? `${prefix}${sep}${key}` : key;
    if (isRecord(value) && Object.keys(value).length > 0) {
      Object.assign(flat, flattenRecord(value, sep, column));
    } else {
      flat[column] = value;
    }
  }
  return flat;
}

export function toTable(
  input: FetchOutcome | JsonRecord[],
  options: TableOptions<JsonRecord> & { schema?: undefined },
): Table;
export function toTable<Row extends JsonRecord>(
  input: FetchOutcome | JsonRecord[],
  options: TableOptions<Row>,
): Table<Row>;
export function toTable<Row extends JsonRecord>(
  input: FetchOutcome | JsonRecord[],
  options: TableOptions<Row>,
): Table<Row> | Table {
  const records = Array.isArray(input) ? input : input.records;
  const notice = Array.isArray(input) ? undefined : input.notice;
  const shaped = options.flatten === undefined ? records : records.map(r => flattenRecord(r, options.flatten ?? '.'));

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of shaped) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const extra = notice ? { notice } : {};
  if (!options.schema) return { columns, rows: shaped, ...extra };

  const rows: Row[] = [];
  const issues: RowIssue[] = [];
  let failedRows = 0;
  for (const [i, row] of shaped.entries()) {
    const parsed = options.schema.safeParse(row);
    if (parsed.success) {
      rows.push(parsed.data);
      continue;
    }
    failedRows++;
    for (const issue of parsed.error.issues) {
      if (issues.length < MAX_REPORTED_ISSUES) {
        issues.push({ row: i, path: issue.path.join('.'), message: issue.message });
      }
    }
  }
  if (failedRows > 0) throw new SchemaValidationError(options.source, issues, failedRows);

  return { columns, rows, ...extra };
}
