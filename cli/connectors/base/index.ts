export type {
  AuthHeaderFn, ApiResponse, HttpMethod, CircuitBreaker, ConnectorSource, JsonRecord, MalformedPolicy, PageResult, PageToken,
  QueryParams, RateLimit, RequestDescriptor, RequestOptions, RetryPolicy,
} from './types.js';
export { systemClock, type Clock } from './clock.js';
export {
  ConnectorError, TransportError, HttpError, RetryExhaustedError, MalformedPayloadError, SchemaValidationError, ConfigError,
  type RowIssue,
} from './errors.js';
export { createSession, type HttpSession, type SessionConfig } from './session.js';
export { createClient, buildUrl, redactUrl, DEFAULT_RETRY_POLICY, type ClientConfig, type ConnectorClient } from './client.js';
export { SlidingWindowRateLimiter, DEFAULT_RATE_LIMIT } from './rate-limiter.js';
export { FetchSession, mergeOutcomes, type FetchOutcome, type FetchState } from './fetch-session.js';
export {
  paginateCount, paginateFlag, paginateWindows, paginateCursor, paginateOffset, runInBatches, chunk, withParams,
  queryParamToken, tokenValue, MAX_CONSECUTIVE_SKIPS,
  type CountPage, type FlagPage, type CursorPage, type OffsetPage, type Extractor, type TokenApplier,
} from './pagination.js';
export {
  extractRecords, flattenRecord, getPath, isRecord, requireNumber, toTable,
  type FetchOptions, type RowSchema, type Table,
} from './accumulator.js';
export { MemoryCheckpointStore, FileCheckpointStore, type CheckpointStore } from './checkpoint.js';
export { writeBatches, type BatchOutcome, type WriteReport } from './write.js';
export {
  Connector, ConnectorOptionsSchema, parseConfig, type ConnectorDeps, type ConnectorOptions,
} from './connector.js';
export { writeTable, writeReport, exportSpinner, toJsonl, type ExportManifest } from './export-setup.js';
export { isoDate, isoSeconds, startOfDay, endOfDay, parseDate, zonedDateTime } from './dates.js';
