/**
 * Batch writer for push-style connectors. Every batch is attempted in order;
 * a failed batch is recorded and the write moves on. Nothing is rolled back.
 */

import type { Logger } from '../../logger.js';
import { createLogger } from '../../logger.js';
import { systemClock, type Clock } from './clock.js';
import { HttpError } from './errors.js';
import { chunk } from './pagination.js';

export interface BatchOutcome {
  index: number;
  size: number;
  status: 'ok' | 'failed';
  httpStatus?: number;
  /** Response payload on success, response body excerpt on HTTP failure. */
  body?: unknown;
  error?: string;
}

export interface WriteReport {
  batches: BatchOutcome[];
  succeeded: number;
  failed: number;
}

export interface WriteOptions<Row> {
  rows: readonly Row[];
  batchSize: number;
  /** Sends one batch; resolves with the response payload. */
  send: (batch: Row[], index: number, total: number) => Promise<unknown>;
  /** Pause between batches, in ms. */
  pauseMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export async function writeBatches<Row>(options: WriteOptions<Row>): Promise<WriteReport> {
  const { rows, batchSize, send, pauseMs, clock = systemClock } = options;
  const log = options.logger ?? createLogger('write');
  const batches = chunk(rows, batchSize);
  const outcomes: BatchOutcome[] = [];

  for (const [index, batch] of batches.entries()) {
    try {
      const body = await send(batch, index, batches.length);
      outcomes.push({ index, size: batch.length, status: 'ok', body });
      log.debug({ batch: index + 1, of: batches.length, size: batch.length }, 'batch written');
    } catch (err) {
      const outcome: BatchOutcome = {
        index,
        size: batch.length,
        status: 'failed',
        error: err instanceof Error ? err.message : String(err),
      };
      if (err instanceof HttpError) {
        outcome.httpStatus = err.status;
        outcome.body = err.body;
      }
      outcomes.push(outcome);
      log.error({ batch: index + 1, of: batches.length, status: outcome.httpStatus, err }, 'batch failed');
    }

    if (pauseMs && index < batches.length - 1) await clock.sleep(pauseMs);
  }

  const failed = outcomes.filter(o => o.status === 'failed').length;
  log.info({ batches: outcomes.length, failed }, 'write complete');
  return { batches: outcomes, succeeded: outcomes.length - failed, failed };
}
