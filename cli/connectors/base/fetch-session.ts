/**
 * State of one logical "get all records" operation, owned by a pagination
 * driver for the duration of the call.
 */

import type { Logger } from '../../logger.js';
import type { Clock } from './clock.js';
import type { CircuitBreaker, JsonRecord, PageResult } from './types.js';

export type FetchState = 'init' | 'fetching-first' | 'fetching-next' | 'done' | 'truncated' | 'failed';

const TRANSITIONS: Record<FetchState, readonly FetchState[]> = {
  init: ['fetching-first'],
  'fetching-first': ['fetching-next', 'done', 'truncated', 'failed'],
  'fetching-next': ['fetching-next', 'done', 'truncated', 'failed'],
  done: [],
  truncated: [],
  failed: [],
};

export interface FetchOutcome {
  records: JsonRecord[];
  /** Requests issued for this fetch, retries not counted. */
  requests: number;
  state: 'done' | 'truncated';
  /** Set when pagination was cut short. */
  notice?: string;
}

export class FetchSession {
  readonly label: string;
  private _state: FetchState = 'init';
  private _requests = 0;
  private readonly records: JsonRecord[] = [];
  private readonly startedAt: number;
  private notice?: string;

  constructor(
    label: string,
    private readonly breaker: CircuitBreaker,
    private readonly clock: Clock,
    private readonly log: Logger,
  ) {
    this.label = label;
    this.startedAt = clock.now();
  }

  get state(): FetchState {
    return this._state;
  }

  get requests(): number {
    return this._requests;
  }

  get terminated(): boolean {
    return TRANSITIONS[this._state].length === 0;
  }

  transition(next: FetchState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`${this.label}: illegal fetch transition ${this._state} -> ${next}`);
    }
    this._state = next;
  }

  countRequest(): void {
    this._requests++;
  }

  accept(result: PageResult): void {
    for (const record of result.records) this.records.push(record);
  }

  /**
   * Circuit breaker, evaluated at iteration and batch boundaries only.
   * Returns true (and truncates the session) once a ceiling is reached.
   */
  breakerTripped(): boolean {
    const { maxIterations, maxElapsedMs } = this.breaker;
    if (maxIterations !== undefined && this._requests >= maxIterations) {
      this.truncate(`stopped after ${this._requests} requests (iteration ceiling ${maxIterations})`);
      return true;
    }
    const elapsed = this.clock.now() - this.startedAt;
    if (maxElapsedMs !== undefined && elapsed >= maxElapsedMs) {
      this.truncate(`stopped after ${elapsed}ms (time ceiling ${maxElapsedMs}ms)`);
      return true;
    }
    return false;
  }

  truncate(notice: string): void {
    this.transition('truncated');
    this.notice = notice;
    this.log.warn({ fetch: this.label, requests: this._requests, records: this.records.length }, `pagination cut short: ${notice}`);
  }

  /** Moves to `failed` and hands the error back for rethrowing. */
  fail(err: unknown): unknown {
    if (!this.terminated) this.transition('failed');
    this.log.error({ fetch: this.label, requests: this._requests, err }, 'fetch failed');
    return err;
  }

  finish(): FetchOutcome {
    if (this._state === 'fetching-first' || this._state === 'fetching-next') {
      this.transition('done');
    }
    const state = this._state;
    if (state !== 'done' && state !== 'truncated') {
      throw new Error(`${this.label}: cannot finish a fetch in state ${state}`);
    }
    this.log.info({ fetch: this.label, requests: this._requests, records: this.records.length, state }, 'fetch complete');
    return {
      records: this.records,
      requests: this._requests,
      state,
      ...(this.notice ? { notice: this.notice } : {}),
    };
  }
}

/** Combines the outcomes of fanned-out fetches into one. */
export function mergeOutcomes(outcomes: readonly FetchOutcome[]): FetchOutcome {
  const notices = outcomes.flatMap(o => (o.notice ? [o.notice] : []));
  return {
    records: outcomes.flatMap(o => o.records),
    requests: outcomes.reduce((sum, o) => sum + o.requests, 0),
    state: outcomes.some(o => o.state === 'truncated') ? 'truncated' : 'done',
    ...(notices.length > 0 ? { notice: notices.join('; ') } : {}),
  };
}
