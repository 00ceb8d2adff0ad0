import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, parseConfig, writeBatches,
  type ConnectorDeps, type JsonRecord, type WriteReport,
} from './base/index.js';

export const GamedayConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url(),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type GamedayConfig = z.input<typeof GamedayConfigSchema>;

export class GamedayConnector extends Connector {
  private readonly apiKey: string;

  constructor(config: GamedayConfig, deps?: ConnectorDeps) {
    const { apiKey, baseUrl, options } = parseConfig(GamedayConfigSchema, config, 'Gameday');
    super({ source: 'gameday', displayName: 'Gameday', baseUrl, options, defaults: { batchSize: 100 } }, deps);
    this.apiKey = apiKey;
  }

  protected authHeaders(): Record<string, string> {
    return { 'x-api-key': this.apiKey };
  }

  /** Posts members in batches; a failed batch is reported and the rest still go out. */
  postMembers(members: readonly JsonRecord[], batchSize = this.batchSize): Promise<WriteReport> {
    return writeBatches({
      rows: members,
      batchSize,
      send: batch => this.client.request('add-members', { method: 'POST', body: { members: batch } }),
      clock: this.clock,
      logger: this.log,
    });
  }
}
