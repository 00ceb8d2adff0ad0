// Output types written by the CLI next to exported rows

import type { ConnectorSource } from '../connectors/base/types.js';

export interface ExportManifest {
  source: ConnectorSource;
  resource: string;
  exportedAt: string;
  rows: number;
  columns: string[];
  /** Set when pagination was cut short by a circuit breaker. */
  notice?: string;
  params?: Record<string, unknown>;
}
