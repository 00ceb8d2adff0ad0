/**
 * Shared export utilities: JSONL writing, manifest, spinners, write reports.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ExportManifest } from '../../schema/types.js';
import type { Table } from './accumulator.js';
import type { ConnectorSource } from './types.js';
import type { WriteReport } from './write.js';

export type { ExportManifest };

export function toJsonl(rows: readonly unknown[]): string {
  return rows.map(row => JSON.stringify(row) + '\n').join('');
}

/**
 * Write `<resource>.jsonl` and `<resource>.manifest.json` into outDir, so
 * several resources can share one directory.
 * Returns the manifest that was written.
 */
export function writeTable(
  outDir: string,
  source: ConnectorSource,
  resource: string,
  table: Table,
  params?: Record<string, unknown>,
): ExportManifest {
  mkdirSync(outDir, { recursive: true });
  writeFileSync(join(outDir, `${resource}.jsonl`), toJsonl(table.rows));

  const manifest: ExportManifest = {
    source,
    resource,
    exportedAt: new Date().toISOString(),
    rows: table.rows.length,
    columns: table.columns,
    ...(table.notice ? { notice: table.notice } : {}),
    ...(params ? { params } : {}),
  };
  writeFileSync(join(outDir, `${resource}.manifest.json`), JSON.stringify(manifest, null, 2) + '\n');

  if (table.notice) console.error(chalk.yellow(`Partial result: ${table.notice}`));
  console.error(chalk.green(`\nExport complete → ${join(outDir, `${resource}.jsonl`)} (${manifest.rows} rows)`));
  return manifest;
}

/** Print a per-batch summary of a write. */
export function writeReport(report: WriteReport): void {
  for (const batch of report.batches) {
    const label = `batch ${batch.index + 1} (${batch.size} rows)`;
    if (batch.status === 'ok') {
      console.log(chalk.green(`  ✓ ${label}`));
    } else {
      const status = batch.httpStatus !== undefined ? `HTTP ${batch.httpStatus}: ` : '';
      console.log(chalk.red(`  ✗ ${label} ${status}${batch.error ?? ''}`));
    }
  }
  const colour = report.failed > 0 ? chalk.yellow : chalk.green;
  console.log(colour(`\n${report.succeeded} batch(es) succeeded, ${report.failed} failed`));
}

/** Create a labeled ora spinner on stderr. */
export function exportSpinner(label: string): Ora {
  return ora({ text: label, stream: process.stderr }).start();
}
