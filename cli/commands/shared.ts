import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import type { z } from 'zod';
import { getCheckpointPath, loadConfig, type CatnipConfig } from '../config.js';
import { CONNECTORS, envVarName, flagName } from '../connectors/index.js';
import {
  FileCheckpointStore, HttpError, SchemaValidationError, exportSpinner, isRecord, parseConfig, parseDate, toTable,
  writeReport, writeTable,
  type ConnectorDeps, type ConnectorSource, type JsonRecord, type Table, type WriteReport,
} from '../connectors/base/index.js';

/** Parsed commander options; credential flags arrive under their camelCase key. */
export type CommandOpts = Record<string, unknown>;

export interface ExportOpts extends CommandOpts {
  out: string;
}

/** Adds one `--<name> <value>` flag per credential of the connector. */
export function withCredentials(cmd: Command, source: ConnectorSource): Command {
  for (const key of CONNECTORS[source].credentials) {
    cmd.option(`--${flagName(key)} <value>`, `${key} (or ${envVarName(source, key)} env)`);
  }
  return cmd;
}

/** Adds the credential flags and the output directory of an export. */
export function exportCommand(parent: Command, source: ConnectorSource, name: string, description: string): Command {
  const cmd = parent
    .command(name)
    .description(description)
    .option('-o, --out <dir>', 'Output directory', `./exports/${source}`);
  return withCredentials(cmd, source);
}

/**
 * Connector settings from the config file, overridden by env vars, overridden
 * by flags.
 */
export function resolveConnectorConfig(
  source: ConnectorSource,
  flags: CommandOpts,
  env: NodeJS.ProcessEnv = process.env,
  fileConfig: CatnipConfig = loadConfig(),
): Record<string, unknown> {
  const resolved: Record<string, unknown> = { ...fileConfig.connectors[source] };
  for (const key of CONNECTORS[source].credentials) {
    const fromEnv = env[envVarName(source, key)];
    if (fromEnv) resolved[key] = fromEnv;
    const fromFlag = flags[key];
    if (typeof fromFlag === 'string') resolved[key] = fromFlag;
  }
  return resolved;
}

export function connectorDeps(): ConnectorDeps {
  return { checkpoints: new FileCheckpointStore(getCheckpointPath()) };
}

/** Validates the resolved settings and builds the connector, exiting on bad config. */
export function createConnector<S extends z.ZodTypeAny, C>(
  source: ConnectorSource,
  flags: CommandOpts,
  schema: S,
  make: (config: z.output<S>, deps: ConnectorDeps) => C,
): C {
  try {
    const config = parseConfig(schema, resolveConnectorConfig(source, flags), CONNECTORS[source].displayName);
    return make(config, connectorDeps());
  } catch (err) {
    fail(err);
  }
}

export function fail(err: unknown): never {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`\n✗ ${message}`));
  if (err instanceof SchemaValidationError) {
    for (const issue of err.issues) {
      console.error(chalk.red(`  row ${issue.row} ${issue.path || '(row)'}: ${issue.message}`));
    }
  } else if (err instanceof HttpError && err.body) {
    console.error(chalk.gray(`  ${err.body}`));
  }
  process.exit(1);
}

/** Fetches one resource behind a spinner and writes it to the output directory. */
export async function runExport(
  source: ConnectorSource,
  resource: string,
  out: string,
  fetch: () => Promise<Table>,
  params?: Record<string, unknown>,
): Promise<void> {
  const spinner = exportSpinner(`Fetching ${CONNECTORS[source].displayName} ${resource}...`);
  let table: Table;
  try {
    table = await fetch();
    spinner.succeed(`${table.rows.length} ${resource} rows fetched`);
  } catch (err) {
    spinner.fail(`${CONNECTORS[source].displayName} ${resource} failed`);
    fail(err);
  }
  writeTable(out, source, resource, table, params);
}

/** Runs a batch write and prints its report. A failed batch sets a non-zero exit code. */
export async function runWrite(label: string, write: () => Promise<WriteReport>): Promise<void> {
  const spinner = exportSpinner(label);
  let report: WriteReport;
  try {
    report = await write();
    spinner.stop();
  } catch (err) {
    spinner.fail(label);
    fail(err);
  }
  writeReport(report);
  if (report.failed > 0) process.exitCode = 1;
}

/** Reads a JSONL file (one object per line) into a table. */
export function readRows(path: string): Table {
  const records: JsonRecord[] = [];
  const lines = readFileSync(path, 'utf-8').split('\n');
  for (const [i, line] of lines.entries()) {
    if (line.trim() === '') continue;
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (err) {
      throw new Error(`${path}:${i + 1}: invalid JSON`, { cause: err });
    }
    if (!isRecord(value)) throw new Error(`${path}:${i + 1}: expected a JSON object`);
    records.push(value);
  }
  return toTable(records, { source: path });
}

// ---- Option parsers ----

export function dateOption(value: string): Date {
  try {
    return parseDate(value);
  } catch {
    throw new InvalidArgumentError('Expected a date such as 2024-01-31.');
  }
}

export function intOption(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Expected an integer.');
  return n;
}

/** "1,2,3" → [1, 2, 3] */
export function idListOption(value: string): number[] {
  return value.split(',').filter(s => s.trim() !== '').map(s => intOption(s.trim()));
}

/** Every day from `from` to `to` inclusive, at midnight UTC. */
export function daysBetween(from: Date, to: Date): Date[] {
  const days: Date[] = [];
  const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  for (let t = start; t <= to.getTime(); t += 86_400_000) days.push(new Date(t));
  return days;
}
