import { readFileSync, writeFileSync, mkdirSync, existsSync, chmodSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';

export const CatnipConfigSchema = z.object({
  /** Per connector: credentials plus an optional `options` block. */
  connectors: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
}).strict();

export type CatnipConfig = z.infer<typeof CatnipConfigSchema>;

/** Keys whose values are masked by `config show`. */
const SECRET_KEY = /token|secret|password|key/i;

export function getConfigDir(): string {
  return process.env.CATNIP_HOME || join(homedir(), '.catnip');
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

export function getCheckpointPath(): string {
  return join(getConfigDir(), 'checkpoints.json');
}

export function loadConfig(): CatnipConfig {
  const path = getConfigPath();
  if (!existsSync(path)) {
    return { connectors: {} };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Config file ${path} is not valid JSON`, { cause: err });
  }
  const parsed = CatnipConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Config file ${path} is invalid: ${detail}`);
  }
  return parsed.data;
}

export function saveConfig(config: CatnipConfig): void {
  mkdirSync(getConfigDir(), { recursive: true, mode: 0o700 });
  writeFileSync(getConfigPath(), JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
  chmodSync(getConfigPath(), 0o600);
}

/**
 * Sets one connector value. `options.<name>` keys land in the options block
 * and are read as JSON, so numbers and objects keep their type.
 */
export function setConnectorValue(config: CatnipConfig, source: string, key: string, value: string): CatnipConfig {
  const current = config.connectors[source] ?? {};
  let next: Record<string, unknown>;

  if (key.startsWith('options.')) {
    const name = key.slice('options.'.length);
    const existing = current.options;
    const options = typeof existing === 'object' && existing !== null && !Array.isArray(existing) ? existing : {};
    next = { ...current, options: { ...options, [name]: parseOptionValue(value) } };
  } else {
    next = { ...current, [key]: value };
  }
  return { ...config, connectors: { ...config.connectors, [source]: next } };
}

function parseOptionValue(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    // Bare words such as `skip` are plain strings
    return value;
  }
}

export function mask(key: string): string {
  if (key.length <= 8) return '****';
  return key.slice(0, 4) + '...' + key.slice(-4);
}

/** Copy of the config with secret-looking string values masked. */
export function maskedConfig(config: CatnipConfig): CatnipConfig {
  const connectors: CatnipConfig['connectors'] = {};
  for (const [source, values] of Object.entries(config.connectors)) {
    connectors[source] = Object.fromEntries(
      Object.entries(values).map(([k, v]) => [k, typeof v === 'string' && SECRET_KEY.test(k) ? mask(v) : v]),
    );
  }
  return { connectors };
}
