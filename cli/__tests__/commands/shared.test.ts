import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  daysBetween, dateOption, exportCommand, idListOption, intOption, readRows, resolveConnectorConfig, withCredentials,
} from '../../commands/shared.js';
import { makeTempDir, removeTempDir } from '../connectors/_helpers.js';

describe('resolveConnectorConfig', () => {
  const fileConfig = { connectors: { cheq: { apiKey: 'file-key', options: { batchSize: 5 } } } };

  it('prefers flags over env over the config file', () => {
    expect(resolveConnectorConfig('cheq', { apiKey: 'flag-key' }, { CHEQ_API_KEY: 'env-key' }, fileConfig))
      .toEqual({ apiKey: 'flag-key', options: { batchSize: 5 } });
    expect(resolveConnectorConfig('cheq', {}, { CHEQ_API_KEY: 'env-key' }, fileConfig))
      .toEqual({ apiKey: 'env-key', options: { batchSize: 5 } });
    expect(resolveConnectorConfig('cheq', {}, { CHEQ_API_KEY: '' }, fileConfig))
      .toEqual({ apiKey: 'file-key', options: { batchSize: 5 } });
  });

  it('ignores flags that are not credentials', () => {
    expect(resolveConnectorConfig('cheq', { out: './x' }, {}, { connectors: {} })).toEqual({});
  });
});

describe('credential flags', () => {
  it('adds one kebab-case flag per credential', () => {
    const cmd = withCredentials(new Command('x'), 'big-commerce');
    expect(cmd.options.map(o => o.long)).toEqual(['--store-hash', '--api-token']);
  });

  it('export commands default the output directory per connector', () => {
    const cmd = exportCommand(new Command('catnip'), 'cheq', 'menu', 'Export the menu');
    expect(cmd.options.map(o => o.long)).toEqual(['--out', '--api-key']);
    expect(cmd.getOptionValue('out')).toBe('./exports/cheq');
  });
});

describe('readRows', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir('catnip-rows');
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('reads one object per line and skips blank lines', () => {
    const path = join(dir, 'rows.jsonl');
    writeFileSync(path, '{"a":1}\n\n{"a":2,"b":"x"}\n');

    expect(readRows(path)).toEqual({ columns: ['a', 'b'], rows: [{ a: 1 }, { a: 2, b: 'x' }] });
  });

  it('names the line that is not JSON', () => {
    const path = join(dir, 'rows.jsonl');
    writeFileSync(path, '{"a":1}\nnope\n');

    expect(() => readRows(path)).toThrow(`${path}:2: invalid JSON`);
  });

  it('rejects lines that are not objects', () => {
    const path = join(dir, 'rows.jsonl');
    writeFileSync(path, '[1]\n');

    expect(() => readRows(path)).toThrow(`${path}:1: expected a JSON object`);
  });
});

describe('option parsers', () => {
  it('parse dates and reject garbage', () => {
    expect(dateOption('2024-01-31').toISOString()).toBe('2024-01-31T00:00:00.000Z');
    expect(() => dateOption('someday')).toThrow(InvalidArgumentError);
  });

  it('parse integers and id lists', () => {
    expect(intOption('42')).toBe(42);
    expect(() => intOption('1.5')).toThrow('Expected an integer.');
    expect(idListOption('1, 2,,3')).toEqual([1, 2, 3]);
  });
});

describe('daysBetween', () => {
  it('lists every day inclusive, from midnight of the first', () => {
    const days = daysBetween(new Date('2024-02-28T15:00:00Z'), new Date('2024-03-01T00:00:00Z'));
    expect(days.map(d => d.toISOString())).toEqual([
      '2024-02-28T00:00:00.000Z',
      '2024-02-29T00:00:00.000Z',
      '2024-03-01T00:00:00.000Z',
    ]);
  });
});
