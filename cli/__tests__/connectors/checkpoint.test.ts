import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync, statSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FileCheckpointStore, MemoryCheckpointStore } from '../../connectors/base/checkpoint.js';
import { makeTempDir, removeTempDir } from './_helpers.js';

describe('MemoryCheckpointStore', () => {
  it('loads what was saved', async () => {
    const store = new MemoryCheckpointStore({ a: '1' });
    await store.save('b', '2');

    expect(await store.load('a')).toBe('1');
    expect(await store.load('b')).toBe('2');
    expect(await store.load('c')).toBeUndefined();
  });
});

describe('FileCheckpointStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('persists values across instances with owner-only permissions', async () => {
    const path = join(dir, 'nested', 'checkpoints.json');
    await new FileCheckpointStore(path).save('sales', 'cursor-1');

    expect(await new FileCheckpointStore(path).load('sales')).toBe('cursor-1');
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ sales: 'cursor-1' });
    expect(statSync(path).mode & 0o777).toBe(0o600);
  });

  it('removes one entry and reports whether it existed', async () => {
    const store = new FileCheckpointStore(join(dir, 'checkpoints.json'));
    await store.save('a', '1');
    await store.save('b', '2');

    expect(await store.remove('a')).toBe(true);
    expect(await store.remove('a')).toBe(false);
    expect(store.list()).toEqual({ b: '2' });
  });

  it('returns nothing when the file does not exist', async () => {
    expect(await new FileCheckpointStore(join(dir, 'none.json')).load('a')).toBeUndefined();
  });

  it('rejects a file that is not a JSON object', async () => {
    const path = join(dir, 'bad.json');
    writeFileSync(path, '[1, 2]');

    await expect(new FileCheckpointStore(path).load('a')).rejects.toThrow(`Checkpoint file ${path} does not contain a JSON object`);
  });
});
