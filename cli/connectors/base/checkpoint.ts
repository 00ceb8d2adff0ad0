/**
 * Named checkpoint storage for resumable pagination and cached tokens.
 */

import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export interface CheckpointStore {
  load(name: string): Promise<string | undefined>;
  save(name: string, token: string): Promise<void>;
}

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly values = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    for (const [name, token] of Object.entries(initial ?? {})) this.values.set(name, token);
  }

  async load(name: string): Promise<string | undefined> {
    return this.values.get(name);
  }

  async save(name: string, token: string): Promise<void> {
    this.values.set(name, token);
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

/** JSON file of name → token, written with owner-only permissions. */
export class FileCheckpointStore implements CheckpointStore {
  constructor(private readonly filePath: string) {}

  async load(name: string): Promise<string | undefined> {
    return this.readAll()[name];
  }

  async save(name: string, token: string): Promise<void> {
    this.writeAll({ ...this.readAll(), [name]: token });
  }

  async remove(name: string): Promise<boolean> {
    const all = this.readAll();
    if (!(name in all)) return false;
    delete all[name];
    this.writeAll(all);
    return true;
  }

  list(): Record<string, string> {
    return this.readAll();
  }

  private readAll(): Record<string, string> {
    if (!existsSync(this.filePath)) return {};
    const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Checkpoint file ${this.filePath} does not contain a JSON object`);
    }
    const result: Record<string, string> = {};
    for (const [name, token] of Object.entries(parsed)) {
      if (typeof token === 'string') result[name] = token;
    }
    return result;
  }

  private writeAll(values: Record<string, string>): void {
    mkdirSync(dirname(this.filePath), { recursive: true, mode: 0o700 });
    writeFileSync(this.filePath, JSON.stringify(values, null, 2) + '\n', { mode: 0o600 });
    chmodSync(this.filePath, 0o600);
  }
}
