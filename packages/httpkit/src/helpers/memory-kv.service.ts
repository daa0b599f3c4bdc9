import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import type { KVBase } from '../types/kv.types.js';
import { ConfigService } from '../services/config.service.js';

/** In-process key/value store, optionally mirrored to a JSON file on every write. */
export class MemoryKVService implements KVBase {
  private readonly store = new Map<string, unknown>();
  private storeFile: string | null = null;

  persist(file: string): void {
    this.storeFile = file;

    if (existsSync(file)) {
      const data: unknown = JSON.parse(readFileSync(file, 'utf-8'));

      if (data && typeof data === 'object') {
        for (const [key, value] of Object.entries(data)) {
          this.store.set(key, value);
        }
      }
    }
    else {
      mkdirSync(dirname(file), { recursive: true });
      this.save();
    }
  }

  get<T = unknown>(key: string): T | undefined {
    // values are stored as given; callers pick T
    return this.store.get(key) as T | undefined;
  }

  set<T = unknown>(key: string, value: T): void {
    this.store.set(key, value);
    this.save();
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  del(key: string): void {
    this.store.delete(key);
    this.save();
  }

  keys(prefix = ''): string[] {
    return [...this.store.keys()].filter((key) => key.startsWith(prefix));
  }

  private save(): void {
    if (this.storeFile) {
      const data = JSON.stringify(Object.fromEntries(this.store), null, 2);
      writeFileSync(this.storeFile, data, 'utf-8');
    }
  }
}

export const createMemoryKv = (id: string, persist = false) => {
  const kv = new MemoryKVService();

  if (persist) {
    kv.persist(join(ConfigService.getRootDir(), `data/kv-${id}.json`));
  }

  return kv;
};
