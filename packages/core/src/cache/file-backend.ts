/**
 * @module cache/file-backend
 * Cache storage on the local filesystem: one `<key>.bin` file per entry.
 *
 * Writes go to a temporary file that is renamed into place, so a reader
 * never sees a partial entry. With a `threshold`, the oldest files beyond
 * that count are removed after each write.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { CacheBackend } from '@replay-editor/types';
import { CacheBackendError, errorMessage } from '../errors';
import { Logger } from '../logger';

const log = new Logger('FileCache');

const SUFFIX = '.bin';
const KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface FileCacheOptions {
  /** Directory holding the entries. Created on first write. */
  dir: string;
  /** Keep at most this many entries. 0 disables pruning. */
  threshold?: number;
}

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export class FileCacheBackend implements CacheBackend {
  readonly name = 'file';

  readonly dir: string;
  private readonly threshold: number;

  constructor(options: FileCacheOptions) {
    this.dir = path.resolve(options.dir);
    this.threshold = Math.max(0, options.threshold ?? 0);
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    const file = this.pathFor(key);
    try {
      return new Uint8Array(await fs.readFile(file));
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw new CacheBackendError(this.name, `read ${file} failed: ${errorMessage(err)}`, err);
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    const file = this.pathFor(key);
    const temp = `${file}.tmp-${process.pid}-${randomUUID()}`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(temp, value);
      await fs.rename(temp, file);
    } catch (err) {
      await fs.rm(temp, { force: true }).catch(() => undefined);
      throw new CacheBackendError(this.name, `write ${file} failed: ${errorMessage(err)}`, err);
    }
    if (this.threshold > 0) {
      await this.prune(key);
    }
  }

  async delete(key: string): Promise<boolean> {
    const file = this.pathFor(key);
    try {
      await fs.unlink(file);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw new CacheBackendError(this.name, `delete ${file} failed: ${errorMessage(err)}`, err);
    }
  }

  async clear(): Promise<void> {
    for (const name of await this.listEntries()) {
      await fs.rm(path.join(this.dir, name), { force: true });
    }
  }

  /** Number of stored entries. */
  async count(): Promise<number> {
    return (await this.listEntries()).length;
  }

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new CacheBackendError(this.name, `invalid cache key '${key}'`);
    }
    return path.join(this.dir, `${key}${SUFFIX}`);
  }

  private async listEntries(): Promise<string[]> {
    try {
      return (await fs.readdir(this.dir)).filter((name) => name.endsWith(SUFFIX));
    } catch (err) {
      if (isMissing(err)) return [];
      throw new CacheBackendError(this.name, `list ${this.dir} failed: ${errorMessage(err)}`, err);
    }
  }

  /** Remove the oldest entries above the threshold, never the one just written. */
  private async prune(keep: string): Promise<void> {
    const names = await this.listEntries();
    if (names.length <= this.threshold) return;

    const keepName = `${keep}${SUFFIX}`;
    const aged: { name: string; mtimeMs: number }[] = [];
    for (const name of names) {
      if (name === keepName) continue;
      try {
        const stat = await fs.stat(path.join(this.dir, name));
        aged.push({ name, mtimeMs: stat.mtimeMs });
      } catch (err) {
        // Removed by a concurrent prune
        if (!isMissing(err)) throw new CacheBackendError(this.name, errorMessage(err), err);
      }
    }
    aged.sort((a, b) => a.mtimeMs - b.mtimeMs || a.name.localeCompare(b.name));

    const excess = names.length - this.threshold;
    for (const { name } of aged.slice(0, excess)) {
      await fs.rm(path.join(this.dir, name), { force: true });
    }
    log.debug(`Pruned ${Math.min(excess, aged.length)} entries from ${this.dir}`);
  }
}
