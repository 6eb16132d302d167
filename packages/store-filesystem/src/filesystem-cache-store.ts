import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, rm, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  toError,
  type CacheLookup,
  type CacheStore,
  type CacheWriteResult,
  type JsonValue,
  type RequestKey,
} from '@dota-stats/core';

export interface FileSystemCacheStoreOptions {
  /** Directory holding one subdirectory per endpoint family */
  directory: string;
  /** Indentation of the written JSON. Default: 2 */
  indent?: number;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Stores each response body as `<directory>/<family>/<hash>.json`.
 *
 * Entries never expire. Writes go to a temporary file that is renamed into
 * place, so a reader sees either the previous entry or the complete new one.
 */
export class FileSystemCacheStore implements CacheStore {
  readonly directory: string;
  private readonly indent: number;

  constructor({ directory, indent = 2 }: FileSystemCacheStoreOptions) {
    this.directory = directory;
    this.indent = indent;
  }

  pathFor(key: RequestKey): string {
    return join(this.directory, key.family, `${key.hash}.json`);
  }

  async load(key: RequestKey): Promise<CacheLookup> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'miss' };
      }
      return { status: 'error', error: toError(error) };
    }

    try {
      const value: JsonValue = JSON.parse(raw);
      return { status: 'hit', value };
    } catch (error) {
      return { status: 'error', error: toError(error) };
    }
  }

  async save(key: RequestKey, value: JsonValue): Promise<CacheWriteResult> {
    const target = this.pathFor(key);
    const temporary = `${target}.${randomUUID()}.tmp`;

    try {
      const serialized = JSON.stringify(value, null, this.indent);
      await mkdir(join(this.directory, key.family), { recursive: true });
      await writeFile(temporary, serialized, 'utf8');
      await rename(temporary, target);
      return { status: 'stored' };
    } catch (error) {
      await rm(temporary, { force: true }).catch(() => undefined);
      return { status: 'error', error: toError(error) };
    }
  }

  async delete(key: RequestKey): Promise<void> {
    try {
      await unlink(this.pathFor(key));
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async clear(): Promise<void> {
    await rm(this.directory, { recursive: true, force: true });
  }
}
