import { mkdtemp, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import nock from 'nock';
import {
  HttpClient,
  createLogger,
  keyFor,
  type RequestKey,
} from '@dota-stats/core';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSystemCacheStore } from './filesystem-cache-store.js';

const key: RequestKey = { hash: 'abc123', family: 'players_42' };

describe('FileSystemCacheStore', () => {
  let directory: string;
  let store: FileSystemCacheStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'dota-stats-cache-'));
    store = new FileSystemCacheStore({ directory });
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('basic operations', () => {
    it('should place entries under their endpoint family', () => {
      expect(store.pathFor(key)).toBe(
        join(directory, 'players_42', 'abc123.json'),
      );
    });

    it('should return a miss for entries that do not exist', async () => {
      await expect(store.load(key)).resolves.toEqual({ status: 'miss' });
    });

    it('should round-trip saved values', async () => {
      const value = { account_id: 42, profile: { personaname: 'tester' } };

      await expect(store.save(key, value)).resolves.toEqual({
        status: 'stored',
      });
      await expect(store.load(key)).resolves.toEqual({ status: 'hit', value });
    });

    it('should write pretty-printed JSON', async () => {
      await store.save(key, { a: [1, 2] });

      const raw = await readFile(store.pathFor(key), 'utf8');
      expect(raw).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');
    });

    it('should overwrite an existing entry', async () => {
      await store.save(key, { version: 1 });
      await store.save(key, { version: 2 });

      await expect(store.load(key)).resolves.toEqual({
        status: 'hit',
        value: { version: 2 },
      });
    });

    it('should delete a single entry and ignore missing ones', async () => {
      await store.save(key, 1);

      await store.delete(key);
      await expect(store.delete(key)).resolves.toBeUndefined();
      await expect(store.load(key)).resolves.toEqual({ status: 'miss' });
    });

    it('should clear the whole directory', async () => {
      await store.save(key, 1);
      await store.save({ hash: 'def', family: 'heroes' }, 2);

      await store.clear();

      await expect(store.load(key)).resolves.toEqual({ status: 'miss' });
      await expect(
        store.load({ hash: 'def', family: 'heroes' }),
      ).resolves.toEqual({ status: 'miss' });
    });
  });

  describe('failures', () => {
    it('should report unparseable content as an error', async () => {
      await mkdir(join(directory, key.family), { recursive: true });
      await writeFile(store.pathFor(key), '{"truncated":', 'utf8');

      const result = await store.load(key);

      expect(result.status).toBe('error');
    });

    it('should report unreadable entries as an error', async () => {
      await mkdir(store.pathFor(key), { recursive: true });

      const result = await store.load(key);

      expect(result.status).toBe('error');
    });

    it('should report write failures instead of throwing', async () => {
      const blocker = join(directory, 'not-a-directory');
      await writeFile(blocker, 'x', 'utf8');
      const blocked = new FileSystemCacheStore({ directory: blocker });

      const result = await blocked.save(key, { ok: true });

      expect(result.status).toBe('error');
    });
  });

  describe('with HttpClient', () => {
    const origin = 'https://api.example.com';
    const baseUrl = `${origin}/api`;

    beforeEach(() => {
      nock.disableNetConnect();
    });

    afterEach(() => {
      nock.cleanAll();
      nock.enableNetConnect();
    });

    it('should refetch and rewrite a corrupted entry', async () => {
      const requestKey = keyFor(baseUrl, 'matches/7');
      await mkdir(join(directory, requestKey.family), { recursive: true });
      await writeFile(store.pathFor(requestKey), 'not json', 'utf8');
      nock(origin).get('/api/matches/7').reply(200, { match_id: 7 });

      const client = new HttpClient({
        baseUrl,
        minIntervalMs: 0,
        cache: store,
        logger: createLogger({ level: 'silent' }),
      });
      const result = await client.get('matches/7');

      expect(result).toEqual({ match_id: 7 });
      const rewritten = await readFile(store.pathFor(requestKey), 'utf8');
      expect(JSON.parse(rewritten)).toEqual({ match_id: 7 });
    });

    it('should serve later calls from disk across client instances', async () => {
      const scope = nock(origin)
        .get('/api/heroes')
        .once()
        .reply(200, [{ id: 1 }]);
      const options = {
        baseUrl,
        minIntervalMs: 0,
        cache: store,
        logger: createLogger({ level: 'silent' }),
      };

      await new HttpClient(options).get('heroes');
      const cached = await new HttpClient(options).get('heroes');

      expect(scope.isDone()).toBe(true);
      expect(cached).toEqual([{ id: 1 }]);
    });
  });
});
