/**
 * Tests for the JSON file key-value store
 *
 * Uses temporary directories for all file system operations.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  JsonFileKvStore,
  KeyNotFoundError,
  LockTimeoutError,
  StoreCorruptError,
  StoreSessionClosedError,
} from './kv-store.js';

describe('JsonFileKvStore', () => {
  let tempDir: string;
  let file: string;
  let lock: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kubetun-kv-'));
    file = path.join(tempDir, 'state', 'state.json');
    lock = path.join(tempDir, 'state', '.lock');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('session operations', () => {
    it('should throw KeyNotFoundError for missing keys', async () => {
      const store = new JsonFileKvStore({ file, lockfile: lock });
      await store.withSession((session) => {
        expect(() => session.get('missing')).toThrow(KeyNotFoundError);
      });
    });

    it('should return values set in the same session', async () => {
      const store = new JsonFileKvStore({ file, lockfile: lock });
      await store.withSession((session) => {
        session.set('a', { nested: [1, 'two', null] });
        expect(session.get('a')).toEqual({ nested: [1, 'two', null] });
      });
    });

    it('should list all keys', async () => {
      const store = new JsonFileKvStore({ file });
      await store.withSession((session) => {
        session.set('a', 1);
        session.set('b', 2);
        expect(session.list().sort()).toEqual(['a', 'b']);
      });
    });

    it('should delete keys and reject deleting missing keys', async () => {
      const store = new JsonFileKvStore({ file });
      await store.withSession((session) => {
        session.set('a', 1);
        session.delete('a');
        expect(session.list()).toEqual([]);
        expect(() => session.delete('a')).toThrow(KeyNotFoundError);
      });
    });

    it('should leave other keys untouched when one key is updated', async () => {
      const store = new JsonFileKvStore({ file, lockfile: lock });
      await store.withSession((session) => {
        session.set('a', 'first');
        session.set('b', 'other');
      });
      await store.withSession((session) => {
        session.set('a', 'second');
      });
      await store.withSession((session) => {
        expect(session.get('a')).toBe('second');
        expect(session.get('b')).toBe('other');
      });
    });
  });

  describe('durability', () => {
    it('should return an equal value from a new store instance', async () => {
      const value = { spec: { host: 'bastion' }, ports: [10001, 10002] };
      await new JsonFileKvStore({ file, lockfile: lock }).withSession((session) => {
        session.set('key', value);
      });

      // A fresh instance stands in for another process
      await new JsonFileKvStore({ file, lockfile: lock }).withSession((session) => {
        expect(session.get('key')).toEqual(value);
      });
    });

    it('should re-read the file in every session', async () => {
      const store = new JsonFileKvStore({ file, lockfile: lock });
      await store.withSession((session) => {
        session.set('counter', 1);
      });

      await fs.writeFile(file, JSON.stringify({ counter: 2 }), 'utf-8');

      await store.withSession((session) => {
        expect(session.get('counter')).toBe(2);
      });
    });

    it('should not create the file when the session never touched the data', async () => {
      await new JsonFileKvStore({ file, lockfile: lock }).withSession(() => undefined);
      await expect(fs.access(file)).rejects.toThrow();
    });

    it('should write the document as a JSON object', async () => {
      await new JsonFileKvStore({ file }).withSession((session) => {
        session.set('x', [1, 2]);
      });
      const content = JSON.parse(await fs.readFile(file, 'utf-8'));
      expect(content).toEqual({ x: [1, 2] });
    });

    it('should save when the callback throws', async () => {
      const store = new JsonFileKvStore({ file, lockfile: lock });
      await expect(
        store.withSession((session) => {
          session.set('partial', true);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      await store.withSession((session) => {
        expect(session.get('partial')).toBe(true);
      });
    });

    it('should reject a document that is not an object', async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, '[1, 2, 3]', 'utf-8');
      await new JsonFileKvStore({ file }).withSession((session) => {
        expect(() => session.list()).toThrow(StoreCorruptError);
      });
    });

    it('should reject invalid JSON', async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, '{not json', 'utf-8');
      await new JsonFileKvStore({ file }).withSession((session) => {
        expect(() => session.get('a')).toThrow(StoreCorruptError);
      });
    });
  });

  describe('session lifecycle', () => {
    it('should refuse access after the session is closed', async () => {
      const session = await new JsonFileKvStore({ file, lockfile: lock }).begin();
      session.set('a', 1);
      await session.close();

      expect(session.isClosed).toBe(true);
      expect(() => session.get('a')).toThrow(StoreSessionClosedError);
    });

    it('should treat a second close as a no-op', async () => {
      const session = await new JsonFileKvStore({ file, lockfile: lock }).begin();
      await session.close();
      await expect(session.close()).resolves.toBeUndefined();
    });
  });

  describe('locking', () => {
    it('should time out while another session holds the lock', async () => {
      const holder = await new JsonFileKvStore({ file, lockfile: lock }).begin();
      const contender = new JsonFileKvStore({ file, lockfile: lock, lockTimeoutMs: 300 });

      try {
        await expect(contender.begin()).rejects.toBeInstanceOf(LockTimeoutError);
      } finally {
        await holder.close();
      }
    });

    it('should name the lock path and timeout in the error', async () => {
      const holder = await new JsonFileKvStore({ file, lockfile: lock }).begin();
      const contender = new JsonFileKvStore({ file, lockfile: lock, lockTimeoutMs: 200 });

      try {
        await expect(contender.begin()).rejects.toThrow(`Timed out after 200ms waiting for lock '${lock}'`);
      } finally {
        await holder.close();
      }
    });

    it('should acquire the lock once the holder closes', async () => {
      const holder = await new JsonFileKvStore({ file, lockfile: lock }).begin();
      holder.set('owner', 'first');
      await holder.close();

      const next = await new JsonFileKvStore({ file, lockfile: lock, lockTimeoutMs: 300 }).begin();
      expect(next.get('owner')).toBe('first');
      await next.close();
    });
  });
});
