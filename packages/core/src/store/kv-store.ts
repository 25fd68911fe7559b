/**
 * Key-Value Store
 *
 * A JSON-document backed key-value store shared by independent CLI processes.
 *
 * Access happens through sessions: `begin()` acquires the (optional) advisory
 * lock and returns a session handle; the session loads the file lazily on first
 * access and writes it back when closed. Cached data belongs to the session and
 * is dropped on close, so every session reads what the previous lock holder wrote.
 */

import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import { isErrnoException } from '../utils/errors.js';

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Key-value store contract
 */
export interface KvStore {
  /**
   * @throws KeyNotFoundError if the key is absent
   */
  get(key: string): JsonValue;
  set(key: string, value: JsonValue): void;
  /**
   * @throws KeyNotFoundError if the key is absent
   */
  delete(key: string): void;
  list(): string[];
}

/** Default time to wait for the store lock */
export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

const LOCK_RETRY_INTERVAL_MS = 100;

/**
 * Error thrown when a key is not present in the store
 */
export class KeyNotFoundError extends Error {
  constructor(
    public readonly key: string,
    public readonly source?: string
  ) {
    super(source ? `Key '${key}' not found in ${source}` : `Key '${key}' not found`);
    this.name = 'KeyNotFoundError';
  }
}

/**
 * Error thrown when the store lock could not be acquired in time
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for lock '${lockPath}'. ` +
        'Another kubetun process may be holding it.'
    );
    this.name = 'LockTimeoutError';
  }
}

/**
 * Error thrown when the state file does not contain a JSON object
 */
export class StoreCorruptError extends Error {
  constructor(
    public readonly file: string,
    reason: string
  ) {
    super(`Store file '${file}' is corrupt: ${reason}`);
    this.name = 'StoreCorruptError';
  }
}

/**
 * Error thrown when a closed session is used
 */
export class StoreSessionClosedError extends Error {
  constructor(public readonly file: string) {
    super(`Session for '${file}' is closed; begin a new session to access the store`);
    this.name = 'StoreSessionClosedError';
  }
}

/**
 * Options for creating a JsonFileKvStore
 */
export interface JsonFileKvStoreOptions {
  /** JSON document holding the whole mapping */
  file: string;
  /** Lock path guarding the file across processes. Without it, sessions are unlocked. */
  lockfile?: string;
  lockTimeoutMs?: number;
}

/**
 * File-backed key-value store
 *
 * @example
 * const store = new JsonFileKvStore({ file: 'state.json', lockfile: '.lock' });
 * await store.withSession((session) => {
 *   session.set('a', 1);
 * });
 */
export class JsonFileKvStore {
  readonly file: string;
  readonly lockfile?: string;
  readonly lockTimeoutMs: number;

  constructor(options: JsonFileKvStoreOptions) {
    this.file = options.file;
    this.lockfile = options.lockfile;
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  /**
   * Start a session, acquiring the lock first when one is configured
   *
   * @throws LockTimeoutError if the lock is not acquired within `lockTimeoutMs`
   */
  async begin(): Promise<JsonFileKvSession> {
    const release = this.lockfile ? await acquireLock(this.lockfile, this.lockTimeoutMs) : undefined;
    return new JsonFileKvSession(this.file, release);
  }

  /**
   * Run `fn` inside a session; the session is always closed afterwards
   */
  async withSession<T>(fn: (session: JsonFileKvSession) => T | Promise<T>): Promise<T> {
    const session = await this.begin();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }

  toString(): string {
    return `JsonFileKvStore(${this.file})`;
  }
}

/**
 * A single locked view of a JsonFileKvStore
 */
export class JsonFileKvSession implements KvStore {
  private data = new Map<string, JsonValue>();
  private loaded = false;
  private closed = false;

  constructor(
    readonly file: string,
    private readonly release?: () => Promise<void>
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get(key: string): JsonValue {
    const data = this.load();
    const value = data.get(key);
    if (value === undefined) {
      throw new KeyNotFoundError(key, this.file);
    }
    return value;
  }

  set(key: string, value: JsonValue): void {
    this.load().set(key, value);
  }

  delete(key: string): void {
    const data = this.load();
    if (!data.delete(key)) {
      throw new KeyNotFoundError(key, this.file);
    }
  }

  list(): string[] {
    return [...this.load().keys()];
  }

  /**
   * Write back the mapping (if it was loaded) and release the lock
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    try {
      if (this.loaded) {
        this.save();
      }
    } finally {
      this.closed = true;
      this.loaded = false;
      this.data = new Map();
      if (this.release) {
        await this.release();
      }
    }
  }

  toString(): string {
    return this.file;
  }

  private load(): Map<string, JsonValue> {
    if (this.closed) {
      throw new StoreSessionClosedError(this.file);
    }
    if (!this.loaded) {
      this.data = readDocument(this.file);
      this.loaded = true;
    }
    return this.data;
  }

  private save(): void {
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    // Write-then-rename so a crash never leaves a truncated document behind
    const tmpFile = `${this.file}.${process.pid}.tmp`;
    fs.writeFileSync(tmpFile, JSON.stringify(Object.fromEntries(this.data), null, 2), 'utf-8');
    fs.renameSync(tmpFile, this.file);
  }
}

function isJsonObject(value: unknown): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDocument(file: string): Map<string, JsonValue> {
  let content: string;
  try {
    content = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      return new Map();
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new StoreCorruptError(file, error instanceof Error ? error.message : String(error));
  }
  if (!isJsonObject(parsed)) {
    throw new StoreCorruptError(file, 'top-level value is not an object');
  }
  return new Map(Object.entries(parsed));
}

async function acquireLock(lockPath: string, timeoutMs: number): Promise<() => Promise<void>> {
  await fsp.mkdir(path.dirname(lockPath), { recursive: true });
  const retries = Math.max(0, Math.ceil(timeoutMs / LOCK_RETRY_INTERVAL_MS));
  try {
    return await lockfile.lock(lockPath, {
      lockfilePath: lockPath,
      realpath: false,
      retries: {
        retries,
        factor: 1,
        minTimeout: LOCK_RETRY_INTERVAL_MS,
        maxTimeout: LOCK_RETRY_INTERVAL_MS,
      },
    });
  } catch (error) {
    if (isErrnoException(error, 'ELOCKED')) {
      throw new LockTimeoutError(lockPath, timeoutMs);
    }
    throw error;
  }
}
