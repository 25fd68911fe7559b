/**
 * Persistent store module
 */

export {
  DEFAULT_LOCK_TIMEOUT_MS,
  JsonFileKvSession,
  JsonFileKvStore,
  type JsonFileKvStoreOptions,
  type JsonValue,
  KeyNotFoundError,
  type KvStore,
  LockTimeoutError,
  StoreCorruptError,
  StoreSessionClosedError,
} from './kv-store.js';
export { type Codec, createZodCodec, SerializationError, SerializingStore } from './serializing-store.js';
