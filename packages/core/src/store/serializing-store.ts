/**
 * Serializing Store
 *
 * Typed layer over a KvStore. Values are encoded to JSON on write and decoded
 * (and validated) on read; the underlying store contracts are unchanged.
 */

import type { z } from 'zod';
import { formatError } from '../utils/errors.js';
import type { JsonValue, KvStore } from './kv-store.js';

/**
 * Translates between a domain value and its JSON representation
 */
export interface Codec<T> {
  decode(value: JsonValue): T;
  encode(value: T): JsonValue;
}

/**
 * Error thrown when a stored value cannot be decoded
 */
export class SerializationError extends Error {
  constructor(
    public readonly key: string,
    public readonly source: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to decode '${key}' from ${source}: ${reason}`, options);
    this.name = 'SerializationError';
  }
}

/**
 * Build a codec that validates with a zod schema on decode
 *
 * @param schema - Schema describing the stored JSON
 * @param encode - Converts the domain value back to JSON
 */
export function createZodCodec<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  encode: (value: T) => JsonValue
): Codec<T> {
  return {
    decode: (value) => schema.parse(value),
    encode,
  };
}

export class SerializingStore<T> {
  constructor(
    private readonly codec: Codec<T>,
    private readonly store: KvStore
  ) {}

  /**
   * @throws KeyNotFoundError if the key is absent
   * @throws SerializationError if the stored value does not decode
   */
  get(key: string): T {
    const raw = this.store.get(key);
    try {
      return this.codec.decode(raw);
    } catch (error) {
      throw new SerializationError(key, String(this.store), formatError(error), { cause: error });
    }
  }

  set(key: string, value: T): void {
    this.store.set(key, this.codec.encode(value));
  }

  delete(key: string): void {
    this.store.delete(key);
  }

  list(): string[] {
    return this.store.list();
  }
}
