/**
 * Content hash of a tunnel spec
 *
 * Object keys are sorted before hashing, so the order in which forwardings or
 * fields were declared never changes the digest.
 */

import { createHash } from 'node:crypto';
import type { JsonValue } from '../store/kv-store.js';
import { encodeTunnelSpec, type TunnelSpec } from './types.js';

/**
 * Serialize a JSON value with object keys sorted at every level
 */
export function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

/**
 * sha256 hex digest of the spec's content
 */
export function hashTunnelSpec(spec: TunnelSpec): string {
  return createHash('sha256').update(canonicalJson(encodeTunnelSpec(spec))).digest('hex');
}
