/**
 * Tunnel Types
 *
 * Data model for SSH tunnels and the codec used to persist them.
 */

import { z } from 'zod';
import type { JsonValue } from '../store/kv-store.js';
import { createZodCodec } from '../store/serializing-store.js';

/**
 * Identity of one intended tunnel: the profile configuration file that defines
 * it and the profile alias inside that file
 */
export interface TunnelLocator {
  readonly config_file: string;
  readonly profile: string;
}

/**
 * A remote endpoint made reachable on a local port once the tunnel is open
 */
export interface TunnelForwarding {
  readonly host: string;
  readonly port: number;
}

/**
 * Desired tunnel configuration. Compared by content (see `hashTunnelSpec`).
 */
export interface TunnelSpec {
  readonly locator: TunnelLocator;
  /** Forwarding alias → remote endpoint. Local ports are assigned on open. */
  readonly forwardings: Readonly<Record<string, TunnelForwarding>>;
  readonly user: string;
  readonly host: string;
  readonly identity_file?: string;
}

/**
 * Tunnel state
 *
 * - open: an SSH process was alive at the last refresh
 * - broken: the recorded SSH process has died
 * - closed: no process; either never started or explicitly closed
 */
export type TunnelState = 'open' | 'broken' | 'closed';

export interface TunnelStatus {
  /** Unique per started process; empty for tunnels that never opened */
  readonly id: string;
  readonly status: TunnelState;
  readonly ssh_pid?: number;
  /** Forwarding alias → local port */
  readonly local_ports: Readonly<Record<string, number>>;
  /** Hash of the spec last applied, used to detect configuration drift */
  readonly spec_hash: string;
}

export type TunnelRecord = readonly [TunnelSpec, TunnelStatus];

/**
 * Status returned for tunnels without a stored record
 */
export function emptyTunnelStatus(): TunnelStatus {
  return { id: '', status: 'closed', local_ports: {}, spec_hash: '' };
}

/**
 * Store key for a locator
 *
 * @example
 * locatorKey({ config_file: '/work/kubetun-profiles.yaml', profile: 'prod' })
 * // => "/work/kubetun-profiles.yaml:prod"
 */
export function locatorKey(locator: TunnelLocator): string {
  return `${locator.config_file}:${locator.profile}`;
}

// ============================================================================
// Persistence
// ============================================================================

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const TunnelLocatorSchema = z.object({
  config_file: z.string(),
  profile: z.string(),
});

export const TunnelForwardingSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

export const TunnelSpecSchema = z.object({
  locator: TunnelLocatorSchema,
  forwardings: z.record(TunnelForwardingSchema),
  user: z.string(),
  host: z.string(),
  identity_file: optionalString,
});

export const TunnelStatusSchema = z.object({
  id: z.string(),
  status: z.enum(['open', 'broken', 'closed']),
  ssh_pid: z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? undefined),
  local_ports: z.record(z.number().int()),
  spec_hash: z.string(),
});

export const TunnelRecordSchema = z.tuple([TunnelSpecSchema, TunnelStatusSchema]);

/**
 * JSON form of a spec; an absent identity file is written as null
 */
export function encodeTunnelSpec(spec: TunnelSpec): JsonValue {
  return {
    locator: { config_file: spec.locator.config_file, profile: spec.locator.profile },
    forwardings: Object.fromEntries(
      Object.entries(spec.forwardings).map(
        ([alias, fwd]): [string, JsonValue] => [alias, { host: fwd.host, port: fwd.port }]
      )
    ),
    user: spec.user,
    host: spec.host,
    identity_file: spec.identity_file ?? null,
  };
}

export function encodeTunnelStatus(status: TunnelStatus): JsonValue {
  return {
    id: status.id,
    status: status.status,
    ssh_pid: status.ssh_pid ?? null,
    local_ports: { ...status.local_ports },
    spec_hash: status.spec_hash,
  };
}

/**
 * Codec for `[spec, status]` pairs in the tunnel state file
 */
export const tunnelRecordCodec = createZodCodec<TunnelRecord>(TunnelRecordSchema, ([spec, status]) => [
  encodeTunnelSpec(spec),
  encodeTunnelStatus(status),
]);
