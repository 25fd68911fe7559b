/**
 * Tunnels Module
 *
 * SSH tunnel data model, process management and the tunnel manager.
 */

export { canonicalJson, hashTunnelSpec } from './spec-hash.js';
export {
  buildSshArgs,
  createRandomPortAllocator,
  DEFAULT_PORT_RANGE,
  formatCommand,
  NodeProcessRunner,
  type PortAllocator,
  type ProcessRunner,
  type SpawnOptions,
  quoteShellArg,
  TunnelSpawnError,
} from './ssh-process.js';
export { TunnelManager, type TunnelManagerOptions, TunnelSession } from './tunnel-manager.js';
export {
  emptyTunnelStatus,
  encodeTunnelSpec,
  encodeTunnelStatus,
  locatorKey,
  type TunnelForwarding,
  type TunnelLocator,
  type TunnelRecord,
  tunnelRecordCodec,
  type TunnelSpec,
  type TunnelState,
  type TunnelStatus,
} from './types.js';
