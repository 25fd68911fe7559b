/**
 * Tunnel Manager
 *
 * Opens, reuses, refreshes and closes SSH tunnels whose state is shared by all
 * kubetun processes through `<stateDir>/state.json`.
 *
 * All work happens inside a TunnelSession, which holds the exclusive store lock
 * for its lifetime. Every refresh-then-decide sequence therefore runs atomically
 * with respect to other processes.
 *
 * @example
 * const manager = new TunnelManager();
 * const status = await manager.withSession((tunnels) => tunnels.openTunnel(spec));
 */

import path from 'node:path';
import { getTunnelStateDir } from '../config/config-manager.js';
import { generateId } from '../lib/ids.js';
import { JsonFileKvStore, KeyNotFoundError, type KvStore } from '../store/kv-store.js';
import { SerializingStore } from '../store/serializing-store.js';
import { hashTunnelSpec } from './spec-hash.js';
import {
  buildSshArgs,
  createRandomPortAllocator,
  formatCommand,
  NodeProcessRunner,
  type PortAllocator,
  type ProcessRunner,
} from './ssh-process.js';
import {
  emptyTunnelStatus,
  locatorKey,
  type TunnelLocator,
  type TunnelRecord,
  type TunnelSpec,
  type TunnelStatus,
  tunnelRecordCodec,
} from './types.js';

/**
 * Options for creating a TunnelManager
 */
export interface TunnelManagerOptions {
  /** Directory holding `state.json` and `.lock` */
  stateDir?: string;
  lockTimeoutMs?: number;
  sshBinary?: string;
  processRunner?: ProcessRunner;
  portAllocator?: PortAllocator;
  idGenerator?: () => string;
}

interface TunnelDependencies {
  /** ssh stderr goes to `<logDir>/<tunnel id>.log` */
  logDir: string;
  sshBinary: string;
  processRunner: ProcessRunner;
  portAllocator: PortAllocator;
  idGenerator: () => string;
}

export class TunnelManager {
  readonly stateDir: string;
  private readonly store: JsonFileKvStore;
  private readonly deps: TunnelDependencies;

  constructor(options: TunnelManagerOptions = {}) {
    this.stateDir = options.stateDir ?? getTunnelStateDir();
    this.store = new JsonFileKvStore({
      file: path.join(this.stateDir, 'state.json'),
      lockfile: path.join(this.stateDir, '.lock'),
      lockTimeoutMs: options.lockTimeoutMs,
    });
    this.deps = {
      logDir: path.join(this.stateDir, 'logs'),
      sshBinary: options.sshBinary ?? 'ssh',
      processRunner: options.processRunner ?? new NodeProcessRunner(),
      portAllocator: options.portAllocator ?? createRandomPortAllocator(),
      idGenerator: options.idGenerator ?? generateId,
    };
  }

  /**
   * Acquire the state lock and start a session
   *
   * @throws LockTimeoutError if another process holds the lock for too long
   */
  async begin(): Promise<TunnelSession> {
    const session = await this.store.begin();
    return new TunnelSession(session, this.deps);
  }

  /**
   * Run `fn` in a session; state is flushed and the lock released afterwards
   */
  async withSession<T>(fn: (tunnels: TunnelSession) => T | Promise<T>): Promise<T> {
    const session = await this.begin();
    try {
      return await fn(session);
    } finally {
      await session.close();
    }
  }
}

/**
 * Tunnel operations against one locked view of the state file
 */
export class TunnelSession {
  private readonly records: SerializingStore<TunnelRecord>;

  constructor(
    private readonly kv: KvStore & { close(): Promise<void> },
    private readonly deps: TunnelDependencies
  ) {
    this.records = new SerializingStore(tunnelRecordCodec, kv);
  }

  /**
   * All tunnels, each refreshed and persisted before being returned
   */
  getTunnels(): TunnelRecord[] {
    return this.records.list().map((key) => {
      const [spec, status] = this.records.get(key);
      const refreshed = this.refresh(status);
      this.records.set(key, [spec, refreshed]);
      return [spec, refreshed] as const;
    });
  }

  /**
   * Last known spec and status for a locator, refreshed and persisted
   */
  getTunnel(locator: TunnelLocator): TunnelRecord | undefined {
    const record = this.lookup(locator);
    if (!record) {
      return undefined;
    }
    const [spec, status] = record;
    const refreshed = this.refresh(status);
    this.records.set(locatorKey(locator), [spec, refreshed]);
    return [spec, refreshed];
  }

  /**
   * Ensure a tunnel matching `spec` is open
   *
   * An open tunnel with an unchanged spec is returned as-is. Otherwise any
   * previous process is terminated and a new one is started under a new ID.
   */
  openTunnel(spec: TunnelSpec): TunnelStatus {
    const key = locatorKey(spec.locator);
    const specHash = hashTunnelSpec(spec);
    const existing = this.lookup(spec.locator);
    const current = existing ? this.refresh(existing[1]) : undefined;

    if (current && current.status === 'open' && current.spec_hash === specHash) {
      console.debug(`[tunnels] Tunnel for '${key}' is already open.`);
      this.records.set(key, [spec, current]);
      return current;
    }

    if (current) {
      if (current.status === 'broken') {
        console.info(`[tunnels] Tunnel for '${key}' is broken, restarting.`);
      } else if (current.spec_hash !== specHash && current.spec_hash !== '') {
        console.info(`[tunnels] Configuration for '${key}' changed, restarting tunnel.`);
      }
      this.terminate(current);
    }

    // Checkpoint before spawning so an interrupted open still leaves a record behind
    const provisional: TunnelStatus = {
      id: this.deps.idGenerator(),
      status: 'closed',
      local_ports: {},
      spec_hash: specHash,
    };
    this.records.set(key, [spec, provisional]);

    const localPorts = this.deps.portAllocator(Object.keys(spec.forwardings));
    const args = buildSshArgs(spec, localPorts);
    const logFile = this.logFile(provisional.id);
    console.debug(
      `[tunnels] Opening SSH tunnel for '${key}': $ ${formatCommand(this.deps.sshBinary, args)} 2>>${logFile}`
    );
    const pid = this.deps.processRunner.spawn(this.deps.sshBinary, args, { logFile });

    const status: TunnelStatus = {
      ...provisional,
      status: 'open',
      ssh_pid: pid,
      local_ports: localPorts,
    };
    this.records.set(key, [spec, status]);
    return status;
  }

  /**
   * Close the tunnel for a locator. Always ends in `closed`.
   */
  closeTunnel(locator: TunnelLocator): TunnelStatus {
    const key = locatorKey(locator);
    const record = this.lookup(locator);
    if (!record) {
      console.warn(`[tunnels] No tunnel found for '${key}'.`);
      return emptyTunnelStatus();
    }

    const [spec, status] = record;
    const refreshed = this.refresh(status);
    if (refreshed.status === 'open') {
      console.debug(`[tunnels] Closing tunnel for '${key}'.`);
    } else {
      console.debug(`[tunnels] Tunnel for '${key}' is already closed.`);
    }

    const closed = this.terminate(refreshed);
    this.records.set(key, [spec, closed]);
    return closed;
  }

  /**
   * Close every stored tunnel
   */
  closeAll(): TunnelRecord[] {
    return this.records.list().map((key) => {
      const [spec] = this.records.get(key);
      return [spec, this.closeTunnel(spec.locator)] as const;
    });
  }

  /**
   * Flush state and release the lock
   */
  close(): Promise<void> {
    return this.kv.close();
  }

  private lookup(locator: TunnelLocator): TunnelRecord | undefined {
    try {
      return this.records.get(locatorKey(locator));
    } catch (error) {
      if (error instanceof KeyNotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Reclassify an open tunnel whose process has died as broken.
   * Ports stay recorded for display until the next open or close.
   */
  private refresh(status: TunnelStatus): TunnelStatus {
    if (status.status !== 'open' || status.ssh_pid === undefined) {
      return status;
    }
    if (this.deps.processRunner.isAlive(status.ssh_pid)) {
      return status;
    }
    console.warn(
      `[tunnels] SSH process ${status.ssh_pid} of tunnel ${status.id} has exited (ssh output: ${this.logFile(status.id)}).`
    );
    const { ssh_pid: _deadPid, ...rest } = status;
    return { ...rest, status: 'broken' };
  }

  private logFile(id: string): string {
    return path.join(this.deps.logDir, `${id}.log`);
  }

  private terminate(status: TunnelStatus): TunnelStatus {
    if (status.ssh_pid !== undefined && !this.deps.processRunner.terminate(status.ssh_pid)) {
      console.debug(`[tunnels] SSH process ${status.ssh_pid} had already exited.`);
    }
    const { ssh_pid: _pid, ...rest } = status;
    return { ...rest, status: 'closed', local_ports: {} };
  }
}
