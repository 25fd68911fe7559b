/**
 * SSH Process Management
 *
 * Spawns tunnel processes and probes/terminates them by PID. Tunnel processes
 * are detached into their own process group and unref'd: they outlive the CLI
 * invocation that started them and are owned by their persisted record.
 */

import { spawn } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import { TUNNELS } from '../config/constants.js';
import { isErrnoException } from '../utils/errors.js';
import type { TunnelSpec } from './types.js';

/** Local ports are drawn from this range (inclusive) */
export const DEFAULT_PORT_RANGE = { min: TUNNELS.PORT_RANGE_MIN, max: TUNNELS.PORT_RANGE_MAX } as const;

/**
 * Error thrown when the SSH process could not be started at all
 */
export class TunnelSpawnError extends Error {
  constructor(
    public readonly command: string,
    reason: string
  ) {
    super(`Failed to start '${command}': ${reason}`);
    this.name = 'TunnelSpawnError';
  }
}

export interface SpawnOptions {
  /** Append the process's stderr to this file (created with its directory) */
  logFile?: string;
}

/**
 * OS process operations used by the tunnel manager
 *
 * Implementations determine HOW processes are started and signalled.
 */
export interface ProcessRunner {
  /**
   * Start a detached background process without waiting for it
   *
   * @returns PID of the started process
   * @throws TunnelSpawnError if no process was created
   */
  spawn(command: string, args: string[], options?: SpawnOptions): number;

  /**
   * Zero-signal probe; true if a process with this PID exists
   */
  isAlive(pid: number): boolean;

  /**
   * Send SIGTERM
   *
   * @returns false if the process no longer existed
   */
  terminate(pid: number): boolean;
}

/**
 * ProcessRunner backed by `node:child_process` and `process.kill`
 */
export class NodeProcessRunner implements ProcessRunner {
  spawn(command: string, args: string[], options: SpawnOptions = {}): number {
    let logFd: number | undefined;
    if (options.logFile !== undefined) {
      fs.mkdirSync(path.dirname(options.logFile), { recursive: true });
      logFd = fs.openSync(options.logFile, 'a');
    }

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(command, args, {
        detached: true,
        stdio: ['ignore', 'ignore', logFd ?? 'ignore'],
      });
    } finally {
      // The child holds its own copy of the descriptor
      if (logFd !== undefined) {
        fs.closeSync(logFd);
      }
    }

    // Launch failures after this point only show up as a dead PID on the next refresh
    child.on('error', (error) => {
      console.warn(`[tunnels] ${command} exited with error: ${error.message}`);
    });

    if (child.pid === undefined) {
      throw new TunnelSpawnError(command, 'no process ID was assigned');
    }

    child.unref();
    return child.pid;
  }

  isAlive(pid: number): boolean {
    try {
      // Signal 0 checks if the process exists without affecting it
      process.kill(pid, 0);
      return true;
    } catch (error) {
      if (isErrnoException(error, 'ESRCH')) {
        return false;
      }
      // EPERM: exists, owned by someone else
      if (isErrnoException(error, 'EPERM')) {
        return true;
      }
      throw error;
    }
  }

  terminate(pid: number): boolean {
    try {
      process.kill(pid, 'SIGTERM');
      return true;
    } catch (error) {
      if (isErrnoException(error, 'ESRCH')) {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Picks local ports for a tunnel's forwarding aliases
 */
export type PortAllocator = (aliases: readonly string[]) => Record<string, number>;

/**
 * Random draw from a port range, distinct within one tunnel
 *
 * Ports are not probed before use; a collision with a port bound by another
 * program surfaces as a broken tunnel on the next refresh.
 */
export function createRandomPortAllocator(
  range: { min: number; max: number } = DEFAULT_PORT_RANGE,
  random: () => number = Math.random
): PortAllocator {
  const size = range.max - range.min + 1;
  return (aliases) => {
    if (aliases.length > size) {
      throw new RangeError(`Cannot allocate ${aliases.length} ports from range ${range.min}-${range.max}`);
    }
    const used = new Set<number>();
    const ports: Record<string, number> = {};
    for (const alias of aliases) {
      let port = range.min + Math.floor(random() * size);
      while (used.has(port)) {
        port = port === range.max ? range.min : port + 1;
      }
      used.add(port);
      ports[alias] = port;
    }
    return ports;
  };
}

/**
 * Build the argument list for one multiplexed tunnel process
 *
 * @example
 * buildSshArgs(spec, { kubernetes: 14321 })
 * // => ['-N', '-L', '14321:10.0.0.1:6443', 'admin@bastion']
 */
export function buildSshArgs(spec: TunnelSpec, localPorts: Readonly<Record<string, number>>): string[] {
  const forwardings = Object.entries(spec.forwardings).map(([alias, fwd]) => {
    const localPort = localPorts[alias];
    if (localPort === undefined) {
      throw new Error(`No local port allocated for forwarding '${alias}'`);
    }
    return `${localPort}:${fwd.host}:${fwd.port}`;
  });

  const args = ['-N', '-L', forwardings.join(',')];
  if (spec.identity_file !== undefined) {
    args.push('-i', spec.identity_file);
  }
  args.push(`${spec.user}@${spec.host}`);
  return args;
}

/**
 * Quote an argument for a POSIX shell when it contains anything unsafe
 */
export function quoteShellArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command line for logs, quoting arguments that need it
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].map(quoteShellArg).join(' ');
}
