/**
 * Kubeconfig Manager
 *
 * Obtains the kubeconfig for a profile (local file or fetched over SSH), trims
 * it to a single context and writes a copy whose server points at the address
 * the API server is actually reachable on (e.g. a local tunnel port).
 *
 * Files live under `<stateDir>/<profile>/`:
 * - `kubeconfig.orig`  - cached copy fetched over SSH
 * - `kubeconfig.local` - trimmed, rewritten kubeconfig handed to kubectl
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import yaml from 'js-yaml';
import { expandHomePath } from '../config/config-manager.js';
import { SSH } from '../config/constants.js';
import { isErrnoException } from '../utils/errors.js';
import { type CommandExecutor, DirectExecutor } from './command-executor.js';
import type { KubeconfigSource, LocalKubeconfig, SshKubeconfig } from './types.js';

const DEFAULT_HTTPS_PORT = 443;

/**
 * Error thrown when a kubeconfig cannot be obtained, parsed or trimmed
 */
export class KubeconfigError extends Error {
  constructor(
    public readonly source: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Kubeconfig '${source}': ${reason}`, options);
    this.name = 'KubeconfigError';
  }
}

/**
 * Location of a profile's kubeconfig and the API server it targets
 */
export interface RawKubeconfig {
  path: string;
  context: string;
  apiHost: string;
  apiPort: number;
}

export interface UpdateKubeconfigOptions extends RawKubeconfig {
  profile: string;
}

export interface KubeconfigManagerOptions {
  /** Directory relative paths (kubeconfig, identity files) are resolved against */
  cwd: string;
  /** Usually `<config dir>/.kubetun/profiles` */
  stateDir: string;
  executor?: CommandExecutor;
  sshBinary?: string;
}

export class KubeconfigManager {
  readonly cwd: string;
  readonly stateDir: string;
  private readonly executor: CommandExecutor;
  private readonly sshBinary: string;

  constructor(options: KubeconfigManagerOptions) {
    this.cwd = options.cwd;
    this.stateDir = options.stateDir;
    this.executor = options.executor ?? new DirectExecutor();
    this.sshBinary = options.sshBinary ?? SSH.DEFAULT_BINARY;
  }

  /**
   * Resolve the kubeconfig for a profile and the API server it points at
   *
   * @param forceRefresh - Re-fetch an SSH kubeconfig even if a cached copy exists
   * @throws KubeconfigError
   */
  async getRawKubeconfig(
    profile: string,
    source: KubeconfigSource,
    forceRefresh = false
  ): Promise<RawKubeconfig> {
    const file = await this.resolveSource(profile, source, forceRefresh);
    const { config, context } = trimToContext(await readKubeconfig(file), source.context, file);
    const cluster = config.getCurrentCluster();
    if (!cluster) {
      throw new KubeconfigError(file, `no cluster for context '${context}'`);
    }
    const { host, port } = parseServer(cluster.server, file);
    return { path: file, context, apiHost: host, apiPort: port };
  }

  /**
   * Write `<stateDir>/<profile>/kubeconfig.local`: `path` trimmed to `context`
   * with its server replaced by `https://<apiHost>:<apiPort>`.
   *
   * @returns Path of the written file
   */
  async getUpdatedKubeconfig(options: UpdateKubeconfigOptions): Promise<string> {
    const { config } = trimToContext(await readKubeconfig(options.path), options.context, options.path);
    const rewritten = new KubeConfig();
    rewritten.loadFromOptions({
      clusters: config.getClusters().map((cluster) => ({
        ...cluster,
        server: `https://${options.apiHost}:${options.apiPort}`,
      })),
      contexts: config.getContexts(),
      users: config.getUsers(),
      currentContext: config.getCurrentContext(),
    });

    const target = path.join(this.profileDir(options.profile), 'kubeconfig.local');
    await fs.mkdir(path.dirname(target), { recursive: true });
    const document: unknown = JSON.parse(rewritten.exportConfig());
    await fs.writeFile(target, yaml.dump(document, { noRefs: true }), { encoding: 'utf-8', mode: 0o600 });
    return target;
  }

  private profileDir(profile: string): string {
    return path.join(this.stateDir, profile);
  }

  private resolveSource(profile: string, source: KubeconfigSource, forceRefresh: boolean): Promise<string> {
    switch (source.type) {
      case 'local':
        return this.resolveLocal(source);
      case 'ssh':
        return this.fetchViaSsh(profile, source, forceRefresh);
    }
  }

  private async resolveLocal(source: LocalKubeconfig): Promise<string> {
    const file = source.path
      ? path.resolve(this.cwd, expandHomePath(source.path))
      : defaultKubeconfigPath();
    if (!(await fileExists(file))) {
      throw new KubeconfigError(file, 'file does not exist');
    }
    console.info(`[profiles] Using local kubeconfig '${file}'.`);
    return file;
  }

  private async fetchViaSsh(profile: string, source: SshKubeconfig, forceRefresh: boolean): Promise<string> {
    const file = path.join(this.profileDir(profile), 'kubeconfig.orig');
    if (!forceRefresh && (await fileExists(file))) {
      console.debug(`[profiles] Reusing cached kubeconfig (${file}).`);
      return file;
    }

    console.info(`[profiles] Fetching kubeconfig via SSH (${source.user}@${source.host}:${source.path}).`);
    const command = [this.sshBinary];
    if (source.identity_file) {
      command.push('-i', path.resolve(this.cwd, expandHomePath(source.identity_file)));
    }
    command.push(`${source.user}@${source.host}`, 'cat', source.path);

    const result = await this.executor.run(command);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new KubeconfigError(`${source.user}@${source.host}:${source.path}`, `fetch failed: ${detail}`);
    }

    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, result.stdout, { encoding: 'utf-8', mode: 0o600 });
    return file;
  }
}

/**
 * First entry of $KUBECONFIG, or ~/.kube/config
 */
export function defaultKubeconfigPath(): string {
  const fromEnv = process.env.KUBECONFIG?.split(path.delimiter).find((entry) => entry.length > 0);
  return fromEnv ?? path.join(os.homedir(), '.kube', 'config');
}

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}

async function readKubeconfig(file: string): Promise<KubeConfig> {
  const content = await fs.readFile(file, 'utf-8');
  const config = new KubeConfig();
  try {
    config.loadFromString(content);
  } catch (error) {
    throw new KubeconfigError(file, error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
  return config;
}

/**
 * Reduce a kubeconfig to one context with its cluster and user. Without an
 * explicit context the current context is kept.
 *
 * @throws KubeconfigError if the context, its cluster or its user is missing
 */
export function trimToContext(
  config: KubeConfig,
  contextName: string | undefined,
  source: string
): { config: KubeConfig; context: string } {
  const name = contextName ?? config.getCurrentContext();
  if (!name) {
    throw new KubeconfigError(source, 'no context given and no current-context set');
  }

  const context = config.getContextObject(name);
  if (!context) {
    throw new KubeconfigError(source, `context '${name}' not found`);
  }
  const cluster = config.getCluster(context.cluster);
  if (!cluster) {
    throw new KubeconfigError(source, `cluster '${context.cluster}' not found`);
  }
  const user = config.getUser(context.user);
  if (!user) {
    throw new KubeconfigError(source, `user '${context.user}' not found`);
  }

  const trimmed = new KubeConfig();
  trimmed.loadFromOptions({
    clusters: [cluster],
    contexts: [context],
    users: [user],
    currentContext: name,
  });
  return { config: trimmed, context: name };
}

/**
 * Host and port of a cluster server URL (port defaults to 443)
 */
export function parseServer(server: string, source: string): { host: string; port: number } {
  let url: URL;
  try {
    url = new URL(server);
  } catch (error) {
    throw new KubeconfigError(source, `invalid server URL '${server}'`, { cause: error });
  }
  const port = url.port ? Number(url.port) : DEFAULT_HTTPS_PORT;
  return { host: url.hostname, port };
}
