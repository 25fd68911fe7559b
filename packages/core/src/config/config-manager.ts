/**
 * kubetun Config Manager
 *
 * Handles loading and saving the YAML configuration file.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { isErrnoException } from '../utils/errors.js';
import { ACTIVATION, SSH, TUNNELS } from './constants.js';
import {
  type ConfigScalar,
  type KubetunConfig,
  KubetunConfigSchema,
  type ResolvedActivationSettings,
  type ResolvedTunnelSettings,
} from './types.js';

/**
 * Get kubetun home directory (~/.kubetun, or $KUBETUN_HOME)
 */
export function getKubetunHome(): string {
  const override = process.env.KUBETUN_HOME;
  if (override && override.trim().length > 0) {
    return expandHomePath(override.trim());
  }
  return path.join(os.homedir(), '.kubetun');
}

/**
 * Get config file path (~/.kubetun/config.yaml)
 */
export function getConfigPath(): string {
  return path.join(getKubetunHome(), 'config.yaml');
}

/**
 * Get the default tunnel state directory (~/.kubetun/tunnels)
 */
export function getTunnelStateDir(): string {
  return path.join(getKubetunHome(), 'tunnels');
}

/**
 * Expand a path that may start with ~/
 */
export function expandHomePath(input: string): string {
  if (!input) {
    return input;
  }
  if (input === '~') {
    return os.homedir();
  }
  if (input.startsWith('~/')) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

/**
 * Get default config
 */
export function getDefaultConfig(): KubetunConfig {
  return {
    tunnels: {
      lock_timeout_ms: TUNNELS.LOCK_TIMEOUT_MS,
      port_range: {
        min: TUNNELS.PORT_RANGE_MIN,
        max: TUNNELS.PORT_RANGE_MAX,
      },
    },
    activation: {
      restart_grace_ms: ACTIVATION.RESTART_GRACE_MS,
      reuse_grace_ms: ACTIVATION.REUSE_GRACE_MS,
      max_attempts: ACTIVATION.MAX_ATTEMPTS,
    },
    ssh: {
      binary: SSH.DEFAULT_BINARY,
    },
  };
}

/**
 * Validate raw config data
 *
 * @throws Error naming the first invalid key
 */
export function parseConfig(data: unknown, source: string = getConfigPath()): KubetunConfig {
  const result = KubetunConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new Error(`Invalid config in ${source}${where}: ${issue?.message ?? result.error.message}`);
  }
  return result.data;
}

/**
 * Load config from ~/.kubetun/config.yaml
 *
 * Returns default config if file doesn't exist.
 */
export async function loadConfig(): Promise<KubetunConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      return getDefaultConfig();
    }
    throw error;
  }

  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new Error(
      `Failed to load config: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseConfig(data, configPath);
}

/**
 * Save config to ~/.kubetun/config.yaml
 */
export async function saveConfig(config: KubetunConfig): Promise<void> {
  await fs.mkdir(getKubetunHome(), { recursive: true });

  const content = yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
  });

  await fs.writeFile(getConfigPath(), content, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge user config over defaults, section by section
 */
export function mergeWithDefaults(config: KubetunConfig): KubetunConfig {
  const defaults = getDefaultConfig();
  return {
    tunnels: {
      ...defaults.tunnels,
      ...config.tunnels,
      port_range: { ...defaults.tunnels?.port_range, ...config.tunnels?.port_range },
    },
    activation: { ...defaults.activation, ...config.activation },
    ssh: { ...defaults.ssh, ...config.ssh },
  };
}

/**
 * Get a nested config value using dot notation
 *
 * Merges with default config to return effective values.
 *
 * @param key - Config key (e.g., "tunnels.lock_timeout_ms")
 * @returns Value or undefined if not set
 */
export async function getConfigValue(key: string): Promise<unknown> {
  const merged = mergeWithDefaults(await loadConfig());

  let value: unknown = merged;
  for (const part of key.split('.')) {
    if (isRecord(value) && part in value) {
      value = value[part];
    } else {
      return undefined;
    }
  }
  return value;
}

/**
 * Set a nested config value using dot notation
 *
 * The resulting config is validated before it is written.
 *
 * @param key - Config key (e.g., "activation.restart_grace_ms")
 * @param value - Value to set
 */
export async function setConfigValue(key: string, value: ConfigScalar): Promise<void> {
  const parts = key.split('.');
  if (parts.length < 2) {
    throw new Error(
      `Top-level config keys not supported. Use format: section.key (e.g., tunnels.${parts[0]})`
    );
  }

  const root: Record<string, unknown> = { ...(await loadConfig()) };
  let cursor = root;
  for (const part of parts.slice(0, -1)) {
    const next = cursor[part];
    const child: Record<string, unknown> = isRecord(next) ? { ...next } : {};
    cursor[part] = child;
    cursor = child;
  }
  cursor[parts[parts.length - 1]] = value;

  await saveConfig(parseConfig(root));
}

/**
 * Unset a nested config value using dot notation
 *
 * @param key - Config key to clear
 */
export async function unsetConfigValue(key: string): Promise<void> {
  const parts = key.split('.');
  if (parts.length < 2) {
    throw new Error('Top-level config keys not supported. Use format: section.key');
  }

  const root: Record<string, unknown> = { ...(await loadConfig()) };
  let cursor: Record<string, unknown> | undefined = root;
  for (const part of parts.slice(0, -1)) {
    const next: unknown = cursor[part];
    if (!isRecord(next)) {
      cursor = undefined;
      break;
    }
    const child = { ...next };
    cursor[part] = child;
    cursor = child;
  }
  if (cursor) {
    delete cursor[parts[parts.length - 1]];
  }

  await saveConfig(parseConfig(root));
}

/**
 * Effective tunnel settings (config over defaults, paths expanded)
 */
export function resolveTunnelSettings(config: KubetunConfig): ResolvedTunnelSettings {
  const merged = mergeWithDefaults(config);
  const stateDir = merged.tunnels?.state_dir;
  return {
    stateDir: stateDir ? expandHomePath(stateDir) : getTunnelStateDir(),
    lockTimeoutMs: merged.tunnels?.lock_timeout_ms ?? TUNNELS.LOCK_TIMEOUT_MS,
    portRange: {
      min: merged.tunnels?.port_range?.min ?? TUNNELS.PORT_RANGE_MIN,
      max: merged.tunnels?.port_range?.max ?? TUNNELS.PORT_RANGE_MAX,
    },
    sshBinary: merged.ssh?.binary ?? SSH.DEFAULT_BINARY,
  };
}

/**
 * Effective activation settings (config over defaults)
 */
export function resolveActivationSettings(config: KubetunConfig): ResolvedActivationSettings {
  const merged = mergeWithDefaults(config);
  return {
    restartGraceMs: merged.activation?.restart_grace_ms ?? ACTIVATION.RESTART_GRACE_MS,
    reuseGraceMs: merged.activation?.reuse_grace_ms ?? ACTIVATION.REUSE_GRACE_MS,
    maxAttempts: merged.activation?.max_attempts ?? ACTIVATION.MAX_ATTEMPTS,
  };
}
