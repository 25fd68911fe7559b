/**
 * Tests for kubetun Config Manager
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  expandHomePath,
  getConfigPath,
  getConfigValue,
  getDefaultConfig,
  getKubetunHome,
  getTunnelStateDir,
  loadConfig,
  mergeWithDefaults,
  parseConfig,
  resolveActivationSettings,
  resolveTunnelSettings,
  saveConfig,
  setConfigValue,
  unsetConfigValue,
} from './config-manager.js';
import type { KubetunConfig } from './types.js';

/**
 * Helper: Create test config data
 */
function createConfigData(overrides?: Partial<KubetunConfig>): KubetunConfig {
  return {
    tunnels: {
      state_dir: '/var/lib/kubetun',
      lock_timeout_ms: 1500,
      port_range: { min: 30000, max: 30100 },
    },
    activation: {
      restart_grace_ms: 10000,
      reuse_grace_ms: 500,
      max_attempts: 4,
    },
    ssh: {
      binary: '/usr/local/bin/ssh',
    },
    ...overrides,
  };
}

let tempDir: string;
let originalKubetunHome: string | undefined;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kubetun-config-'));
  vi.spyOn(os, 'homedir').mockReturnValue(tempDir);
  originalKubetunHome = process.env.KUBETUN_HOME;
  delete process.env.KUBETUN_HOME;
});

afterEach(async () => {
  if (originalKubetunHome === undefined) {
    delete process.env.KUBETUN_HOME;
  } else {
    process.env.KUBETUN_HOME = originalKubetunHome;
  }
  await fs.rm(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

async function writeConfigFile(content: string): Promise<void> {
  await fs.mkdir(path.join(tempDir, '.kubetun'), { recursive: true });
  await fs.writeFile(path.join(tempDir, '.kubetun', 'config.yaml'), content, 'utf-8');
}

describe('paths', () => {
  it('should default to ~/.kubetun', () => {
    expect(getKubetunHome()).toBe(path.join(tempDir, '.kubetun'));
    expect(getConfigPath()).toBe(path.join(tempDir, '.kubetun', 'config.yaml'));
    expect(getTunnelStateDir()).toBe(path.join(tempDir, '.kubetun', 'tunnels'));
  });

  it('should honour KUBETUN_HOME', () => {
    process.env.KUBETUN_HOME = '/opt/kubetun';
    expect(getKubetunHome()).toBe('/opt/kubetun');
    expect(getTunnelStateDir()).toBe('/opt/kubetun/tunnels');
  });

  it('should expand ~ in KUBETUN_HOME', () => {
    process.env.KUBETUN_HOME = '~/state';
    expect(getKubetunHome()).toBe(path.join(tempDir, 'state'));
  });

  it('should ignore a blank KUBETUN_HOME', () => {
    process.env.KUBETUN_HOME = '   ';
    expect(getKubetunHome()).toBe(path.join(tempDir, '.kubetun'));
  });
});

describe('expandHomePath', () => {
  it.each([
    ['~', () => tempDir],
    ['~/keys/id', () => path.join(tempDir, 'keys', 'id')],
    ['/abs/path', () => '/abs/path'],
    ['relative/~/path', () => 'relative/~/path'],
    ['', () => ''],
  ])('should expand %j', (input, expected) => {
    expect(expandHomePath(input)).toBe(expected());
  });
});

describe('getDefaultConfig', () => {
  it('should return complete default config structure', () => {
    expect(getDefaultConfig()).toEqual({
      tunnels: { lock_timeout_ms: 5000, port_range: { min: 10000, max: 20000 } },
      activation: { restart_grace_ms: 30000, reuse_grace_ms: 2000, max_attempts: 10 },
      ssh: { binary: 'ssh' },
    });
  });
});

describe('parseConfig', () => {
  it('should accept a full config', () => {
    const config = createConfigData();
    expect(parseConfig(config, 'test.yaml')).toEqual(config);
  });

  it('should treat null as an empty config', () => {
    expect(parseConfig(null, 'test.yaml')).toEqual({});
  });

  it('should reject unknown keys', () => {
    expect(() => parseConfig({ tunnels: { colour: 'blue' } }, 'test.yaml')).toThrow(
      'Invalid config in test.yaml'
    );
  });

  it('should name the offending key', () => {
    expect(() => parseConfig({ activation: { max_attempts: 0 } }, 'test.yaml')).toThrow(
      "Invalid config in test.yaml at 'activation.max_attempts'"
    );
  });
});

describe('loadConfig', () => {
  it('should load existing config file', async () => {
    const configData = createConfigData();
    await writeConfigFile(yaml.dump(configData));

    expect(await loadConfig()).toEqual(configData);
  });

  it('should return default config when file does not exist', async () => {
    expect(await loadConfig()).toEqual(getDefaultConfig());
  });

  it('should return empty config for empty YAML file', async () => {
    await writeConfigFile('');
    expect(await loadConfig()).toEqual({});
  });

  it('should throw error for invalid YAML', async () => {
    await writeConfigFile('invalid: yaml: [content');
    await expect(loadConfig()).rejects.toThrow('Failed to load config');
  });

  it('should handle partial config with missing sections', async () => {
    await writeConfigFile(yaml.dump({ ssh: { binary: 'ssh2' } }));

    const loaded = await loadConfig();
    expect(loaded.ssh?.binary).toBe('ssh2');
    expect(loaded.tunnels).toBeUndefined();
    expect(loaded.activation).toBeUndefined();
  });
});

describe('saveConfig', () => {
  it('should create ~/.kubetun and write YAML', async () => {
    const config = createConfigData();
    await saveConfig(config);

    const content = await fs.readFile(path.join(tempDir, '.kubetun', 'config.yaml'), 'utf-8');
    expect(yaml.load(content)).toEqual(config);
  });

  it('should round trip through loadConfig', async () => {
    const config: KubetunConfig = { activation: { reuse_grace_ms: 750 } };
    await saveConfig(config);
    expect(await loadConfig()).toEqual(config);
  });
});

describe('mergeWithDefaults', () => {
  it('should overlay user values onto defaults', () => {
    const merged = mergeWithDefaults({ tunnels: { port_range: { max: 15000 } } });
    expect(merged.tunnels).toEqual({
      lock_timeout_ms: 5000,
      port_range: { min: 10000, max: 15000 },
    });
    expect(merged.ssh).toEqual({ binary: 'ssh' });
  });
});

describe('getConfigValue', () => {
  it('should return effective defaults', async () => {
    expect(await getConfigValue('activation.restart_grace_ms')).toBe(30000);
    expect(await getConfigValue('tunnels.port_range.min')).toBe(10000);
  });

  it('should return a whole section', async () => {
    expect(await getConfigValue('ssh')).toEqual({ binary: 'ssh' });
  });

  it('should return undefined for unknown keys', async () => {
    expect(await getConfigValue('tunnels.nope')).toBeUndefined();
    expect(await getConfigValue('nope.deeper.still')).toBeUndefined();
  });
});

describe('setConfigValue', () => {
  it('should set a nested value', async () => {
    await setConfigValue('ssh.binary', '/opt/ssh');
    expect(await getConfigValue('ssh.binary')).toBe('/opt/ssh');
  });

  it('should create intermediate sections', async () => {
    await writeConfigFile('{}');
    await setConfigValue('tunnels.port_range.max', 12000);

    expect(await loadConfig()).toEqual({ tunnels: { port_range: { max: 12000 } } });
  });

  it('should reject top-level keys', async () => {
    await expect(setConfigValue('tunnels', 'x')).rejects.toThrow('Top-level config keys not supported');
  });

  it('should validate before writing', async () => {
    await writeConfigFile('{}');
    await expect(setConfigValue('activation.max_attempts', 'many')).rejects.toThrow(
      "at 'activation.max_attempts'"
    );
    expect(await loadConfig()).toEqual({});
  });
});

describe('unsetConfigValue', () => {
  it('should remove a value so the default applies again', async () => {
    await writeConfigFile(yaml.dump({ ssh: { binary: '/opt/ssh' } }));

    await unsetConfigValue('ssh.binary');

    expect(await loadConfig()).toEqual({ ssh: {} });
    expect(await getConfigValue('ssh.binary')).toBe('ssh');
  });

  it('should ignore keys under missing sections', async () => {
    await writeConfigFile('{}');
    await unsetConfigValue('activation.reuse_grace_ms');
    expect(await loadConfig()).toEqual({});
  });
});

describe('resolved settings', () => {
  it('should resolve tunnel settings with expanded state_dir', () => {
    const settings = resolveTunnelSettings({
      tunnels: { state_dir: '~/tun', port_range: { min: 11000 } },
    });
    expect(settings).toEqual({
      stateDir: path.join(tempDir, 'tun'),
      lockTimeoutMs: 5000,
      portRange: { min: 11000, max: 20000 },
      sshBinary: 'ssh',
    });
  });

  it('should fall back to the default state directory', () => {
    expect(resolveTunnelSettings({}).stateDir).toBe(path.join(tempDir, '.kubetun', 'tunnels'));
  });

  it('should resolve activation settings', () => {
    expect(resolveActivationSettings({ activation: { max_attempts: 3 } })).toEqual({
      restartGraceMs: 30000,
      reuseGraceMs: 2000,
      maxAttempts: 3,
    });
  });
});
