import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { KubeConfig } from '@kubernetes/client-node';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CommandExecutor, CommandResult } from './command-executor.js';
import { KubeconfigError, KubeconfigManager, parseServer } from './kubeconfig-manager.js';

const KUBECONFIG_YAML = `
apiVersion: v1
kind: Config
current-context: prod
clusters:
  - name: prod-cluster
    cluster:
      server: https://10.0.0.1:6443
  - name: dev-cluster
    cluster:
      server: https://dev.example.test
contexts:
  - name: prod
    context:
      cluster: prod-cluster
      user: prod-admin
  - name: dev
    context:
      cluster: dev-cluster
      user: dev-user
  - name: dangling
    context:
      cluster: missing-cluster
      user: dev-user
users:
  - name: prod-admin
    user:
      token: test-token
  - name: dev-user
    user:
      token: dev-token
`;

/**
 * Executor stand-in that records commands and replies with canned output
 */
class FakeExecutor implements CommandExecutor {
  readonly commands: string[][] = [];

  constructor(private readonly result: CommandResult) {}

  async run(command: readonly string[]): Promise<CommandResult> {
    this.commands.push([...command]);
    return this.result;
  }
}

function loadWritten(file: string): KubeConfig {
  const config = new KubeConfig();
  config.loadFromFile(file);
  return config;
}

describe('KubeconfigManager', () => {
  let root: string;
  let stateDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'kubetun-kubeconfig-'));
    stateDir = path.join(root, '.kubetun', 'profiles');
    await fs.writeFile(path.join(root, 'kubeconfig.yaml'), KUBECONFIG_YAML);
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('getRawKubeconfig (local)', () => {
    it('should resolve a relative path against cwd and use the current context', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      const raw = await manager.getRawKubeconfig('prod', { type: 'local', path: 'kubeconfig.yaml' });

      expect(raw).toEqual({
        path: path.join(root, 'kubeconfig.yaml'),
        context: 'prod',
        apiHost: '10.0.0.1',
        apiPort: 6443,
      });
    });

    it('should honour an explicit context and default the port to 443', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      const raw = await manager.getRawKubeconfig('dev', {
        type: 'local',
        path: 'kubeconfig.yaml',
        context: 'dev',
      });

      expect(raw.context).toBe('dev');
      expect(raw.apiHost).toBe('dev.example.test');
      expect(raw.apiPort).toBe(443);
    });

    it('should fall back to $KUBECONFIG', async () => {
      vi.stubEnv('KUBECONFIG', path.join(root, 'kubeconfig.yaml'));
      const manager = new KubeconfigManager({ cwd: '/', stateDir });

      const raw = await manager.getRawKubeconfig('prod', { type: 'local' });

      expect(raw.path).toBe(path.join(root, 'kubeconfig.yaml'));
    });

    it('should throw KubeconfigError when the file is missing', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      await expect(
        manager.getRawKubeconfig('prod', { type: 'local', path: 'absent.yaml' })
      ).rejects.toThrow(`Kubeconfig '${path.join(root, 'absent.yaml')}': file does not exist`);
    });

    it('should throw KubeconfigError for an unknown context', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      await expect(
        manager.getRawKubeconfig('prod', { type: 'local', path: 'kubeconfig.yaml', context: 'qa' })
      ).rejects.toThrow("context 'qa' not found");
    });

    it('should throw KubeconfigError when the context names a missing cluster', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      await expect(
        manager.getRawKubeconfig('prod', { type: 'local', path: 'kubeconfig.yaml', context: 'dangling' })
      ).rejects.toThrow("cluster 'missing-cluster' not found");
    });
  });

  describe('getRawKubeconfig (ssh)', () => {
    const source = {
      type: 'ssh',
      user: 'admin',
      host: 'bastion',
      path: '/etc/kubernetes/admin.conf',
      identity_file: 'keys/id_test',
    } as const;

    it('should fetch over ssh and cache the result', async () => {
      const executor = new FakeExecutor({ stdout: KUBECONFIG_YAML, stderr: '', exitCode: 0 });
      const manager = new KubeconfigManager({ cwd: root, stateDir, executor });

      const raw = await manager.getRawKubeconfig('prod', source);

      const cached = path.join(stateDir, 'prod', 'kubeconfig.orig');
      expect(raw.path).toBe(cached);
      expect(raw.apiHost).toBe('10.0.0.1');
      expect(executor.commands).toEqual([
        [
          'ssh',
          '-i',
          path.join(root, 'keys', 'id_test'),
          'admin@bastion',
          'cat',
          '/etc/kubernetes/admin.conf',
        ],
      ]);
      expect(await fs.readFile(cached, 'utf-8')).toBe(KUBECONFIG_YAML);
    });

    it('should reuse the cached copy unless forced', async () => {
      const executor = new FakeExecutor({ stdout: KUBECONFIG_YAML, stderr: '', exitCode: 0 });
      const manager = new KubeconfigManager({ cwd: root, stateDir, executor, sshBinary: 'ssh2' });

      await manager.getRawKubeconfig('prod', source);
      await manager.getRawKubeconfig('prod', source);
      expect(executor.commands).toHaveLength(1);

      await manager.getRawKubeconfig('prod', source, true);
      expect(executor.commands).toHaveLength(2);
      expect(executor.commands[1][0]).toBe('ssh2');
    });

    it('should throw KubeconfigError with stderr when the fetch fails', async () => {
      const executor = new FakeExecutor({ stdout: '', stderr: 'Permission denied\n', exitCode: 255 });
      const manager = new KubeconfigManager({ cwd: root, stateDir, executor });

      await expect(manager.getRawKubeconfig('prod', source)).rejects.toThrow(
        "Kubeconfig 'admin@bastion:/etc/kubernetes/admin.conf': fetch failed: Permission denied"
      );
    });
  });

  describe('getUpdatedKubeconfig', () => {
    it('should write a trimmed kubeconfig pointing at the given endpoint', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });

      const file = await manager.getUpdatedKubeconfig({
        profile: 'prod',
        path: path.join(root, 'kubeconfig.yaml'),
        context: 'prod',
        apiHost: 'localhost',
        apiPort: 12345,
      });

      expect(file).toBe(path.join(stateDir, 'prod', 'kubeconfig.local'));
      const written = loadWritten(file);
      expect(written.getCurrentContext()).toBe('prod');
      expect(written.getContexts().map((context) => context.name)).toEqual(['prod']);
      expect(written.getClusters().map((cluster) => [cluster.name, cluster.server])).toEqual([
        ['prod-cluster', 'https://localhost:12345'],
      ]);
      expect(written.getUsers().map((user) => [user.name, user.token])).toEqual([
        ['prod-admin', 'test-token'],
      ]);
    });

    it('should leave the source kubeconfig untouched', async () => {
      const manager = new KubeconfigManager({ cwd: root, stateDir });
      const source = path.join(root, 'kubeconfig.yaml');

      await manager.getUpdatedKubeconfig({
        profile: 'dev',
        path: source,
        context: 'dev',
        apiHost: 'localhost',
        apiPort: 10000,
      });

      expect(await fs.readFile(source, 'utf-8')).toBe(KUBECONFIG_YAML);
    });
  });
});

describe('parseServer', () => {
  it('should return host and explicit port', () => {
    expect(parseServer('https://k8s.example.test:6443', 'x')).toEqual({ host: 'k8s.example.test', port: 6443 });
  });

  it('should default to 443', () => {
    expect(parseServer('https://k8s.example.test/', 'x')).toEqual({ host: 'k8s.example.test', port: 443 });
  });

  it('should reject an invalid URL', () => {
    expect(() => parseServer('not a url', 'x')).toThrow(KubeconfigError);
  });
});
