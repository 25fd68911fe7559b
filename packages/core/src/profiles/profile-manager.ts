/**
 * Profile Manager
 *
 * Combines the TunnelManager and KubeconfigManager: activating a profile makes
 * sure its kubeconfig is available, its tunnel (if any) is open, and the API
 * server answers through it.
 */

import path from 'node:path';
import { expandHomePath } from '../config/config-manager.js';
import { ACTIVATION, PROFILES } from '../config/constants.js';
import type { ResolvedActivationSettings } from '../config/types.js';
import { TunnelManager } from '../tunnels/tunnel-manager.js';
import type { TunnelLocator, TunnelSpec, TunnelStatus } from '../tunnels/types.js';
import { type ApiServerProbe, waitForApiServer } from './api-server.js';
import type { CommandExecutor } from './command-executor.js';
import { KubeconfigManager, type RawKubeconfig } from './kubeconfig-manager.js';
import { findProfileConfigFile, getProfile, loadProfileConfig } from './profile-config.js';
import type { Profile, ProfileConfig, SshTunnelConfig } from './types.js';

/** Alias of the API server forwarding in every profile tunnel */
export const KUBERNETES_FORWARDING = 'kubernetes';

/**
 * Error thrown when a tunnel is requested for a profile that declares none
 */
export class MissingTunnelConfigError extends Error {
  constructor(
    public readonly profile: string,
    public readonly file: string
  ) {
    super(`Profile '${profile}' in ${file} has no tunnel configuration`);
    this.name = 'MissingTunnelConfigError';
  }
}

/**
 * Result of activating a profile
 */
export interface ActivatedProfile {
  /** Path of the kubeconfig to hand to kubectl */
  kubeconfig: string;
  /** Present when the profile uses a tunnel */
  tunnel?: TunnelStatus;
}

export interface ActivateProfileOptions {
  /** Re-fetch a kubeconfig obtained over SSH */
  forceRefresh?: boolean;
}

export interface ProfileManagerOptions {
  activation?: Partial<ResolvedActivationSettings>;
  probe?: ApiServerProbe;
  sleep?: (ms: number) => Promise<void>;
}

export interface LoadProfileManagerOptions extends ProfileManagerOptions {
  /** Directory the profiles file search starts in (default: process.cwd()) */
  cwd?: string;
  /** Use this profiles file instead of searching */
  configFile?: string;
  tunnels?: TunnelManager;
  executor?: CommandExecutor;
  sshBinary?: string;
}

/**
 * Per-project state directory: `<config dir>/.kubetun/profiles`
 */
export function getProfileStateDir(configFile: string): string {
  return path.join(path.dirname(configFile), PROFILES.STATE_DIRNAME, 'profiles');
}

/**
 * Name of the profile to use when none is given ($KUBETUN_PROFILE or `default`)
 */
export function getDefaultProfileName(): string {
  const fromEnv = process.env[PROFILES.ENV_VAR]?.trim();
  return fromEnv || PROFILES.DEFAULT_PROFILE;
}

export class ProfileManager {
  private readonly activation: ResolvedActivationSettings;

  constructor(
    readonly config: ProfileConfig,
    readonly tunnels: TunnelManager,
    readonly kubeconfig: KubeconfigManager,
    private readonly options: ProfileManagerOptions = {}
  ) {
    this.activation = {
      restartGraceMs: options.activation?.restartGraceMs ?? ACTIVATION.RESTART_GRACE_MS,
      reuseGraceMs: options.activation?.reuseGraceMs ?? ACTIVATION.REUSE_GRACE_MS,
      maxAttempts: options.activation?.maxAttempts ?? ACTIVATION.MAX_ATTEMPTS,
    };
  }

  /**
   * Find and load the profiles file, and wire up the managers around it
   *
   * @throws ProfileConfigNotFoundError, ProfileConfigError
   */
  static async load(options: LoadProfileManagerOptions = {}): Promise<ProfileManager> {
    const file = options.configFile
      ? path.resolve(options.configFile)
      : await findProfileConfigFile(options.cwd);
    const config = await loadProfileConfig(file);
    const kubeconfig = new KubeconfigManager({
      cwd: path.dirname(config.file),
      stateDir: getProfileStateDir(config.file),
      executor: options.executor,
      sshBinary: options.sshBinary,
    });
    const tunnels = options.tunnels ?? new TunnelManager({ sshBinary: options.sshBinary });
    return new ProfileManager(config, tunnels, kubeconfig, options);
  }

  /**
   * @throws ProfileNotFoundError
   */
  getProfile(name: string): Profile {
    return getProfile(this.config, name);
  }

  /**
   * Profiles that declare a tunnel, with their tunnel config, in file order
   */
  getTunnelProfiles(): Array<readonly [string, SshTunnelConfig]> {
    const result: Array<readonly [string, SshTunnelConfig]> = [];
    for (const [name, profile] of Object.entries(this.config.profiles)) {
      if (profile.tunnel) {
        result.push([name, profile.tunnel]);
      }
    }
    return result;
  }

  getLocator(name: string): TunnelLocator {
    return { config_file: this.config.file, profile: name };
  }

  /**
   * Build the tunnel spec for a profile. Reads the profile's kubeconfig to find
   * the API server the tunnel forwards to.
   *
   * @throws ProfileNotFoundError, MissingTunnelConfigError, KubeconfigError
   */
  async getTunnelSpec(name: string): Promise<TunnelSpec> {
    const profile = this.getProfile(name);
    if (!profile.tunnel) {
      throw new MissingTunnelConfigError(name, this.config.file);
    }
    const raw = await this.kubeconfig.getRawKubeconfig(name, profile.kubeconfig);
    return this.buildTunnelSpec(name, profile.tunnel, raw);
  }

  /**
   * Ensure the kubeconfig and tunnel (if any) for a profile are available and
   * the API server answers.
   *
   * @throws ProfileNotFoundError, KubeconfigError, ApiServerUnreachableError, LockTimeoutError
   */
  async activateProfile(name: string, options: ActivateProfileOptions = {}): Promise<ActivatedProfile> {
    const profile = this.getProfile(name);
    const raw = await this.kubeconfig.getRawKubeconfig(name, profile.kubeconfig, options.forceRefresh);

    let apiHost = raw.apiHost;
    let apiPort = raw.apiPort;
    let graceMs = this.activation.reuseGraceMs;
    let route = '';
    let tunnel: TunnelStatus | undefined;

    if (profile.tunnel) {
      const spec = this.buildTunnelSpec(name, profile.tunnel, raw);
      const { status, restarted } = await this.tunnels.withSession((session) => {
        const previous = session.getTunnel(spec.locator);
        const opened = session.openTunnel(spec);
        return {
          status: opened,
          restarted: previous === undefined || previous[1].id !== opened.id,
        };
      });

      tunnel = status;
      route = ` → ${profile.tunnel.user}@${profile.tunnel.host} → ${raw.apiHost}:${raw.apiPort}`;
      apiHost = 'localhost';
      apiPort = status.local_ports[KUBERNETES_FORWARDING];
      // A just-started tunnel may need a while to connect
      if (restarted) {
        graceMs = this.activation.restartGraceMs;
      }
    }

    const url = `https://${apiHost}:${apiPort}`;
    console.info(`[profiles] Checking for API server connectivity (${url}${route})`);
    await waitForApiServer(url, {
      timeoutMs: graceMs,
      maxAttempts: this.activation.maxAttempts,
      probe: this.options.probe,
      sleep: this.options.sleep,
    });

    const kubeconfig = await this.kubeconfig.getUpdatedKubeconfig({
      profile: name,
      path: raw.path,
      context: raw.context,
      apiHost,
      apiPort,
    });
    return tunnel ? { kubeconfig, tunnel } : { kubeconfig };
  }

  private buildTunnelSpec(name: string, tunnel: SshTunnelConfig, raw: RawKubeconfig): TunnelSpec {
    const spec: TunnelSpec = {
      locator: this.getLocator(name),
      forwardings: {
        [KUBERNETES_FORWARDING]: { host: raw.apiHost, port: raw.apiPort },
      },
      user: tunnel.user,
      host: tunnel.host,
    };
    return tunnel.identity_file
      ? { ...spec, identity_file: path.resolve(path.dirname(this.config.file), expandHomePath(tunnel.identity_file)) }
      : spec;
  }
}
