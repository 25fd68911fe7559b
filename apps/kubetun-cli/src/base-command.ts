/**
 * Base Command - Shared logic for all kubetun CLI commands
 *
 * Applies the global `--log-level` flag, builds managers from the user config,
 * and turns failures into a red one-line message with exit code 1.
 */

import {
  createRandomPortAllocator,
  formatError,
  type KubetunConfig,
  LOG_LEVELS,
  loadConfig,
  patchConsole,
  ProfileManager,
  resolveActivationSettings,
  resolveTunnelSettings,
  setLogLevel,
  TunnelManager,
} from '@kubetun/core';
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';

export abstract class BaseCommand extends Command {
  static baseFlags = {
    'log-level': Flags.option({
      description: 'Log level (default: $LOG_LEVEL or info)',
      options: LOG_LEVELS,
      helpGroup: 'GLOBAL',
    })(),
  };

  private userConfig: KubetunConfig | undefined;

  async init(): Promise<void> {
    await super.init();
    patchConsole();
    const { flags } = await this.parse({ flags: BaseCommand.baseFlags, strict: false });
    if (flags['log-level']) {
      setLogLevel(flags['log-level']);
    }
  }

  protected async catch(error: Error & { exitCode?: number }): Promise<unknown> {
    // oclif's own errors (exit, parse errors) keep their handling
    if ('oclif' in error) {
      return super.catch(error);
    }
    this.logToStderr(chalk.red(`✗ ${formatError(error)}`));
    this.exit(1);
  }

  /**
   * User configuration (~/.kubetun/config.yaml), loaded once per command
   */
  protected async loadUserConfig(): Promise<KubetunConfig> {
    this.userConfig ??= await loadConfig();
    return this.userConfig;
  }

  protected async createTunnelManager(): Promise<TunnelManager> {
    const settings = resolveTunnelSettings(await this.loadUserConfig());
    return new TunnelManager({
      stateDir: settings.stateDir,
      lockTimeoutMs: settings.lockTimeoutMs,
      sshBinary: settings.sshBinary,
      portAllocator: createRandomPortAllocator(settings.portRange),
    });
  }

  /**
   * Find the profiles file from the working directory and build a ProfileManager
   *
   * @throws ProfileConfigNotFoundError, ProfileConfigError
   */
  protected async loadProfileManager(): Promise<ProfileManager> {
    const config = await this.loadUserConfig();
    return ProfileManager.load({
      tunnels: await this.createTunnelManager(),
      sshBinary: resolveTunnelSettings(config).sshBinary,
      activation: resolveActivationSettings(config),
    });
  }
}
