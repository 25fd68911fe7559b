/**
 * `kubetun tun close [profile]` - Close the tunnel of a profile, or all tunnels
 */

import { getDefaultProfileName } from '@kubetun/core';
import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';

export default class TunClose extends BaseCommand {
  static description = 'Close the SSH tunnel of a profile, or every tunnel with --all';

  static examples = [
    '<%= config.bin %> <%= command.id %> prod',
    '<%= config.bin %> <%= command.id %> --all',
  ];

  static args = {
    profile: Args.string({
      description: 'Profile name (default: $KUBETUN_PROFILE or "default")',
    }),
  };

  static flags = {
    all: Flags.boolean({
      char: 'a',
      description: 'Close every tunnel known to kubetun',
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(TunClose);

    if (flags.all) {
      const tunnels = await this.createTunnelManager();
      const closed = await tunnels.withSession((session) => session.closeAll());
      this.log(`${chalk.green('✓')} Closed ${closed.length} tunnel${closed.length === 1 ? '' : 's'}`);
      return;
    }

    const name = args.profile ?? getDefaultProfileName();
    const profiles = await this.loadProfileManager();
    profiles.getProfile(name);
    await profiles.tunnels.withSession((session) => session.closeTunnel(profiles.getLocator(name)));
    this.log(`${chalk.green('✓')} Tunnel for ${chalk.cyan(name)} is closed`);
  }
}
