/**
 * `kubetun tun open [profile]` - Open the tunnel to the cluster targeted by a profile
 */

import { getDefaultProfileName } from '@kubetun/core';
import { Args } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';
import { formatForwardings } from '../../lib/tunnel-table.js';

export default class TunOpen extends BaseCommand {
  static description = 'Open the SSH tunnel of a profile (reuses it when already open)';

  static examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> prod',
  ];

  static args = {
    profile: Args.string({
      description: 'Profile name (default: $KUBETUN_PROFILE or "default")',
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(TunOpen);
    const name = args.profile ?? getDefaultProfileName();

    const profiles = await this.loadProfileManager();
    const spec = await profiles.getTunnelSpec(name);
    const status = await profiles.tunnels.withSession((session) => session.openTunnel(spec));

    this.log(`${chalk.green('✓')} Tunnel for ${chalk.cyan(name)} is ${status.status}`);
    this.log(chalk.dim(`  ${formatForwardings(spec, status)}`));
  }
}
