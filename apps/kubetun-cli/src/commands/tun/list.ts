/**
 * `kubetun tun list` - Show the status of SSH tunnels
 */

import { ProfileConfigNotFoundError, type ProfileManager } from '@kubetun/core';
import { Flags } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';
import { buildProfileRows, renderTunnelTable, sortRows, toTunnelRow } from '../../lib/tunnel-table.js';

export default class TunList extends BaseCommand {
  static description =
    'Show the status of SSH tunnels for the profiles in the current profiles file, or of all tunnels';

  static examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> --all'];

  static flags = {
    all: Flags.boolean({
      char: 'a',
      description: 'Show tunnels from every profiles file',
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(TunList);

    let profiles: ProfileManager | undefined;
    if (!flags.all) {
      try {
        profiles = await this.loadProfileManager();
      } catch (error) {
        if (!(error instanceof ProfileConfigNotFoundError)) throw error;
        console.debug(`[cli] ${error.message}; showing all tunnels.`);
      }
    }

    const tunnels = profiles?.tunnels ?? (await this.createTunnelManager());
    const records = await tunnels.withSession((session) => session.getTunnels());
    const rows = profiles
      ? buildProfileRows(records, profiles.config.file, profiles.getTunnelProfiles())
      : sortRows(records.map(toTunnelRow));

    if (rows.length === 0) {
      this.log(chalk.yellow('No tunnels found'));
      return;
    }

    this.log(renderTunnelTable(rows, { showConfigFile: profiles === undefined }));
  }
}
