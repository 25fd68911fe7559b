/**
 * `kubetun config unset <key>` - Remove a value so its default applies again
 */

import { unsetConfigValue } from '@kubetun/core';
import { Args } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';

export default class ConfigUnset extends BaseCommand {
  static description = 'Remove a configuration value (the default applies again)';

  static examples = ['<%= config.bin %> <%= command.id %> ssh.binary'];

  static args = {
    key: Args.string({
      description: 'Config key in dot notation',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigUnset);
    await unsetConfigValue(args.key);
    this.log(`${chalk.green('✓')} Unset ${chalk.cyan(args.key)}`);
  }
}
