/**
 * `kubetun config get <key>` - Show an effective configuration value
 */

import { getConfigValue } from '@kubetun/core';
import { Args } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';
import { formatConfigValue } from '../../lib/config-value.js';

export default class ConfigGet extends BaseCommand {
  static description = 'Show a configuration value (defaults included)';

  static examples = [
    '<%= config.bin %> <%= command.id %> activation.restart_grace_ms',
    '<%= config.bin %> <%= command.id %> tunnels',
  ];

  static args = {
    key: Args.string({
      description: 'Config key in dot notation (e.g. tunnels.lock_timeout_ms)',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigGet);
    const value = await getConfigValue(args.key);

    if (value === undefined) {
      this.log(chalk.yellow(`(not set: ${args.key})`));
      return;
    }
    this.log(formatConfigValue(value));
  }
}
