/**
 * `kubetun config set <key> <value>` - Update ~/.kubetun/config.yaml
 */

import { getConfigPath, setConfigValue } from '@kubetun/core';
import { Args } from '@oclif/core';
import chalk from 'chalk';
import { BaseCommand } from '../../base-command.js';
import { parseConfigScalar } from '../../lib/config-value.js';

export default class ConfigSet extends BaseCommand {
  static description = 'Set a configuration value';

  static examples = [
    '<%= config.bin %> <%= command.id %> tunnels.lock_timeout_ms 10000',
    '<%= config.bin %> <%= command.id %> ssh.binary /usr/local/bin/ssh',
  ];

  static args = {
    key: Args.string({
      description: 'Config key in dot notation',
      required: true,
    }),
    value: Args.string({
      description: 'New value',
      required: true,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigSet);
    const value = parseConfigScalar(args.value);

    await setConfigValue(args.key, value);
    this.log(`${chalk.green('✓')} Set ${chalk.cyan(args.key)} = ${chalk.bold(String(value))}`);
    this.log(chalk.dim(`  ${getConfigPath()}`));
  }
}
