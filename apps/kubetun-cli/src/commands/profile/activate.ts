/**
 * `kubetun profile activate <profile>` - Prepare kubeconfig and tunnel for a profile
 *
 * Prints an `export KUBECONFIG=...` line, so it can be used as
 * `eval "$(kubetun profile activate prod)"`.
 */

import { quoteShellArg } from '@kubetun/core';
import { Args, Flags } from '@oclif/core';
import { BaseCommand } from '../../base-command.js';

export default class ProfileActivate extends BaseCommand {
  static description = 'Ensure the kubeconfig and tunnel of a profile are ready and print the KUBECONFIG export';

  static examples = [
    '<%= config.bin %> <%= command.id %> prod',
    'eval "$(<%= config.bin %> <%= command.id %> prod)"',
  ];

  static args = {
    profile: Args.string({
      description: 'Profile name',
      required: true,
    }),
  };

  static flags = {
    refresh: Flags.boolean({
      description: 'Fetch the kubeconfig again instead of using the cached copy',
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(ProfileActivate);

    const profiles = await this.loadProfileManager();
    const activated = await profiles.activateProfile(args.profile, { forceRefresh: flags.refresh });

    this.log(`export KUBECONFIG=${quoteShellArg(activated.kubeconfig)}`);
  }
}
