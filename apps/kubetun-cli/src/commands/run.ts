/**
 * `kubetun run <profile> -- <command...>` - Run a command against a profile's cluster
 */

import { spawn } from 'node:child_process';
import os from 'node:os';
import { MissingTunnelConfigError } from '@kubetun/core';
import { Args, Flags } from '@oclif/core';
import { BaseCommand } from '../base-command.js';

export default class Run extends BaseCommand {
  static description = 'Activate a profile and run a command with KUBECONFIG pointing at it';

  static examples = [
    '<%= config.bin %> <%= command.id %> prod -- kubectl get nodes',
    '<%= config.bin %> <%= command.id %> prod -- helm list -A',
  ];

  static strict = false;

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
    const { args, argv, flags } = await this.parse(Run);

    const command = argv.slice(1).filter((arg): arg is string => typeof arg === 'string');
    if (command[0] === '--') command.shift();
    const [executable, ...commandArgs] = command;
    if (executable === undefined) {
      this.error('Missing command to run. Usage: kubetun run <profile> -- <command...>', { exit: 1 });
    }

    const profiles = await this.loadProfileManager();
    if (!profiles.getProfile(args.profile).tunnel) {
      throw new MissingTunnelConfigError(args.profile, profiles.config.file);
    }
    const activated = await profiles.activateProfile(args.profile, { forceRefresh: flags.refresh });

    console.debug(`[cli] Running '${command.join(' ')}' with KUBECONFIG=${activated.kubeconfig}`);
    const exitCode = await new Promise<number>((resolve, reject) => {
      const child = spawn(executable, commandArgs, {
        stdio: 'inherit',
        env: { ...process.env, KUBECONFIG: activated.kubeconfig },
      });
      child.on('error', reject);
      child.on('close', (code, signal) => {
        if (code !== null) {
          resolve(code);
        } else {
          resolve(128 + (signal ? os.constants.signals[signal] : 0));
        }
      });
    });

    if (exitCode !== 0) {
      this.exit(exitCode);
    }
  }
}
