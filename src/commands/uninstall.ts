import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { promptConfirm } from '../utils/prompts';

export default class Uninstall extends PhpSwitchCommand {
  static override description = 'Uninstall a PHP version';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 7.4',
    '<%= config.bin %> <%= command.id %> php@8.0 --force',
  ];

  static override args = {
    version: Args.string({
      description: 'Version to uninstall',
      required: true,
    }),
  };

  static override flags = {
    force: Flags.boolean({
      char: 'f',
      description: 'Skip confirmation and force the uninstall',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Uninstall);

    try {
      const ctx = await this.context();
      const version = await ctx.resolver.normalize(args.version);

      if (!flags.force && !(await promptConfirm(`Are you sure you want to uninstall ${chalk.white(version)}?`))) {
        this.status('info', 'Uninstall cancelled');
        return;
      }

      this.report(await ctx.switcher.uninstall(version, flags.force));
    } catch (error) {
      this.fail(`Failed to uninstall ${args.version}`, error);
    }
  }
}
