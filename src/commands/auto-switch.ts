import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { ShellDialectRegistry } from '../core/shell/ShellDialectRegistry';
import { SHELL_DIALECTS } from '../types/Shell';

export default class AutoSwitch extends PhpSwitchCommand {
  static override description = 'Enable or disable switching PHP versions on directory change';

  static override examples = [
    '<%= config.bin %> <%= command.id %> enable',
    '<%= config.bin %> <%= command.id %> disable --shell zsh',
  ];

  static override args = {
    action: Args.string({
      description: 'enable or disable',
      options: ['enable', 'disable'],
      required: true,
    }),
  };

  static override flags = {
    shell: Flags.string({
      description: 'Shell to configure instead of the detected one',
      options: [...SHELL_DIALECTS],
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(AutoSwitch);

    try {
      const ctx = await this.context();
      const dialect =
        flags.shell && ShellDialectRegistry.isSupported(flags.shell) ? flags.shell : ctx.locator.detectDialect();

      if (args.action === 'enable') {
        const profile = await ctx.autoSwitch.install(dialect);
        this.status('success', `Auto-switching enabled in ${profile.path}`);
        this.nextSteps([
          `Reload your shell: ${chalk.white(ShellDialectRegistry.get(dialect).sourceCommand(profile.path))}`,
          `Add a ${chalk.white('.php-version')} file to a project with ${chalk.white('phpswitch project --set 8.3')}`,
        ]);
        return;
      }

      const removedFrom = await ctx.autoSwitch.uninstall(dialect);
      this.status(
        'success',
        removedFrom ? `Auto-switching disabled; removed the hook from ${removedFrom}` : 'Auto-switching disabled'
      );
    } catch (error) {
      this.fail(`Failed to ${args.action} auto-switching`, error);
    }
  }
}
