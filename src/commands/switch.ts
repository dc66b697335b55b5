import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { ValidationError } from '../utils/errors';

export default class Switch extends PhpSwitchCommand {
  static override description = 'Switch the active PHP version';

  static override examples = [
    '<%= config.bin %> <%= command.id %> 8.2',
    '<%= config.bin %> <%= command.id %> php@8.3 --force',
    '<%= config.bin %> <%= command.id %> default --no-shell',
  ];

  static override args = {
    version: Args.string({
      description: 'Version to switch to (8.2, php@8.2, 8 or default)',
      required: true,
    }),
  };

  static override flags = {
    force: Flags.boolean({
      char: 'f',
      description: 'Install the version first if it is missing',
      default: false,
    }),
    'no-shell': Flags.boolean({
      description: 'Do not touch the shell startup file',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Switch);

    try {
      const ctx = await this.context();
      const version = await ctx.resolver.normalize(args.version);

      if (flags.force && !(await ctx.brew.isInstalled(version))) {
        const spinner = ora('Checking available versions...').start();
        const available = await ctx.versionCache.getAvailable();
        spinner.stop();
        if (!available.versions.includes(version)) {
          throw new ValidationError(
            `${version} is not available from Homebrew`,
            'invalid-value',
            `Run ${chalk.white('phpswitch list')} to see what can be installed`
          );
        }
      }

      this.log(chalk.blue(`🔄 Switching to ${version}...\n`));
      const report = await ctx.switcher.switchTo(version, {
        installIfMissing: flags.force,
        updateProfile: !flags['no-shell'],
      });

      this.report(report.lines);
      this.log(chalk.green(`\n✅ Now using ${version}`));
      this.nextSteps(report.pathUpdate?.instructions ?? []);
    } catch (error) {
      this.fail(`Failed to switch to ${args.version}`, error);
    }
  }
}
