import { Args } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';

export default class Install extends PhpSwitchCommand {
  static override description = 'Install a PHP version through Homebrew';

  static override examples = ['<%= config.bin %> <%= command.id %> 8.3', '<%= config.bin %> <%= command.id %> default'];

  static override args = {
    version: Args.string({
      description: 'Version to install',
      required: true,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Install);

    try {
      const ctx = await this.context();
      const version = await ctx.resolver.normalize(args.version);

      if (await ctx.brew.isInstalled(version)) {
        this.status('info', `${version} is already installed`);
        return;
      }

      const spinner = ora('Checking available versions...').start();
      const available = await ctx.versionCache.getAvailable();
      spinner.stop();
      if (!available.versions.includes(version)) {
        this.status('warning', `${version} is not in the list of known versions; trying anyway`);
      }

      this.status('info', `Installing ${version}... This may take a while`);
      await ctx.switcher.install(version);
      this.status('success', `${version} installed`);
      this.nextSteps([`Switch to it with ${chalk.white(`phpswitch switch ${version}`)}`]);
    } catch (error) {
      this.fail(`Failed to install ${args.version}`, error);
    }
  }
}
