import { Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { InstalledVersion, VersionCacheEntry } from '../types/Version';

export default class List extends PhpSwitchCommand {
  static override description = 'List installed and installable PHP versions';

  static override examples = ['<%= config.bin %> <%= command.id %>', '<%= config.bin %> <%= command.id %> --json'];

  static override flags = {
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
    installed: Flags.boolean({
      char: 'i',
      description: 'Only list installed versions',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(List);

    try {
      const ctx = await this.context();
      const installed = await ctx.brew.installedVersions();

      let available: VersionCacheEntry | null = null;
      if (!flags.installed) {
        const spinner = flags.json ? null : ora('Fetching available versions...').start();
        available = await ctx.versionCache.getAvailable();
        spinner?.stop();
      }

      if (flags.json) {
        this.log(
          JSON.stringify(
            {
              current: installed.find(entry => entry.isCurrent)?.version ?? null,
              installed: installed.map(entry => entry.version),
              available: available?.versions ?? [],
              availableSource: available?.source ?? null,
            },
            null,
            2
          )
        );
        return;
      }

      this.printInstalled(installed);
      if (available) {
        this.printAvailable(available, installed);
      }
    } catch (error) {
      this.fail('Failed to list versions', error);
    }
  }

  private printInstalled(installed: InstalledVersion[]): void {
    this.log(chalk.blue('📋 Installed PHP versions:\n'));

    if (installed.length === 0) {
      this.log(chalk.yellow('   None'));
      this.log(chalk.gray(`   Run ${chalk.white('phpswitch install 8.3')} to install one.`));
      return;
    }

    for (const entry of installed) {
      const marker = entry.isCurrent ? chalk.green('● ') : '  ';
      const label = entry.isCurrent ? chalk.green.bold(entry.version) : chalk.white(entry.version);
      this.log(`  ${marker}${label}${entry.isCurrent ? chalk.gray(' (active)') : ''}`);
      this.log(chalk.gray(`      ${entry.installDir}`));
    }
  }

  private printAvailable(available: VersionCacheEntry, installed: InstalledVersion[]): void {
    const installedVersions = new Set(installed.map(entry => entry.version));
    const notInstalled = available.versions.filter(version => !installedVersions.has(version));

    this.log(chalk.blue('\n📦 Available to install:\n'));
    if (notInstalled.length === 0) {
      this.log(chalk.gray('   Everything available is already installed'));
    }
    for (const version of notInstalled) {
      this.log(`    ${chalk.white(version)}`);
    }

    if (available.source === 'fallback') {
      this.log(chalk.yellow('\n⚠️  Homebrew did not answer in time; showing the fallback list'));
    } else if (available.source === 'cache') {
      this.log(chalk.gray(`\n   Cached ${available.fetchedAt.toLocaleString()}; refresh with phpswitch cache refresh`));
    }
  }
}
