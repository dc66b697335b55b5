import { Args, Flags } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { AppContext } from '../core/AppContext';
import { HomebrewLayout } from '../core/brew/HomebrewLayout';
import { VersionIdentifier } from '../types/Version';
import { ValidationError, errorMessage } from '../utils/errors';

export default class Extensions extends PhpSwitchCommand {
  static override description = 'List, enable or disable extensions of a PHP version';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> 8.2 --disable xdebug',
    '<%= config.bin %> <%= command.id %> php@8.3 --enable opcache',
  ];

  static override args = {
    version: Args.string({
      description: 'PHP version (defaults to the linked one)',
      required: false,
    }),
  };

  static override flags = {
    enable: Flags.string({
      description: 'Enable the extension by restoring its ini file',
      exclusive: ['disable'],
    }),
    disable: Flags.string({
      description: 'Disable the extension by renaming its ini file',
      exclusive: ['enable'],
    }),
    json: Flags.boolean({
      char: 'j',
      description: 'Output in JSON format',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Extensions);

    try {
      const ctx = await this.context();
      const version = await this.targetVersion(ctx, args.version);

      if (flags.enable !== undefined) {
        await this.toggle(ctx, version, flags.enable, true);
        return;
      }
      if (flags.disable !== undefined) {
        await this.toggle(ctx, version, flags.disable, false);
        return;
      }

      const details = await ctx.extensions.details(version);
      const configs = await ctx.extensions.listConfigs(version);
      let modules: string[] = [];
      let modulesError: string | null = null;
      try {
        modules = await ctx.extensions.loadedModules(version);
      } catch (error) {
        modulesError = errorMessage(error);
      }

      if (flags.json) {
        this.log(JSON.stringify({ version, ...details, modules, configs }, null, 2));
        return;
      }

      this.log(chalk.blue(`🧩 Extensions for ${version}\n`));
      this.log(chalk.bold('Loaded modules:'));
      if (modulesError) {
        this.status('warning', `Could not list loaded modules: ${modulesError}`);
      } else {
        for (const loaded of modules) {
          this.log(`  - ${loaded}`);
        }
      }

      this.log(chalk.bold('\nConfiguration files:'));
      if (!details.confDirExists) {
        this.log(chalk.gray(`  No conf.d directory at ${details.confDir}`));
      }
      for (const config of configs) {
        const state = config.enabled ? chalk.green('enabled') : chalk.gray('disabled');
        this.log(`  - ${config.name} (${state}) ${chalk.gray(config.file)}`);
      }

      this.log(chalk.bold('\nphp.ini:'));
      this.log(details.phpIniExists ? `  ${details.phpIni}` : chalk.gray(`  Not found at ${details.phpIni}`));
    } catch (error) {
      this.fail('Failed to manage extensions', error);
    }
  }

  private async targetVersion(ctx: AppContext, requested?: string): Promise<VersionIdentifier> {
    const version = requested ? await ctx.resolver.normalize(requested) : await ctx.brew.currentLinked();
    if (!version) {
      throw new ValidationError('No PHP version is linked', 'invalid-value', 'Pass a version, for example 8.2');
    }
    if (!(await ctx.brew.isInstalled(version))) {
      throw new ValidationError(`${version} is not installed`, 'invalid-value');
    }
    return version;
  }

  private async toggle(ctx: AppContext, version: VersionIdentifier, name: string, enable: boolean): Promise<void> {
    const outcome = enable ? await ctx.extensions.enable(version, name) : await ctx.extensions.disable(version, name);
    const state = enable ? 'enabled' : 'disabled';

    if (outcome === 'unchanged') {
      this.status('info', `Extension ${name} is already ${state} for ${version}`);
      return;
    }

    this.status('success', `Extension ${name} ${state} for ${version}`);
    this.nextSteps([`Restart PHP-FPM to apply: brew services restart ${HomebrewLayout.formulaFor(version)}`]);
  }
}
