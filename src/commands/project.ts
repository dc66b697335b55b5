import { Flags } from '@oclif/core';
import chalk from 'chalk';
import * as path from 'path';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';

export default class Project extends PhpSwitchCommand {
  static override description = 'Switch to the PHP version the current project asks for';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --print',
    '<%= config.bin %> <%= command.id %> --set 8.2',
  ];

  static override flags = {
    print: Flags.boolean({
      char: 'p',
      description: 'Only print the resolved version',
      default: false,
    }),
    set: Flags.string({
      char: 's',
      description: 'Write .php-version with this version in the current directory',
    }),
    dir: Flags.string({
      char: 'd',
      description: 'Directory to resolve from',
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Project);
    const dir = path.resolve(flags.dir ?? process.cwd());

    try {
      const ctx = await this.context();

      if (flags.set !== undefined) {
        const version = await ctx.resolver.normalize(flags.set);
        const file = await ctx.resolver.setProjectVersion(dir, version);
        await ctx.directoryCache.record(dir, version);
        this.status('success', `Created ${file} with ${version}`);
        this.status('info', 'This directory and its subdirectories will now use that version');
        return;
      }

      const found = await ctx.resolver.resolve(dir);

      if (flags.print) {
        if (found) {
          this.log(found.version);
        }
        return;
      }

      if (!found) {
        this.status('info', `No PHP version file found in ${dir} or its parents`);
        this.nextSteps([`Create one with ${chalk.white('phpswitch project --set 8.3')}`]);
        return;
      }

      this.status('info', `${path.basename(found.file)} asks for ${found.version} (${found.file})`);

      const current = await ctx.brew.currentLinked();
      if (current === found.version) {
        this.status('success', `Already using ${found.version}`);
        return;
      }

      const report = await ctx.switcher.switchTo(found.version, { installIfMissing: false, updateProfile: true });
      this.report(report.lines);
      this.log(chalk.green(`\n✅ Now using ${found.version}`));
      this.nextSteps(report.pathUpdate?.instructions ?? []);
    } catch (error) {
      this.fail('Failed to apply the project version', error);
    }
  }
}
