import chalk from 'chalk';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { PATH_BLOCK_MARKERS } from '../core/shell/ManagedBlockPatcher';
import { ShellDialectRegistry } from '../core/shell/ShellDialectRegistry';
import { PathValidator } from '../utils/PathValidator';
import { FileSystem } from '../utils/FileSystem';

export default class Doctor extends PhpSwitchCommand {
  static override description = 'Check for PHP binaries and settings that get in the way of switching';

  static override examples = ['<%= config.bin %> <%= command.id %>'];

  public async run(): Promise<void> {
    await this.parse(Doctor);

    try {
      const ctx = await this.context();
      const searchPath = ctx.env.PATH ?? '';
      let problems = 0;

      this.log(chalk.blue('🔍 Checking your PHP setup...\n'));

      const current = await ctx.brew.currentLinked();
      if (current) {
        this.status('success', `Homebrew links ${current}`);
      } else {
        problems++;
        this.status('warning', 'No PHP version is linked by Homebrew');
      }

      const binaries = await FileSystem.whichAll('php', searchPath);
      if (binaries.length === 0) {
        problems++;
        this.status('error', 'No php binary on PATH');
      } else {
        this.status('info', 'php binaries on PATH, in lookup order:');
        for (const binary of binaries) {
          this.log(chalk.gray(`     ${binary}`));
        }

        const [first] = binaries;
        if (current && !PathValidator.isWithin(first, ctx.brew.prefix())) {
          problems++;
          this.status('warning', `${first} comes before Homebrew's php and shadows ${current}`);
        }
      }

      const foreign = await ctx.brew.foreignBinaries(searchPath);
      if (foreign.length > 0) {
        this.status('info', `${foreign.length} php binaries outside ${ctx.brew.prefix()}: ${foreign.join(', ')}`);
      }

      const dialect = ctx.locator.detectDialect();
      let profile: string | null = null;
      for (const candidate of ShellDialectRegistry.get(dialect).startupCandidates(ctx.homeDir)) {
        if (await FileSystem.isFile(candidate)) {
          profile = candidate;
          break;
        }
      }

      if (!profile) {
        problems++;
        this.status('warning', `No ${dialect} startup file yet; phpswitch switch will create one`);
      } else if ((await ctx.patcher.read(profile)) === null) {
        problems++;
        this.status('warning', `${profile} has no '${PATH_BLOCK_MARKERS.begin}' block yet`);
      } else {
        this.status('success', `${profile} has a phpswitch block (${dialect})`);
      }

      const cacheDir = await ctx.versionCache.location();
      if (cacheDir) {
        this.status('success', `Caches are stored in ${cacheDir}`);
      } else {
        problems++;
        this.status('warning', 'No writable cache directory; version lists will not be cached');
      }

      this.log('');
      if (problems === 0) {
        this.status('success', 'No problems found');
      } else {
        this.status('warning', `${problems} potential problem${problems === 1 ? '' : 's'} found`);
        this.nextSteps([`Run ${chalk.white('phpswitch switch <version>')} to rewrite PATH and the startup file`]);
      }
    } catch (error) {
      this.fail('Doctor failed', error);
    }
  }
}
