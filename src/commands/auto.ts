import { Flags } from '@oclif/core';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { ShellDialectRegistry } from '../core/shell/ShellDialectRegistry';
import { SHELL_DIALECTS } from '../types/Shell';
import { VersionIdentifier } from '../types/Version';
import { declineAll } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/Logger';

/**
 * Run by the directory-change hook. Prints shell code for the hook to evaluate
 * and nothing else on stdout.
 */
export default class Auto extends PhpSwitchCommand {
  static override description = 'Switch to the current directory\'s PHP version (used by the shell hook)';

  static override hidden = true;

  static override flags = {
    shell: Flags.string({
      description: 'Dialect of the calling shell',
      options: [...SHELL_DIALECTS],
    }),
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Auto);
    const cwd = process.cwd();

    try {
      const ctx = await this.context({ confirm: declineAll });

      let version: VersionIdentifier | null | undefined = await ctx.directoryCache.lookup(cwd);
      if (version === undefined) {
        const found = await ctx.resolver.resolve(cwd);
        version = found ? found.version : null;
        await ctx.directoryCache.record(cwd, version);
      }

      if (!version || (await ctx.brew.currentLinked()) === version) {
        return;
      }

      if (!(await ctx.brew.isInstalled(version))) {
        logger.warn(`${version} is requested here but not installed`);
        return;
      }

      await ctx.switcher.switchTo(version, {
        installIfMissing: false,
        updateProfile: false,
        updatePath: false,
      });

      const dialect =
        flags.shell && ShellDialectRegistry.isSupported(flags.shell) ? flags.shell : ctx.locator.detectDialect();
      this.log(ShellDialectRegistry.get(dialect).renderPathBlock(ctx.reconstructor.versionPaths(version)));
    } catch (error) {
      logger.warn(`Auto-switch skipped: ${errorMessage(error)}`);
    }
  }
}
