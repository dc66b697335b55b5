import { Args } from '@oclif/core';
import ora from 'ora';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';

export default class Cache extends PhpSwitchCommand {
  static override description = 'Maintain the version and directory caches';

  static override examples = [
    '<%= config.bin %> <%= command.id %> refresh',
    '<%= config.bin %> <%= command.id %> clear',
    '<%= config.bin %> <%= command.id %> clear-dirs',
  ];

  static override args = {
    action: Args.string({
      description: 'clear: drop the version list, refresh: fetch it again, clear-dirs: forget directory lookups',
      options: ['clear', 'refresh', 'clear-dirs'],
      required: true,
    }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Cache);

    try {
      const ctx = await this.context();

      switch (args.action) {
        case 'clear': {
          const removed = await ctx.versionCache.invalidate();
          this.status(removed ? 'success' : 'info', removed ? 'Version cache cleared' : 'Version cache was already empty');
          break;
        }
        case 'refresh': {
          const spinner = ora('Fetching available versions from Homebrew...').start();
          const entry = await ctx.versionCache.forceRefresh();
          if (entry.source === 'live') {
            spinner.succeed(`Found ${entry.versions.length} versions`);
          } else {
            spinner.warn(`Homebrew did not answer; cached the fallback list (${entry.versions.length} versions)`);
          }
          break;
        }
        case 'clear-dirs': {
          const removed = await ctx.directoryCache.clear();
          this.status(removed ? 'success' : 'info', removed ? 'Directory cache cleared' : 'Directory cache was already empty');
          break;
        }
      }
    } catch (error) {
      this.fail(`Failed to ${args.action} the cache`, error);
    }
  }
}
