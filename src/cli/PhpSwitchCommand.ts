import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { AppContext, AppContextOptions } from '../core/AppContext';
import { StatusLine } from '../core/VersionSwitcher';
import { PhpSwitchError, errorMessage } from '../utils/errors';
import { StatusKind, formatStatus, logger } from '../utils/Logger';
import { promptConfirm } from '../utils/prompts';

/**
 * Shared plumbing for phpswitch commands: the global --debug flag, component
 * wiring and status output.
 */
export abstract class PhpSwitchCommand extends Command {
  static override baseFlags = {
    debug: Flags.boolean({
      description: 'Print debug logging to stderr',
      default: false,
      helpGroup: 'GLOBAL',
    }),
  };

  protected override async init(): Promise<void> {
    await super.init();
    if (this.argv.includes('--debug')) {
      logger.setLevel('debug');
    }
  }

  protected async context(options: AppContextOptions = {}): Promise<AppContext> {
    return AppContext.create({ confirm: promptConfirm, ...options });
  }

  protected status(kind: StatusKind, message: string): void {
    this.log(formatStatus(kind, message));
  }

  protected report(lines: StatusLine[]): void {
    for (const line of lines) {
      this.status(line.kind, line.message);
    }
  }

  protected nextSteps(steps: string[]): void {
    if (steps.length === 0) return;
    this.log(chalk.blue('\n🎯 Next steps:'));
    for (const step of steps) {
      this.log(chalk.gray(`   • ${step}`));
    }
  }

  /**
   * Prints the error with its hint and exits non-zero.
   */
  protected fail(action: string, error: unknown): never {
    logger.debug(`${action} failed`, error);
    const hint = error instanceof PhpSwitchError && error.hint ? `\n${chalk.gray(`Hint: ${error.hint}`)}` : '';
    this.error(`${action}: ${errorMessage(error)}${hint}`);
  }
}
