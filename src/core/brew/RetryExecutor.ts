import { ConfirmFn, declineAll } from '../../utils/prompts';
import { ExternalCommandError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export interface RetryStrategy {
  name: string;
  run: () => Promise<void>;
  /** Question that must be answered "yes" before this strategy runs */
  confirm?: string;
}

export interface RetryPolicy {
  /** What is being attempted, e.g. "Install php@8.2" */
  label: string;
  /** Shown as the command when every strategy fails */
  command: string;
  strategies: RetryStrategy[];
  /** What the user can run by hand once everything failed */
  manualHint?: string;
}

export interface RetryOutcome {
  strategy: string;
  failures: Array<{ strategy: string; message: string }>;
}

/**
 * Runs the strategies of a policy in order until one succeeds.
 */
export class RetryExecutor {
  constructor(private readonly confirm: ConfirmFn = declineAll) {}

  async run(policy: RetryPolicy): Promise<RetryOutcome> {
    const failures: RetryOutcome['failures'] = [];
    let exitCode: number | null = null;

    for (const strategy of policy.strategies) {
      if (strategy.confirm && !(await this.confirm(strategy.confirm))) {
        logger.debug(`${policy.label}: skipped '${strategy.name}' (not confirmed)`);
        failures.push({ strategy: strategy.name, message: 'not confirmed' });
        continue;
      }

      try {
        logger.debug(`${policy.label}: trying '${strategy.name}'`);
        await strategy.run();
        logger.debug(`${policy.label}: '${strategy.name}' succeeded`);
        return { strategy: strategy.name, failures };
      } catch (error) {
        logger.warn(`${policy.label}: '${strategy.name}' failed: ${errorMessage(error)}`);
        failures.push({ strategy: strategy.name, message: errorMessage(error) });
        if (error instanceof ExternalCommandError) {
          exitCode = error.exitCode;
        }
      }
    }

    const summary = failures.map(failure => `${failure.strategy}: ${failure.message}`).join('; ');
    throw new ExternalCommandError(
      `${policy.label} failed${summary ? ` (${summary})` : ''}`,
      policy.command,
      exitCode,
      policy.manualHint ?? `Try running '${policy.command}' yourself`
    );
  }
}
