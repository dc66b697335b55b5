import { VersionIdentifier } from '../types/Version';
import { HomebrewClient } from './brew/HomebrewClient';
import { HomebrewLayout } from './brew/HomebrewLayout';
import { RetryExecutor } from './brew/RetryExecutor';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/Logger';

const PHP_SERVICE = /^php(@\d+\.\d+)?$/;

export interface FpmRestartResult {
  /** False when auto-restart is turned off */
  attempted: boolean;
  stopped: string[];
  /** Whether the selected version's service was running and got restarted */
  restarted: boolean;
  /** Strategy that restarted it */
  strategy?: string;
}

/**
 * Keeps exactly one PHP-FPM service running, the one for the active version.
 */
export class FpmServiceManager {
  constructor(
    private readonly brew: HomebrewClient,
    private readonly executor: RetryExecutor,
    private readonly options: { autoRestart: boolean }
  ) {}

  async restart(version: VersionIdentifier): Promise<FpmRestartResult> {
    if (!this.options.autoRestart) {
      logger.debug('Auto restart of PHP-FPM is disabled');
      return { attempted: false, stopped: [], restarted: false };
    }

    const service = HomebrewLayout.formulaFor(version);
    const services = (await this.brew.servicesList()).filter(entry => PHP_SERVICE.test(entry.name));
    const stopped: string[] = [];

    for (const other of services) {
      if (other.name === service || other.status !== 'started') continue;
      try {
        await this.brew.serviceStop(other.name);
        stopped.push(other.name);
        logger.info(`Stopped PHP-FPM service ${other.name}`);
      } catch (error) {
        logger.warn(`Could not stop PHP-FPM service ${other.name}: ${errorMessage(error)}`);
      }
    }

    const target = services.find(entry => entry.name === service);
    if (!target || target.status !== 'started') {
      logger.debug(`PHP-FPM service ${service} is not running`);
      return { attempted: true, stopped, restarted: false };
    }

    const outcome = await this.executor.run({
      label: `Restart PHP-FPM service ${service}`,
      command: `brew services restart ${service}`,
      strategies: [
        { name: 'restart', run: () => this.brew.serviceRestart(version) },
        {
          name: 'stop then start',
          run: async () => {
            await this.brew.serviceStop(service);
            await this.brew.serviceStart(version);
          },
        },
      ],
      manualHint: `Run 'brew services restart ${service}', or 'brew reinstall ${service}' if it keeps failing`,
    });

    return { attempted: true, stopped, restarted: true, strategy: outcome.strategy };
  }
}
