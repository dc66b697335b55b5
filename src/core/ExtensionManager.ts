import * as fs from 'fs-extra';
import * as path from 'path';
import { VersionIdentifier } from '../types/Version';
import { HomebrewLayout } from './brew/HomebrewLayout';
import { ProcessResult, ProcessUtils } from '../utils/ProcessUtils';
import { ExternalCommandError, FileSystemError, ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/Logger';

export interface ExtensionConfig {
  /** Extension name without the `ext-` prefix */
  name: string;
  file: string;
  enabled: boolean;
}

export interface IniDetails {
  iniDir: string;
  phpIni: string;
  phpIniExists: boolean;
  confDir: string;
  confDirExists: boolean;
}

export type ToggleOutcome = 'changed' | 'unchanged';

export const DISABLED_SUFFIX = '.disabled';

const CONFIG_FILE = /^(.+)\.ini(\.disabled)?$/i;
const EXTENSION_NAME = /^[A-Za-z0-9_-]+$/;

/**
 * Extension ini files under a version's conf.d. Disabling renames
 * `<name>.ini` to `<name>.ini.disabled`; enabling renames it back.
 */
export class ExtensionManager {
  constructor(private readonly layout: HomebrewLayout) {}

  async details(version: VersionIdentifier): Promise<IniDetails> {
    const iniDir = this.layout.iniDir(version);
    const phpIni = path.join(iniDir, 'php.ini');
    const confDir = this.confDir(version);
    const [phpIniExists, confDirExists] = await Promise.all([fs.pathExists(phpIni), fs.pathExists(confDir)]);
    return { iniDir, phpIni, phpIniExists, confDir, confDirExists };
  }

  async listConfigs(version: VersionIdentifier): Promise<ExtensionConfig[]> {
    const confDir = this.confDir(version);

    let entries: string[];
    try {
      entries = await fs.readdir(confDir);
    } catch (error) {
      logger.debug(`No conf.d at ${confDir}: ${errorMessage(error)}`);
      return [];
    }

    return entries
      .sort()
      .flatMap(entry => {
        const match = CONFIG_FILE.exec(entry);
        if (!match) {
          return [];
        }
        return [
          {
            name: match[1].replace(/^ext-/, ''),
            file: path.join(confDir, entry),
            enabled: match[2] === undefined,
          },
        ];
      });
  }

  /**
   * Modules the version's own `php -m` reports, sorted and without duplicates.
   */
  async loadedModules(version: VersionIdentifier): Promise<string[]> {
    const binary = this.layout.phpBinary(version);

    let result: ProcessResult;
    try {
      result = await this.run(binary, ['-m']);
    } catch (error) {
      throw new ExternalCommandError(`Could not run ${binary}: ${errorMessage(error)}`, `${binary} -m`, null);
    }

    if (result.exitCode !== 0) {
      throw new ExternalCommandError(
        `php -m failed: ${result.stderr || `exit code ${result.exitCode}`}`,
        `${binary} -m`,
        result.exitCode
      );
    }

    return ExtensionManager.parseModules(result.stdout);
  }

  static parseModules(output: string): string[] {
    const modules = output
      .split('\n')
      .map(line => line.trim())
      .filter(line => line !== '' && !line.startsWith('['));

    return [...new Set(modules)].sort((a, b) => a.toLowerCase().localeCompare(b.toLowerCase()));
  }

  async enable(version: VersionIdentifier, name: string): Promise<ToggleOutcome> {
    return this.toggle(version, name, true);
  }

  async disable(version: VersionIdentifier, name: string): Promise<ToggleOutcome> {
    return this.toggle(version, name, false);
  }

  protected async run(binary: string, args: string[]): Promise<ProcessResult> {
    logger.debug(`Running ${binary} ${args.join(' ')}`);
    return ProcessUtils.execute(binary, args);
  }

  private confDir(version: VersionIdentifier): string {
    return path.join(this.layout.iniDir(version), 'conf.d');
  }

  private async toggle(version: VersionIdentifier, name: string, enable: boolean): Promise<ToggleOutcome> {
    if (!EXTENSION_NAME.test(name)) {
      throw new ValidationError(`Invalid extension name '${name}'`, 'invalid-value');
    }

    const confDir = this.confDir(version);
    for (const base of [`ext-${name}.ini`, `${name}.ini`]) {
      const active = path.join(confDir, base);
      const disabled = `${active}${DISABLED_SUFFIX}`;
      const [hasActive, hasDisabled] = await Promise.all([fs.pathExists(active), fs.pathExists(disabled)]);

      if (!hasActive && !hasDisabled) {
        continue;
      }
      if (hasActive === enable) {
        return 'unchanged';
      }

      const [from, to] = enable ? [disabled, active] : [active, disabled];
      try {
        await fs.move(from, to, { overwrite: true });
      } catch (error) {
        throw new FileSystemError(`Failed to rename ${from}: ${errorMessage(error)}`, from);
      }
      logger.debug(`Renamed ${from} to ${to}`);
      return 'changed';
    }

    throw new ValidationError(
      `No configuration file for extension '${name}' in ${confDir}`,
      'invalid-value',
      enable ? `Install it first, for example with 'pecl install ${name}'` : undefined
    );
  }
}
