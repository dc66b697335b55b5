import * as fs from 'fs-extra';
import * as path from 'path';
import { InstalledVersion, VersionIdentifier } from '../../types/Version';
import { HomebrewLayout } from './HomebrewLayout';
import { AvailableVersionSource } from '../version/VersionCache';
import { DEFAULT_VERSION, Versions } from '../version/Versions';
import { FileSystem } from '../../utils/FileSystem';
import { ProcessAbortedError, ProcessOptions, ProcessResult, ProcessUtils } from '../../utils/ProcessUtils';
import { ExternalCommandError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export interface BrewService {
  name: string;
  status: string;
}

const PHP_FORMULA_PATTERN = '/^php(@[0-9]+\\.[0-9]+)?$/';

/**
 * Thin wrapper around the `brew` CLI for the PHP formulae.
 */
export class HomebrewClient implements AvailableVersionSource {
  readonly layout: HomebrewLayout;

  constructor(
    prefix: string,
    private readonly command = 'brew'
  ) {
    this.layout = new HomebrewLayout(prefix);
  }

  prefix(): string {
    return this.layout.prefix;
  }

  /**
   * `php` is reported as `php@default`; anything that is not a PHP formula is dropped.
   */
  static versionFromFormula(formula: string): VersionIdentifier | null {
    const name = formula.trim().split('/').pop() ?? '';
    if (name === 'php') {
      return DEFAULT_VERSION;
    }
    return Versions.isIdentifier(name) ? name : null;
  }

  async listInstalled(): Promise<VersionIdentifier[]> {
    const output = await this.runOrThrow(['list', '--formula', '-1']);
    return Versions.sort(this.parseFormulae(output));
  }

  async searchAvailable(signal?: AbortSignal): Promise<VersionIdentifier[]> {
    const output = await this.runOrThrow(['search', PHP_FORMULA_PATTERN], { signal });
    return Versions.sort(this.parseFormulae(output));
  }

  async isInstalled(version: VersionIdentifier): Promise<boolean> {
    return FileSystem.isExecutable(this.layout.phpBinary(version));
  }

  async installedVersions(): Promise<InstalledVersion[]> {
    const [versions, current] = await Promise.all([this.listInstalled(), this.currentLinked()]);
    return versions.map(version => ({
      version,
      formula: HomebrewLayout.formulaFor(version),
      installDir: this.layout.pathsFor(version).installDir,
      isCurrent: version === current,
    }));
  }

  /**
   * Version behind the `php` link brew maintains, read from the Cellar path
   * the link points to.
   */
  async currentLinked(): Promise<VersionIdentifier | null> {
    let target: string;
    try {
      target = await fs.readlink(this.layout.linkedBinary());
    } catch {
      return null;
    }

    const match = /Cellar[\\/](php(?:@\d+\.\d+)?)[\\/]/.exec(target);
    return match ? HomebrewClient.versionFromFormula(match[1]) : null;
  }

  async link(version: VersionIdentifier, flags: string[] = []): Promise<void> {
    await this.runOrThrow(['link', ...flags, HomebrewLayout.formulaFor(version)]);
  }

  async unlink(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['unlink', HomebrewLayout.formulaFor(version)]);
  }

  async install(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['install', HomebrewLayout.formulaFor(version)], { stdio: 'inherit' });
  }

  async reinstall(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['reinstall', HomebrewLayout.formulaFor(version)], { stdio: 'inherit' });
  }

  async uninstall(version: VersionIdentifier, force = false): Promise<void> {
    const args = ['uninstall', ...(force ? ['--force'] : []), HomebrewLayout.formulaFor(version)];
    await this.runOrThrow(args);
  }

  async cleanup(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['cleanup', HomebrewLayout.formulaFor(version)]);
  }

  async servicesList(): Promise<BrewService[]> {
    const output = await this.runOrThrow(['services', 'list']);
    return output
      .split(/\r?\n/)
      .slice(1)
      .map(line => line.trim().split(/\s+/))
      .filter(columns => columns.length >= 2 && columns[0] !== '')
      .map(([name, status]) => ({ name, status }));
  }

  async serviceStart(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['services', 'start', HomebrewLayout.formulaFor(version)]);
  }

  async serviceStop(formula: string): Promise<void> {
    await this.runOrThrow(['services', 'stop', formula]);
  }

  async serviceRestart(version: VersionIdentifier): Promise<void> {
    await this.runOrThrow(['services', 'restart', HomebrewLayout.formulaFor(version)]);
  }

  /**
   * Existing `php` binaries outside the Homebrew prefix, which shadow or are
   * shadowed by the linked version.
   */
  async foreignBinaries(searchPath: string): Promise<string[]> {
    const all = await FileSystem.whichAll('php', searchPath);
    const prefix = path.resolve(this.layout.prefix);
    return all.filter(binary => !path.resolve(binary).startsWith(prefix + path.sep));
  }

  protected async run(args: string[], options: ProcessOptions = {}): Promise<ProcessResult> {
    logger.debug(`Running ${this.command} ${args.join(' ')}`);
    return ProcessUtils.execute(this.command, args, {
      ...options,
      env: { HOMEBREW_NO_AUTO_UPDATE: '1', ...options.env },
    });
  }

  private async runOrThrow(args: string[], options: ProcessOptions = {}): Promise<string> {
    let result: ProcessResult;
    try {
      result = await this.run(args, options);
    } catch (error) {
      if (error instanceof ProcessAbortedError) {
        throw error;
      }
      throw new ExternalCommandError(
        `Could not run ${this.command}: ${errorMessage(error)}`,
        `${this.command} ${args.join(' ')}`,
        null,
        'Make sure Homebrew is installed and on your PATH'
      );
    }

    if (result.exitCode !== 0) {
      throw new ExternalCommandError(
        `${this.command} ${args[0]} failed: ${result.stderr || result.stdout || `exit code ${result.exitCode}`}`,
        `${this.command} ${args.join(' ')}`,
        result.exitCode
      );
    }

    return result.stdout;
  }

  private parseFormulae(output: string): VersionIdentifier[] {
    const versions: VersionIdentifier[] = [];
    for (const line of output.split(/\r?\n/)) {
      const version = HomebrewClient.versionFromFormula(line);
      if (version) {
        versions.push(version);
      }
    }
    return versions;
  }
}
