import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { PathUpdateResult, VersionPaths } from '../../types/Shell';
import { VersionIdentifier } from '../../types/Version';
import { ShellDialectStrategy } from './ShellDialectStrategy';
import { HomebrewLayout } from '../brew/HomebrewLayout';
import { FileSystem } from '../../utils/FileSystem';
import { PathValidator } from '../../utils/PathValidator';
import { FileSystemError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export interface PathReconstructorOptions {
  layout: HomebrewLayout;
  /** Environment that receives live PATH updates */
  env?: NodeJS.ProcessEnv;
  /** Where reload scripts are written */
  scriptDir?: string;
  /** Name matched (case-insensitively) to recognise interpreter entries */
  interpreter?: string;
}

export class PathReconstructor {
  private readonly layout: HomebrewLayout;
  private readonly env: NodeJS.ProcessEnv;
  private readonly scriptDir: string;
  private readonly interpreter: string;

  constructor(options: PathReconstructorOptions) {
    this.layout = options.layout;
    this.env = options.env ?? process.env;
    this.scriptDir = options.scriptDir ?? os.tmpdir();
    this.interpreter = (options.interpreter ?? 'php').toLowerCase();
  }

  versionPaths(version: VersionIdentifier): VersionPaths {
    return this.layout.pathsFor(version);
  }

  /**
   * Drops every entry mentioning the interpreter and puts `newPaths` first.
   */
  rebuild(searchPath: string, newPaths: string[], separator = ':'): string {
    const kept = searchPath
      .split(separator)
      .filter(entry => entry !== '' && !entry.toLowerCase().includes(this.interpreter));

    return [...newPaths, ...kept].join(separator);
  }

  async apply(
    strategy: ShellDialectStrategy,
    version: VersionIdentifier,
    startupFile?: string
  ): Promise<PathUpdateResult> {
    const paths = this.versionPaths(version);
    const instructions: string[] = [];

    if (!strategy.supportsLiveUpdate) {
      const reloadScript = await this.writeReloadScript(strategy, version);
      instructions.push(`To use ${version} in this ${strategy.dialect} session, run: ${strategy.sourceCommand(reloadScript)}`);
      instructions.push(`Or paste: ${strategy.exportCommand(paths)}`);
      return { dialect: strategy.dialect, liveUpdated: false, verified: false, reloadScript, instructions };
    }

    const before = this.env.PATH ?? '';
    const searchPath = this.rebuild(before, [paths.binDir, paths.sbinDir], strategy.pathSeparator);
    this.env.PATH = searchPath;
    logger.debug(`PATH before: ${before}`);
    logger.debug(`PATH after: ${searchPath}`);

    const { resolvedBinary, verified } = await this.verify(searchPath, paths, strategy.pathSeparator);
    if (!verified) {
      logger.warn(
        resolvedBinary
          ? `php resolves to ${resolvedBinary}, expected it under ${paths.installDir}`
          : `No php binary found on the new PATH (expected ${paths.binDir}/php)`
      );
    }

    if (startupFile) {
      instructions.push(`To update your current shell, run: ${strategy.sourceCommand(startupFile)}`);
    }
    instructions.push(`Or paste: ${strategy.exportCommand(paths)}`);

    return {
      dialect: strategy.dialect,
      liveUpdated: true,
      searchPath,
      ...(resolvedBinary ? { resolvedBinary } : {}),
      verified,
      instructions,
    };
  }

  /**
   * Resolves `php` through `searchPath` and checks it lives in the install dir.
   */
  async verify(
    searchPath: string,
    paths: VersionPaths,
    separator = ':'
  ): Promise<{ resolvedBinary: string | null; verified: boolean }> {
    const resolvedBinary = await FileSystem.which('php', searchPath, separator);
    if (!resolvedBinary) {
      return { resolvedBinary: null, verified: false };
    }

    if (PathValidator.isWithin(resolvedBinary, paths.installDir)) {
      return { resolvedBinary, verified: true };
    }

    try {
      const [realBinary, realInstallDir] = await Promise.all([
        fs.realpath(resolvedBinary),
        fs.realpath(paths.installDir),
      ]);
      return { resolvedBinary, verified: PathValidator.isWithin(realBinary, realInstallDir) };
    } catch {
      return { resolvedBinary, verified: false };
    }
  }

  async writeReloadScript(strategy: ShellDialectStrategy, version: VersionIdentifier): Promise<string> {
    const scriptPath = path.join(
      this.scriptDir,
      `phpswitch_reload_${Date.now()}${strategy.reloadScriptExtension}`
    );

    try {
      await FileSystem.writeFileAtomic(
        scriptPath,
        strategy.renderReloadScript(version, this.versionPaths(version)),
        { mode: 0o755 }
      );
    } catch (error) {
      throw new FileSystemError(`Failed to write reload script: ${errorMessage(error)}`, scriptPath);
    }

    logger.debug(`Wrote reload script ${scriptPath}`);
    return scriptPath;
  }
}
