import { BackupSnapshot, PathUpdateResult, StartupFile } from '../types/Shell';
import { VersionIdentifier } from '../types/Version';
import { HomebrewClient } from './brew/HomebrewClient';
import { HomebrewLayout } from './brew/HomebrewLayout';
import { RetryExecutor } from './brew/RetryExecutor';
import { FpmRestartResult, FpmServiceManager } from './FpmServiceManager';
import { BackupRotator } from './shell/BackupRotator';
import { ManagedBlockPatcher } from './shell/ManagedBlockPatcher';
import { PathReconstructor } from './shell/PathReconstructor';
import { ShellDialectRegistry } from './shell/ShellDialectRegistry';
import { ShellProfileLocator } from './shell/ShellProfileLocator';
import { ValidationError, errorMessage } from '../utils/errors';
import { StatusKind, logger } from '../utils/Logger';

export interface SwitchOptions {
  /** Install the version first when it is missing */
  installIfMissing: boolean;
  /** Rewrite the managed block in the startup file */
  updateProfile: boolean;
  /** Rebuild PATH for this process (or write a reload script); on unless false */
  updatePath?: boolean;
}

export interface StatusLine {
  kind: StatusKind;
  message: string;
}

export interface SwitchReport {
  version: VersionIdentifier;
  previous: VersionIdentifier | null;
  installed: boolean;
  profile?: StartupFile;
  backup?: BackupSnapshot | null;
  fpm?: FpmRestartResult;
  pathUpdate?: PathUpdateResult;
  lines: StatusLine[];
}

export interface VersionSwitcherDeps {
  brew: HomebrewClient;
  locator: ShellProfileLocator;
  backups: BackupRotator;
  patcher: ManagedBlockPatcher;
  reconstructor: PathReconstructor;
  fpm: FpmServiceManager;
  executor: RetryExecutor;
}

/**
 * Makes one version the active one: brew links, the startup file, PHP-FPM
 * and the PATH of this process.
 */
export class VersionSwitcher {
  constructor(private readonly deps: VersionSwitcherDeps) {}

  async switchTo(version: VersionIdentifier, options: SwitchOptions): Promise<SwitchReport> {
    const { brew, locator, backups, patcher, reconstructor, fpm } = this.deps;
    const lines: StatusLine[] = [];
    const formula = HomebrewLayout.formulaFor(version);

    let installed = false;
    if (!(await brew.isInstalled(version))) {
      if (!options.installIfMissing) {
        throw new ValidationError(
          `${version} is not installed`,
          'invalid-value',
          `Run 'phpswitch install ${version}' or pass --force to install it first`
        );
      }
      await this.install(version);
      installed = true;
      lines.push({ kind: 'success', message: `${version} installed` });
    }

    const previous = await brew.currentLinked();
    if (previous && previous !== version) {
      try {
        await brew.unlink(previous);
        lines.push({ kind: 'info', message: `Unlinked ${previous}` });
      } catch (error) {
        lines.push({ kind: 'warning', message: `Could not unlink ${previous}: ${errorMessage(error)}` });
      }
    }

    await this.deps.executor.run({
      label: `Link ${version}`,
      command: `brew link --force --overwrite ${formula}`,
      strategies: [
        { name: 'link --force', run: () => brew.link(version, ['--force']) },
        { name: 'link --force --overwrite', run: () => brew.link(version, ['--force', '--overwrite']) },
      ],
    });
    lines.push({ kind: 'success', message: `Linked ${version}` });

    const dialect = locator.detectDialect();
    const strategy = ShellDialectRegistry.get(dialect);
    let profile: StartupFile | undefined;
    let backup: BackupSnapshot | null | undefined;

    if (options.updateProfile) {
      profile = await locator.resolveProfile(dialect);
      backup = await backups.snapshot(profile.path);
      await patcher.apply(profile.path, {
        header: `Path configuration for PHP version: ${version}`,
        body: strategy.renderPathBlock(reconstructor.versionPaths(version)),
      });
      lines.push({ kind: 'success', message: `Updated ${profile.path}` });
    }

    let fpmResult: FpmRestartResult | undefined;
    try {
      fpmResult = await fpm.restart(version);
      for (const service of fpmResult.stopped) {
        lines.push({ kind: 'info', message: `Stopped PHP-FPM service ${service}` });
      }
      if (fpmResult.restarted) {
        lines.push({ kind: 'success', message: `Restarted PHP-FPM service ${formula}` });
      }
    } catch (error) {
      lines.push({ kind: 'warning', message: `PHP-FPM was not restarted: ${errorMessage(error)}` });
    }

    let pathUpdate: PathUpdateResult | undefined;
    if (options.updatePath !== false) {
      pathUpdate = await reconstructor.apply(strategy, version, profile?.path);
    }
    if (pathUpdate?.liveUpdated) {
      lines.push(
        pathUpdate.verified
          ? { kind: 'success', message: `php now resolves to ${pathUpdate.resolvedBinary ?? formula}` }
          : { kind: 'warning', message: `Could not confirm that php resolves to ${version}` }
      );
    }

    logger.debug(`Switched from ${previous ?? 'nothing'} to ${version}`);

    return {
      version,
      previous,
      installed,
      ...(profile ? { profile } : {}),
      ...(backup !== undefined ? { backup } : {}),
      ...(fpmResult ? { fpm: fpmResult } : {}),
      ...(pathUpdate ? { pathUpdate } : {}),
      lines,
    };
  }

  async install(version: VersionIdentifier): Promise<void> {
    const { brew } = this.deps;
    const formula = HomebrewLayout.formulaFor(version);

    await this.deps.executor.run({
      label: `Install ${version}`,
      command: `brew install ${formula}`,
      strategies: [
        { name: 'install', run: () => brew.install(version) },
        {
          name: 'reinstall',
          run: () => brew.reinstall(version),
          confirm: `Installing ${formula} failed. Try 'brew reinstall ${formula}'?`,
        },
      ],
      manualHint: `Run 'brew install ${formula}' and check its output`,
    });
  }

  async uninstall(version: VersionIdentifier, force: boolean): Promise<StatusLine[]> {
    const { brew } = this.deps;
    const formula = HomebrewLayout.formulaFor(version);
    const lines: StatusLine[] = [];

    if (!(await brew.isInstalled(version))) {
      throw new ValidationError(`${version} is not installed`, 'invalid-value');
    }

    if ((await brew.currentLinked()) === version) {
      await brew.unlink(version);
      lines.push({ kind: 'warning', message: `${version} was the active version and has been unlinked` });
    }

    await this.deps.executor.run({
      label: `Uninstall ${version}`,
      command: `brew uninstall --force ${formula}`,
      strategies: [
        { name: 'uninstall', run: () => brew.uninstall(version, force) },
        {
          name: 'uninstall --force',
          run: () => brew.uninstall(version, true),
          confirm: `Uninstalling ${formula} failed. Force it?`,
        },
      ],
    });
    lines.push({ kind: 'success', message: `${version} uninstalled` });

    try {
      await brew.cleanup(version);
    } catch (error) {
      lines.push({ kind: 'warning', message: `brew cleanup failed: ${errorMessage(error)}` });
    }

    return lines;
  }
}
