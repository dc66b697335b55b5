import { ShellDialect, StartupFile } from '../types/Shell';
import { ConfigManager } from './ConfigManager';
import { BackupRotator } from './shell/BackupRotator';
import { AUTO_SWITCH_BLOCK_MARKERS, ManagedBlockPatcher } from './shell/ManagedBlockPatcher';
import { ShellDialectRegistry } from './shell/ShellDialectRegistry';
import { ShellProfileLocator } from './shell/ShellProfileLocator';
import { ValidationError } from '../utils/errors';
import { logger } from '../utils/Logger';

export interface AutoSwitchInstallerDeps {
  locator: ShellProfileLocator;
  backups: BackupRotator;
  config: ConfigManager;
  patcher?: ManagedBlockPatcher;
  /** Command the hook runs */
  command?: string;
}

/**
 * Adds or removes the directory-change hook that runs `phpswitch auto`.
 */
export class AutoSwitchInstaller {
  private readonly patcher: ManagedBlockPatcher;
  private readonly command: string;

  constructor(private readonly deps: AutoSwitchInstallerDeps) {
    this.patcher = deps.patcher ?? new ManagedBlockPatcher(AUTO_SWITCH_BLOCK_MARKERS);
    this.command = deps.command ?? 'phpswitch';
  }

  async install(dialect: ShellDialect = this.deps.locator.detectDialect()): Promise<StartupFile> {
    const hook = ShellDialectRegistry.get(dialect).renderAutoSwitchHook({ command: this.command });
    if (hook === null) {
      throw new ValidationError(
        `Auto-switching is not supported for the ${dialect} shell`,
        'unsupported-shell',
        'Use bash, zsh or fish, or run `phpswitch project` by hand'
      );
    }

    const profile = await this.deps.locator.resolveProfile(dialect);
    await this.deps.backups.snapshot(profile.path);
    await this.patcher.apply(profile.path, { header: 'Switch PHP version on directory change', body: hook });
    await this.deps.config.update({ autoSwitch: true });

    logger.info(`Installed auto-switch hook in ${profile.path}`);
    return profile;
  }

  /**
   * Returns the startup file the hook was removed from, or null if there was none.
   */
  async uninstall(dialect: ShellDialect = this.deps.locator.detectDialect()): Promise<string | null> {
    const profile = await this.deps.locator.resolveProfile(dialect);
    const content = await this.patcher.read(profile.path);

    let removedFrom: string | null = null;
    if (content !== null) {
      await this.deps.backups.snapshot(profile.path);
      await this.patcher.remove(profile.path);
      removedFrom = profile.path;
    }

    await this.deps.config.update({ autoSwitch: false });
    return removedFrom;
  }

  async isInstalled(dialect: ShellDialect = this.deps.locator.detectDialect()): Promise<boolean> {
    const profile = await this.deps.locator.resolveProfile(dialect);
    return (await this.patcher.read(profile.path)) !== null;
  }
}
