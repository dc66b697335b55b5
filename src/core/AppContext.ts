import * as os from 'os';
import { PhpSwitchConfig } from '../types/Config';
import { ConfigManager } from './ConfigManager';
import { AutoSwitchInstaller } from './AutoSwitchInstaller';
import { ExtensionManager } from './ExtensionManager';
import { FpmServiceManager } from './FpmServiceManager';
import { VersionSwitcher } from './VersionSwitcher';
import { HomebrewClient } from './brew/HomebrewClient';
import { HomebrewLayout } from './brew/HomebrewLayout';
import { RetryExecutor } from './brew/RetryExecutor';
import { BackupRotator } from './shell/BackupRotator';
import { ManagedBlockPatcher, PATH_BLOCK_MARKERS } from './shell/ManagedBlockPatcher';
import { PathReconstructor } from './shell/PathReconstructor';
import { ShellProfileLocator } from './shell/ShellProfileLocator';
import { DirectoryCache } from './version/DirectoryCache';
import { ProjectVersionResolver } from './version/ProjectVersionResolver';
import { VersionCache } from './version/VersionCache';
import { ConfirmFn, declineAll } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/Logger';

export interface AppContextOptions {
  configManager?: ConfigManager;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  confirm?: ConfirmFn;
  brew?: HomebrewClient;
  /** Where reload scripts go; the OS temp dir by default */
  scriptDir?: string;
  /** Cache location used when the configured one is not writable */
  fallbackCacheDir?: string;
}

/**
 * Every component wired from one loaded configuration.
 */
export class AppContext {
  private constructor(
    readonly config: PhpSwitchConfig,
    readonly configManager: ConfigManager,
    readonly homeDir: string,
    readonly env: NodeJS.ProcessEnv,
    readonly brew: HomebrewClient,
    readonly locator: ShellProfileLocator,
    readonly backups: BackupRotator,
    readonly patcher: ManagedBlockPatcher,
    readonly reconstructor: PathReconstructor,
    readonly executor: RetryExecutor,
    readonly fpm: FpmServiceManager,
    readonly switcher: VersionSwitcher,
    readonly versionCache: VersionCache,
    readonly resolver: ProjectVersionResolver,
    readonly directoryCache: DirectoryCache,
    readonly autoSwitch: AutoSwitchInstaller,
    readonly extensions: ExtensionManager
  ) {}

  static async create(options: AppContextOptions = {}): Promise<AppContext> {
    const configManager = options.configManager ?? ConfigManager.getInstance();
    const config = await configManager.load();
    const homeDir = options.homeDir ?? os.homedir();
    const env = options.env ?? process.env;
    const platform = options.platform ?? process.platform;

    const brew =
      options.brew ??
      new HomebrewClient(config.homebrewPrefix ?? HomebrewLayout.defaultPrefix(env, platform));
    const locator = new ShellProfileLocator({ homeDir, env, platform });
    const backups = new BackupRotator({
      enabled: config.backupEnabled,
      maxBackups: config.maxBackups,
      root: homeDir,
    });
    const patcher = new ManagedBlockPatcher(PATH_BLOCK_MARKERS);
    const reconstructor = new PathReconstructor({
      layout: brew.layout,
      env,
      ...(options.scriptDir ? { scriptDir: options.scriptDir } : {}),
    });
    const executor = new RetryExecutor(options.confirm ?? declineAll);
    const fpm = new FpmServiceManager(brew, executor, { autoRestart: config.autoRestart });
    const switcher = new VersionSwitcher({ brew, locator, backups, patcher, reconstructor, fpm, executor });

    const cacheDir = configManager.cacheDir(config);
    const versionCache = new VersionCache({
      cacheDir,
      ttlMs: config.cacheTtlSeconds * 1000,
      timeoutMs: config.searchTimeoutSeconds * 1000,
      source: brew,
      ...(options.fallbackCacheDir ? { fallbackDir: options.fallbackCacheDir } : {}),
    });
    const resolver = new ProjectVersionResolver(async () => {
      try {
        return await brew.listInstalled();
      } catch (error) {
        logger.warn(`Could not list installed versions: ${errorMessage(error)}`);
        return [];
      }
    });
    const directoryCache = new DirectoryCache(cacheDir);
    const autoSwitch = new AutoSwitchInstaller({ locator, backups, config: configManager });

    return new AppContext(
      config,
      configManager,
      homeDir,
      env,
      brew,
      locator,
      backups,
      patcher,
      reconstructor,
      executor,
      fpm,
      switcher,
      versionCache,
      resolver,
      directoryCache,
      autoSwitch,
      new ExtensionManager(brew.layout)
    );
  }
}
