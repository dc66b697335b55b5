import * as fs from 'fs-extra';
import * as path from 'path';
import { ShellDialect, StartupFile } from '../../types/Shell';
import { ShellDialectRegistry } from './ShellDialectRegistry';
import { FileSystem } from '../../utils/FileSystem';
import { FileSystemError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export interface ShellProfileLocatorOptions {
  homeDir: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Works out which shell the user runs and which startup file phpswitch owns for it.
 */
export class ShellProfileLocator {
  private readonly homeDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;

  constructor(options: ShellProfileLocatorOptions) {
    this.homeDir = options.homeDir;
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  detectDialect(): ShellDialect {
    // Version variables are only present inside the shell that set them
    if (this.env.ZSH_VERSION) return 'zsh';
    if (this.env.BASH_VERSION) return 'bash';
    if (this.env.FISH_VERSION) return 'fish';

    const loginShell = this.env.SHELL;
    if (loginShell) {
      const name = path.basename(loginShell);
      if (ShellDialectRegistry.isSupported(name) && name !== 'unknown') {
        return name;
      }
      logger.debug(`Unrecognized login shell ${loginShell}, treating it as a plain sh`);
      return 'unknown';
    }

    // macOS has defaulted to zsh since Catalina
    return this.platform === 'darwin' ? 'zsh' : 'bash';
  }

  async resolveProfile(dialect: ShellDialect = this.detectDialect()): Promise<StartupFile> {
    const candidates = ShellDialectRegistry.get(dialect).startupCandidates(this.homeDir);

    for (const candidate of candidates) {
      if (await FileSystem.isFile(candidate)) {
        logger.debug(`Using ${candidate} for ${dialect}`);
        return {
          path: candidate,
          dialect,
          exists: true,
          writable: await FileSystem.isWritable(candidate),
          created: false,
        };
      }
    }

    const target = candidates[candidates.length - 1];
    await this.createEmpty(target);

    return { path: target, dialect, exists: true, writable: true, created: true };
  }

  private async createEmpty(filePath: string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, '', { flag: 'wx' });
      logger.info(`Created ${filePath}`);
    } catch (error) {
      throw new FileSystemError(
        `Could not create startup file ${filePath}: ${errorMessage(error)}`,
        filePath,
        `Create ${filePath} yourself or check the permissions of ${path.dirname(filePath)}`
      );
    }
  }
}
