import * as fs from 'fs-extra';
import * as path from 'path';
import { BackupSnapshot } from '../../types/Shell';
import { PathValidator } from '../../utils/PathValidator';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export interface BackupRotatorOptions {
  enabled: boolean;
  maxBackups: number;
  /** Backups must resolve inside this tree (the user's home) */
  root: string;
  now?: () => Date;
}

const BACKUP_INFIX = '.bak.';

/**
 * Snapshots startup files before phpswitch rewrites them, keeping the newest few.
 */
export class BackupRotator {
  constructor(private readonly options: BackupRotatorOptions) {}

  async snapshot(file: string): Promise<BackupSnapshot | null> {
    if (!this.options.enabled) {
      logger.debug('Backups are disabled, skipping snapshot');
      return null;
    }

    if (!(await fs.pathExists(file))) {
      return null;
    }

    const createdAt = this.options.now ? this.options.now() : new Date();
    let destination: string;
    try {
      destination = PathValidator.validate(await this.nextBackupPath(file, createdAt), this.options.root);
    } catch (error) {
      logger.error(`Invalid backup path, skipping backup of ${file}`, error);
      return null;
    }

    // A symlinked startup file is backed up as the content it points at
    try {
      const source = await fs.realpath(file);
      await fs.copy(source, destination, { overwrite: false, errorOnExist: true });
    } catch (error) {
      logger.error(`Failed to back up ${file}`, error);
      return null;
    }

    try {
      await fs.chmod(destination, 0o600);
    } catch (error) {
      logger.warn(`Could not restrict permissions on ${destination}`, error);
    }

    logger.info(`Created backup at ${destination}`);
    await this.prune(file, this.options.maxBackups);

    return { path: destination, source: file, createdAt };
  }

  /**
   * Deletes all but the newest `maxCount` backups of `filePrefix`. Returns the
   * deleted paths.
   */
  async prune(filePrefix: string, maxCount: number): Promise<string[]> {
    const backups = await this.list(filePrefix);
    const excess = backups.slice(0, Math.max(0, backups.length - maxCount));
    const removed: string[] = [];

    for (const backup of excess) {
      try {
        await fs.remove(backup.path);
        removed.push(backup.path);
        logger.debug(`Removed old backup ${backup.path}`);
      } catch (error) {
        logger.warn(`Failed to remove old backup ${backup.path}: ${errorMessage(error)}`);
      }
    }

    return removed;
  }

  /**
   * Existing backups of `filePrefix`, oldest first.
   */
  async list(filePrefix: string): Promise<Array<{ path: string; modifiedAt: Date }>> {
    const dir = path.dirname(filePrefix);
    const prefix = `${path.basename(filePrefix)}${BACKUP_INFIX}`;

    let entries: string[];
    try {
      entries = await fs.readdir(dir);
    } catch {
      return [];
    }

    const backups = await Promise.all(
      entries
        .filter(entry => entry.startsWith(prefix))
        .map(async entry => {
          const fullPath = path.join(dir, entry);
          const stat = await fs.stat(fullPath);
          return { path: fullPath, modifiedAt: stat.mtime, isFile: stat.isFile() };
        })
    );

    return backups
      .filter(backup => backup.isFile)
      .sort(
        (a, b) =>
          a.modifiedAt.getTime() - b.modifiedAt.getTime() ||
          (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
      )
      .map(({ path: backupPath, modifiedAt }) => ({ path: backupPath, modifiedAt }));
  }

  private async nextBackupPath(file: string, at: Date): Promise<string> {
    const base = `${file}${BACKUP_INFIX}${BackupRotator.timestamp(at)}`;
    let candidate = base;

    for (let attempt = 1; await fs.pathExists(candidate); attempt++) {
      candidate = `${base}-${String(attempt).padStart(2, '0')}`;
    }

    return candidate;
  }

  /**
   * YYYYMMDDHHmmssSSS in local time; sorts lexically in creation order.
   */
  static timestamp(at: Date): string {
    const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
    return (
      `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}` +
      `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}${pad(at.getMilliseconds(), 3)}`
    );
  }
}
