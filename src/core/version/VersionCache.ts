import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { VersionCacheEntry, VersionIdentifier } from '../../types/Version';
import { Versions } from './Versions';
import { FileSystem } from '../../utils/FileSystem';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export const CACHE_FILE = 'available_versions.cache';
export const FALLBACK_FILE = 'fallback_versions.cache';

export const BUILTIN_FALLBACK: readonly VersionIdentifier[] = [
  'php@7.4',
  'php@8.0',
  'php@8.1',
  'php@8.2',
  'php@8.3',
  'php@8.4',
  'php@default',
];

/**
 * Slow enumeration of installable versions. Must stop work when `signal` aborts.
 */
export interface AvailableVersionSource {
  searchAvailable(signal: AbortSignal): Promise<VersionIdentifier[]>;
}

export interface VersionCacheOptions {
  cacheDir: string;
  ttlMs: number;
  timeoutMs: number;
  source: AvailableVersionSource;
  /** Used when `cacheDir` cannot be written */
  fallbackDir?: string;
  now?: () => number;
}

/**
 * TTL cache in front of the package manager's search. Callers always get a
 * list back within the timeout: the cached one, a live one, or the fallback.
 */
export class VersionCache {
  private readonly fallbackDir: string;
  private readonly now: () => number;
  private inFlight: Promise<VersionCacheEntry> | null = null;
  private resolvedDir: string | null | undefined;

  constructor(private readonly options: VersionCacheOptions) {
    this.fallbackDir = options.fallbackDir ?? path.join(os.tmpdir(), 'phpswitch-cache');
    this.now = options.now ?? Date.now;
  }

  /**
   * Concurrent callers share one lookup.
   */
  getAvailable(): Promise<VersionCacheEntry> {
    if (!this.inFlight) {
      this.inFlight = this.load().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  async invalidate(): Promise<boolean> {
    const dirs = new Set([this.options.cacheDir, this.fallbackDir]);
    let removed = false;
    for (const dir of dirs) {
      try {
        removed = (await FileSystem.deleteFile(path.join(dir, CACHE_FILE))) || removed;
      } catch (error) {
        logger.warn(`Could not remove version cache in ${dir}: ${errorMessage(error)}`);
      }
    }
    return removed;
  }

  async forceRefresh(): Promise<VersionCacheEntry> {
    await this.invalidate();
    return this.getAvailable();
  }

  /**
   * Directory the cache currently lives in, or null when nothing is writable.
   */
  async location(): Promise<string | null> {
    if (this.resolvedDir === undefined) {
      this.resolvedDir = await this.pickDir();
    }
    return this.resolvedDir;
  }

  private async load(): Promise<VersionCacheEntry> {
    const cached = await this.readFresh();
    if (cached) {
      logger.debug(`Using cached version list (${cached.versions.length} entries)`);
      return cached;
    }
    return this.refresh();
  }

  private async readFresh(): Promise<VersionCacheEntry | null> {
    const dir = await this.location();
    if (!dir) {
      return null;
    }

    const file = path.join(dir, CACHE_FILE);
    const modified = await FileSystem.modifiedAt(file);
    if (!modified || this.now() - modified.getTime() >= this.options.ttlMs) {
      return null;
    }

    try {
      const versions = Versions.parseList(await fs.readFile(file, 'utf8'));
      return versions.length > 0 ? { versions, fetchedAt: modified, source: 'cache' } : null;
    } catch (error) {
      logger.debug(`Ignoring unreadable cache ${file}`, error);
      return null;
    }
  }

  private async refresh(): Promise<VersionCacheEntry> {
    const live = await this.searchWithTimeout();
    const fetchedAt = new Date(this.now());

    if (live && live.length > 0) {
      const versions = Versions.sort(live);
      await this.persist(CACHE_FILE, versions);
      await this.persist(FALLBACK_FILE, versions);
      return { versions, fetchedAt, source: 'live' };
    }

    const versions = await this.fallbackList();
    await this.persist(CACHE_FILE, versions);
    return { versions, fetchedAt, source: 'fallback' };
  }

  private async searchWithTimeout(): Promise<VersionIdentifier[] | null> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<null>(resolve => {
      timer = setTimeout(() => {
        logger.warn(`Version search took longer than ${this.options.timeoutMs}ms, using fallback list`);
        controller.abort();
        resolve(null);
      }, this.options.timeoutMs);
    });

    const search = this.options.source.searchAvailable(controller.signal).catch((error: unknown) => {
      if (!controller.signal.aborted) {
        logger.warn(`Version search failed: ${errorMessage(error)}`);
      }
      return null;
    });

    try {
      return await Promise.race([search, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async fallbackList(): Promise<VersionIdentifier[]> {
    const dir = await this.location();
    if (dir) {
      try {
        const file = path.join(dir, FALLBACK_FILE);
        if (await fs.pathExists(file)) {
          const versions = Versions.parseList(await fs.readFile(file, 'utf8'));
          if (versions.length > 0) {
            return versions;
          }
        }
      } catch (error) {
        logger.debug('Ignoring unreadable fallback list', error);
      }
    }
    return [...BUILTIN_FALLBACK];
  }

  private async persist(name: string, versions: VersionIdentifier[]): Promise<void> {
    const content = `${versions.join('\n')}\n`;
    let dir = await this.location();

    while (dir) {
      try {
        await FileSystem.writeFileAtomic(path.join(dir, name), content);
        return;
      } catch (error) {
        logger.warn(`Could not write ${name} in ${dir}: ${errorMessage(error)}`);
        dir = dir === this.fallbackDir ? null : await this.usableDir(this.fallbackDir);
        this.resolvedDir = dir;
      }
    }

    logger.warn(`No writable cache directory, ${name} was not saved`);
  }

  private async pickDir(): Promise<string | null> {
    const primary = await this.usableDir(this.options.cacheDir);
    if (primary) {
      return primary;
    }
    logger.warn(`Cache directory ${this.options.cacheDir} is not writable, using ${this.fallbackDir}`);
    return this.usableDir(this.fallbackDir);
  }

  private async usableDir(dir: string): Promise<string | null> {
    try {
      await fs.ensureDir(dir);
      return (await FileSystem.isWritable(dir)) ? dir : null;
    } catch (error) {
      logger.debug(`Cannot use ${dir}`, error);
      return null;
    }
  }
}
