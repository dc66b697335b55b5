import * as fs from 'fs-extra';
import * as path from 'path';
import { ProjectVersion, ProjectVersionSource, VersionIdentifier } from '../../types/Version';
import { DEFAULT_VERSION, Versions } from './Versions';
import { FileSystem } from '../../utils/FileSystem';
import { PathValidator } from '../../utils/PathValidator';
import { UnknownVersionFormatError, ValidationError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export const MARKER_FILES = ['.php-version', '.phpversion', '.php'] as const;
export const PROJECT_VERSION_FILE = '.php-version';
export const MAX_VERSION_LENGTH = 32;

export type InstalledVersionsProvider = () => Promise<VersionIdentifier[]>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Finds the PHP version a project asks for by walking up from a directory.
 *
 * Dedicated marker files anywhere up the tree take precedence over manifests;
 * only when none exists are composer.json and .tool-versions consulted, closest
 * directory first.
 */
export class ProjectVersionResolver {
  constructor(private readonly installed: InstalledVersionsProvider = async () => []) {}

  async resolve(startDir: string): Promise<ProjectVersion | null> {
    const start = await this.validateStart(startDir);
    const chain = FileSystem.ancestors(start);

    for (const dir of chain) {
      for (const name of MARKER_FILES) {
        const file = path.join(dir, name);
        if (await FileSystem.isFile(file)) {
          logger.debug(`Found PHP version file: ${file}`);
          const raw = (await fs.readFile(file, 'utf8')).replace(/\s+/g, '');
          return this.found('marker-file', file, raw);
        }
      }
    }

    for (const dir of chain) {
      const composerFile = path.join(dir, 'composer.json');
      if (await FileSystem.isFile(composerFile)) {
        const raw = await this.readComposer(composerFile);
        if (raw) {
          return this.found('composer', composerFile, raw);
        }
      }

      const toolVersionsFile = path.join(dir, '.tool-versions');
      if (await FileSystem.isFile(toolVersionsFile)) {
        const raw = ProjectVersionResolver.fromToolVersions(await fs.readFile(toolVersionsFile, 'utf8'));
        if (raw) {
          return this.found('tool-versions', toolVersionsFile, raw);
        }
      }
    }

    return null;
  }

  /**
   * Turns user or file input into a `php@X.Y` identifier.
   */
  async normalize(input: string, file?: string): Promise<VersionIdentifier> {
    const value = input.trim();

    if (value.length > MAX_VERSION_LENGTH) {
      throw new ValidationError(
        `Version string is longer than ${MAX_VERSION_LENGTH} characters`,
        'too-long'
      );
    }

    if (PathValidator.hasControlCharacters(value)) {
      throw new ValidationError('Version string contains control characters', 'control-characters');
    }

    if (Versions.isIdentifier(value)) {
      return value;
    }

    if (value === 'default') {
      return DEFAULT_VERSION;
    }

    const full = /^(\d+)\.(\d+)(?:\.\d+)?$/.exec(value);
    if (full) {
      return Versions.of(Number(full[1]), Number(full[2]));
    }

    if (/^\d+$/.test(value)) {
      return this.highestInstalledMinor(Number(value));
    }

    throw new UnknownVersionFormatError(value, file);
  }

  async setProjectVersion(dir: string, version: VersionIdentifier): Promise<string> {
    const file = path.join(await this.validateStart(dir), PROJECT_VERSION_FILE);
    await FileSystem.writeFileAtomic(file, `${Versions.short(version)}\n`);
    logger.info(`Wrote ${file}`);
    return file;
  }

  /**
   * Version a composer.json pins: the platform override if present, else the
   * lower bound of the `require.php` constraint.
   */
  static fromComposer(manifest: unknown): string | null {
    if (!isRecord(manifest)) {
      return null;
    }

    const config = manifest.config;
    if (isRecord(config) && isRecord(config.platform) && typeof config.platform.php === 'string') {
      const platform = ProjectVersionResolver.lowerBound(config.platform.php);
      if (platform) {
        return platform;
      }
    }

    const requirements = manifest.require;
    if (isRecord(requirements) && typeof requirements.php === 'string') {
      return ProjectVersionResolver.lowerBound(requirements.php);
    }

    return null;
  }

  /**
   * Highest lower bound across `||` alternatives: `^7.4 || ^8.1` gives `8.1`.
   */
  static lowerBound(constraint: string): string | null {
    let best: { text: string; parts: number[] } | null = null;

    for (const alternative of constraint.split('||')) {
      const match = /(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(alternative);
      if (!match) continue;

      const parts = match.slice(1).filter(part => part !== undefined).map(Number);
      if (!best || ProjectVersionResolver.compareParts(parts, best.parts) > 0) {
        best = { text: match[0], parts };
      }
    }

    return best ? best.text : null;
  }

  static fromToolVersions(content: string): string | null {
    for (const line of content.split(/\r?\n/)) {
      const tokens = line.trim().split(/\s+/);
      if (tokens[0] === 'php' && tokens.length > 1) {
        return tokens[1];
      }
    }
    return null;
  }

  private static compareParts(a: number[], b: number[]): number {
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0);
      if (diff !== 0) return diff;
    }
    return 0;
  }

  private async found(source: ProjectVersionSource, file: string, raw: string): Promise<ProjectVersion> {
    const version = await this.normalize(raw, file);
    return { version, source, file, raw };
  }

  private async readComposer(file: string): Promise<string | null> {
    let manifest: unknown;
    try {
      manifest = await FileSystem.readJsonFile(file);
    } catch (error) {
      throw new ValidationError(
        `Could not parse ${file}: ${errorMessage(error)}`,
        'malformed-manifest',
        'Fix the JSON syntax or add a .php-version file next to it'
      );
    }
    return ProjectVersionResolver.fromComposer(manifest);
  }

  private async highestInstalledMinor(major: number): Promise<VersionIdentifier> {
    let best: VersionIdentifier | null = null;

    for (const version of await this.installed()) {
      const parts = Versions.parts(version);
      if (parts && parts.major === major && (!best || Versions.compare(version, best) > 0)) {
        best = version;
      }
    }

    return best ?? Versions.of(major, 0);
  }

  private async validateStart(dir: string): Promise<string> {
    if (PathValidator.hasControlCharacters(dir)) {
      throw new ValidationError('Directory name contains control characters', 'control-characters');
    }

    const resolved = path.resolve(dir);
    if (!(await FileSystem.isDirectory(resolved))) {
      throw new ValidationError(`${resolved} is not a directory`, 'not-a-directory');
    }

    return resolved;
  }
}
