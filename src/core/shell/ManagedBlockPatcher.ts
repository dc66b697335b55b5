import * as fs from 'fs-extra';
import { ManagedBlockContent, MarkerPair } from '../../types/Shell';
import { FileSystem } from '../../utils/FileSystem';
import { CorruptionError, FileSystemError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/Logger';

export const PATH_BLOCK_MARKERS: MarkerPair = {
  begin: '# BEGIN PHPSWITCH MANAGED BLOCK - DO NOT EDIT MANUALLY',
  end: '# END PHPSWITCH MANAGED BLOCK',
};

export const AUTO_SWITCH_BLOCK_MARKERS: MarkerPair = {
  begin: '# BEGIN PHPSWITCH AUTO-SWITCH BLOCK - DO NOT EDIT MANUALLY',
  end: '# END PHPSWITCH AUTO-SWITCH BLOCK',
};

export const TIMESTAMP_PREFIX = '# Last updated: ';

interface BlockLocation {
  /** Offset of the begin marker */
  start: number;
  /** Offset just past the end marker and its terminating newline */
  stop: number;
  /** Offsets of the block body */
  bodyStart: number;
  bodyEnd: number;
}

/**
 * Owns one marker-delimited region of a text file. Everything outside the
 * markers is left byte-for-byte as it was.
 */
export class ManagedBlockPatcher {
  constructor(
    private readonly markers: MarkerPair = PATH_BLOCK_MARKERS,
    private readonly now: () => Date = () => new Date()
  ) {}

  async apply(file: string, block: ManagedBlockContent): Promise<void> {
    const target = await this.resolveTarget(file);
    const content = await this.readContent(target);
    const location = this.locate(content, target);
    const rendered = this.render(block);

    const next = location
      ? content.slice(0, location.start) + rendered + content.slice(location.stop)
      : rendered + content;

    await this.write(target, next);
    logger.debug(`${location ? 'Replaced' : 'Inserted'} managed block in ${target}`);
  }

  /**
   * Text between the markers (header comments included), or null when the file
   * has no block.
   */
  async read(file: string): Promise<string | null> {
    const target = await this.resolveTarget(file);
    if (!(await fs.pathExists(target))) {
      return null;
    }

    const content = await this.readContent(target);
    const location = this.locate(content, target);
    return location ? content.slice(location.bodyStart, location.bodyEnd) : null;
  }

  async remove(file: string): Promise<boolean> {
    const target = await this.resolveTarget(file);
    if (!(await fs.pathExists(target))) {
      return false;
    }

    const content = await this.readContent(target);
    const location = this.locate(content, target);
    if (!location) {
      return false;
    }

    await this.write(target, content.slice(0, location.start) + content.slice(location.stop));
    return true;
  }

  render(block: ManagedBlockContent): string {
    return [
      this.markers.begin,
      `# ${block.header}`,
      `${TIMESTAMP_PREFIX}${this.now().toISOString()}`,
      '',
      block.body.replace(/\n+$/, ''),
      this.markers.end,
      '',
    ].join('\n');
  }

  /**
   * Finds the block by marker offsets. A file is corrupt when the markers do not
   * form exactly one begin/end pair in that order.
   */
  locate(content: string, file: string): BlockLocation | null {
    const { begin, end } = this.markers;
    const start = content.indexOf(begin);
    const firstEnd = content.indexOf(end);

    if (start === -1) {
      if (firstEnd !== -1) {
        throw new CorruptionError(`Found '${end}' without a matching begin marker in ${file}`, file);
      }
      return null;
    }

    if (firstEnd !== -1 && firstEnd < start) {
      throw new CorruptionError(`Found '${end}' before '${begin}' in ${file}`, file);
    }

    const endAt = content.indexOf(end, start + begin.length);
    if (endAt === -1) {
      throw new CorruptionError(
        `Found '${begin}' but no '${end}' in ${file}; refusing to guess the block's extent`,
        file
      );
    }

    if (content.indexOf(begin, start + begin.length) !== -1) {
      throw new CorruptionError(`Found more than one phpswitch block in ${file}`, file);
    }

    let stop = endAt + end.length;
    if (content.startsWith('\r\n', stop)) {
      stop += 2;
    } else if (content[stop] === '\n') {
      stop += 1;
    }

    const bodyStart = this.skipLine(content, start + begin.length);
    return { start, stop, bodyStart, bodyEnd: Math.max(bodyStart, endAt) };
  }

  private skipLine(content: string, from: number): number {
    const newline = content.indexOf('\n', from);
    return newline === -1 ? content.length : newline + 1;
  }

  /**
   * Dotfile managers often symlink startup files; patch the file the link points to.
   */
  private async resolveTarget(file: string): Promise<string> {
    try {
      return await fs.realpath(file);
    } catch {
      return file;
    }
  }

  private async readContent(file: string): Promise<string> {
    try {
      return (await fs.pathExists(file)) ? await fs.readFile(file, 'utf8') : '';
    } catch (error) {
      throw new FileSystemError(`Failed to read ${file}: ${errorMessage(error)}`, file);
    }
  }

  private async write(file: string, content: string): Promise<void> {
    let mode: number | undefined;
    try {
      mode = (await fs.stat(file)).mode & 0o7777;
    } catch {
      mode = undefined;
    }

    await FileSystem.writeFileAtomic(file, content, { mode });
  }
}
