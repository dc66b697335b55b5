import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import { FileSystemError, errorMessage } from './errors';

export class FileSystem {
  /**
   * Directories from `startPath` up to the filesystem root, closest first.
   */
  static ancestors(startPath: string): string[] {
    let currentPath = path.resolve(startPath);
    const root = path.parse(currentPath).root;
    const chain: string[] = [currentPath];

    while (currentPath !== root) {
      currentPath = path.dirname(currentPath);
      chain.push(currentPath);
    }

    return chain;
  }

  static async isFile(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  static async isDirectory(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  static async isWritable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  static async isExecutable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.F_OK | fs.constants.X_OK);
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }

  static async readJsonFile(filePath: string): Promise<unknown> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }

    try {
      const content = await fs.readFile(filePath, 'utf8');
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new Error(`Failed to read JSON file ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Replaces `filePath` with `content` through a temp file in the same directory
   * and a rename, so readers see either the old or the new file and never a
   * truncated one.
   */
  static async writeFileAtomic(
    filePath: string,
    content: string,
    options: { mode?: number } = {}
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const tempPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`
    );

    try {
      await fs.ensureDir(dir);
      await fs.writeFile(tempPath, content, 'utf8');
      if (options.mode !== undefined) {
        await fs.chmod(tempPath, options.mode);
      }
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.remove(tempPath).catch(() => undefined);
      throw new FileSystemError(`Failed to write ${filePath}: ${errorMessage(error)}`, filePath);
    }
  }

  static async deleteFile(filePath: string): Promise<boolean> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
        return true;
      }
      return false;
    } catch (error) {
      throw new FileSystemError(`Failed to delete file ${filePath}: ${errorMessage(error)}`, filePath);
    }
  }

  static async modifiedAt(filePath: string): Promise<Date | null> {
    try {
      return (await fs.stat(filePath)).mtime;
    } catch {
      return null;
    }
  }

  /**
   * Looks `command` up on a colon-separated search path the way a shell would.
   */
  static async which(command: string, searchPath: string, separator = ':'): Promise<string | null> {
    for (const dir of searchPath.split(separator)) {
      if (!dir) continue;
      const candidate = path.join(dir, command);
      if (await FileSystem.isExecutable(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  static async whichAll(command: string, searchPath: string, separator = ':'): Promise<string[]> {
    const found: string[] = [];
    for (const dir of searchPath.split(separator)) {
      if (!dir) continue;
      const candidate = path.join(dir, command);
      if ((await FileSystem.isExecutable(candidate)) && !found.includes(candidate)) {
        found.push(candidate);
      }
    }
    return found;
  }
}
