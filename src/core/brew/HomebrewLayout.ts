import * as path from 'path';
import { VersionPaths } from '../../types/Shell';
import { VersionIdentifier } from '../../types/Version';

/**
 * Where Homebrew puts things under its prefix.
 */
export class HomebrewLayout {
  constructor(readonly prefix: string) {}

  static defaultPrefix(
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform,
    arch: string = process.arch
  ): string {
    if (env.HOMEBREW_PREFIX) {
      return env.HOMEBREW_PREFIX;
    }
    if (platform === 'darwin') {
      return arch === 'arm64' ? '/opt/homebrew' : '/usr/local';
    }
    return '/home/linuxbrew/.linuxbrew';
  }

  /**
   * Formula name for a version; the unversioned install is plain `php`.
   */
  static formulaFor(version: VersionIdentifier): string {
    return version === 'php@default' ? 'php' : version;
  }

  pathsFor(version: VersionIdentifier): VersionPaths {
    const installDir = path.join(this.prefix, 'opt', HomebrewLayout.formulaFor(version));
    return {
      installDir,
      binDir: path.join(installDir, 'bin'),
      sbinDir: path.join(installDir, 'sbin'),
    };
  }

  phpBinary(version: VersionIdentifier): string {
    return path.join(this.pathsFor(version).binDir, 'php');
  }

  /**
   * php.ini and conf.d for a version. The unversioned formula uses `etc/php` itself.
   */
  iniDir(version: VersionIdentifier): string {
    const etc = path.join(this.prefix, 'etc', 'php');
    return version === 'php@default' ? etc : path.join(etc, version.slice('php@'.length));
  }

  /** The `php` symlink `brew link` maintains */
  linkedBinary(): string {
    return path.join(this.prefix, 'bin', 'php');
  }
}
