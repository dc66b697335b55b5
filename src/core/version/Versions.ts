import { VersionIdentifier } from '../../types/Version';

const IDENTIFIER_PATTERN = /^php@(\d+)\.(\d+)$/;

export const DEFAULT_VERSION: VersionIdentifier = 'php@default';

/**
 * Helpers for `php@X.Y` identifiers
 */
export class Versions {
  static isIdentifier(value: string): value is VersionIdentifier {
    return value === DEFAULT_VERSION || IDENTIFIER_PATTERN.test(value);
  }

  static of(major: number, minor: number): VersionIdentifier {
    return `php@${major}.${minor}`;
  }

  static parts(version: VersionIdentifier): { major: number; minor: number } | null {
    const match = IDENTIFIER_PATTERN.exec(version);
    return match ? { major: Number(match[1]), minor: Number(match[2]) } : null;
  }

  /**
   * `8.2` for `php@8.2`, `default` for `php@default`; the form written to
   * `.php-version`.
   */
  static short(version: VersionIdentifier): string {
    return version === DEFAULT_VERSION ? 'default' : version.slice('php@'.length);
  }

  /**
   * Numeric ordering; `php@default` sorts after every numbered version.
   */
  static compare(a: VersionIdentifier, b: VersionIdentifier): number {
    const left = Versions.parts(a);
    const right = Versions.parts(b);
    if (!left || !right) {
      return (left ? -1 : 1) - (right ? -1 : 1);
    }
    return left.major - right.major || left.minor - right.minor;
  }

  static sort(versions: Iterable<VersionIdentifier>): VersionIdentifier[] {
    return [...new Set(versions)].sort(Versions.compare);
  }

  /**
   * Keeps the lines that are valid identifiers.
   */
  static parseList(text: string): VersionIdentifier[] {
    return text
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(Versions.isIdentifier);
  }
}
