import * as path from 'path';
import { ValidationError } from './errors';

const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export class PathValidator {
  static hasControlCharacters(value: string): boolean {
    return CONTROL_CHARACTERS.test(value);
  }

  /**
   * Rejects paths with control characters or `..` segments, and, when `root`
   * is given, paths that resolve outside of it.
   */
  static validate(candidate: string, root?: string): string {
    if (!candidate) {
      throw new ValidationError('Path is empty', 'invalid-value');
    }

    if (PathValidator.hasControlCharacters(candidate)) {
      throw new ValidationError(`Path contains control characters: ${JSON.stringify(candidate)}`, 'control-characters');
    }

    if (candidate.split(/[\\/]/).includes('..')) {
      throw new ValidationError(`Path contains a traversal sequence: ${candidate}`, 'traversal');
    }

    const resolved = path.resolve(candidate);

    if (root !== undefined && !PathValidator.isWithin(resolved, root)) {
      throw new ValidationError(`Path ${resolved} is outside ${path.resolve(root)}`, 'outside-root');
    }

    return resolved;
  }

  static isWithin(candidate: string, root: string): boolean {
    const relative = path.relative(path.resolve(root), path.resolve(candidate));
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
  }
}
