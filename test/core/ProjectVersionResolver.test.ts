import { ProjectVersionResolver, MAX_VERSION_LENGTH } from '../../src/core/version/ProjectVersionResolver';
import { VersionIdentifier } from '../../src/types/Version';
import { UnknownVersionFormatError, ValidationError } from '../../src/utils/errors';
import { createTempDir, cleanupTempDir, writeFile } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('ProjectVersionResolver', () => {
  let tempDir: string;
  let resolver: ProjectVersionResolver;

  beforeEach(async () => {
    tempDir = await createTempDir();
    resolver = new ProjectVersionResolver();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('resolve', () => {
    it('should prefer a marker file higher up over a closer composer.json', async () => {
      await writeFile(tempDir, '.php-version', '8.3\n');
      await writeFile(tempDir, 'proj/composer.json', JSON.stringify({ require: { php: '^8.1' } }));
      const sub = path.join(tempDir, 'proj', 'sub');
      await fs.ensureDir(sub);

      const result = await resolver.resolve(sub);

      expect(result).toEqual({
        version: 'php@8.3',
        source: 'marker-file',
        file: path.join(tempDir, '.php-version'),
        raw: '8.3',
      });
    });

    it('should check marker files in order within a directory', async () => {
      await writeFile(tempDir, '.phpversion', '7.4');
      await writeFile(tempDir, '.php-version', '8.2');

      const result = await resolver.resolve(tempDir);

      expect(result?.file).toBe(path.join(tempDir, '.php-version'));
      expect(result?.version).toBe('php@8.2');
    });

    it('should strip all whitespace from a marker file', async () => {
      await writeFile(tempDir, '.php', '  8 .1 \r\n');

      expect((await resolver.resolve(tempDir))?.version).toBe('php@8.1');
    });

    it('should read the lower bound of composer.json require.php', async () => {
      await writeFile(tempDir, 'composer.json', JSON.stringify({ require: { php: '>=7.4 || ^8.1' } }));

      const result = await resolver.resolve(tempDir);

      expect(result).toMatchObject({ version: 'php@8.1', source: 'composer', raw: '8.1' });
    });

    it('should prefer a composer platform override', async () => {
      await writeFile(
        tempDir,
        'composer.json',
        JSON.stringify({ require: { php: '^8.0' }, config: { platform: { php: '8.2.10' } } })
      );

      const result = await resolver.resolve(tempDir);

      expect(result).toMatchObject({ version: 'php@8.2', raw: '8.2.10' });
    });

    it('should fall through a composer.json without a php requirement to .tool-versions', async () => {
      await writeFile(tempDir, 'composer.json', JSON.stringify({ require: { 'monolog/monolog': '^3.0' } }));
      await writeFile(tempDir, '.tool-versions', 'nodejs 20.11.0\nphp 8.3.4\n');

      const result = await resolver.resolve(tempDir);

      expect(result).toMatchObject({
        version: 'php@8.3',
        source: 'tool-versions',
        file: path.join(tempDir, '.tool-versions'),
      });
    });

    it('should take the closest manifest when there is no marker file', async () => {
      await writeFile(tempDir, 'composer.json', JSON.stringify({ require: { php: '^7.4' } }));
      await writeFile(tempDir, 'app/.tool-versions', 'php 8.2\n');

      expect((await resolver.resolve(path.join(tempDir, 'app')))?.version).toBe('php@8.2');
    });

    it('should return null when nothing declares a version', async () => {
      const dir = path.join(tempDir, 'empty');
      await fs.ensureDir(dir);

      expect(await resolver.resolve(dir)).toBeNull();
    });

    it('should reject a marker file with control characters', async () => {
      await writeFile(tempDir, '.php-version', '8.2\u0007');

      await expect(resolver.resolve(tempDir)).rejects.toMatchObject({
        name: 'ValidationError',
        reason: 'control-characters',
      });
    });

    it('should reject an oversized marker file', async () => {
      await writeFile(tempDir, '.php-version', '8'.repeat(MAX_VERSION_LENGTH + 1));

      await expect(resolver.resolve(tempDir)).rejects.toMatchObject({ reason: 'too-long' });
    });

    it('should report an unknown format distinctly', async () => {
      await writeFile(tempDir, '.php-version', 'latest');

      await expect(resolver.resolve(tempDir)).rejects.toBeInstanceOf(UnknownVersionFormatError);
    });

    it('should reject malformed composer.json', async () => {
      await writeFile(tempDir, 'composer.json', '{ "require": ');

      await expect(resolver.resolve(tempDir)).rejects.toMatchObject({ reason: 'malformed-manifest' });
    });

    it('should reject a start directory that does not exist', async () => {
      await expect(resolver.resolve(path.join(tempDir, 'missing'))).rejects.toMatchObject({
        reason: 'not-a-directory',
      });
    });
  });

  describe('normalize', () => {
    it.each<[string, VersionIdentifier]>([
      ['8.2', 'php@8.2'],
      [' 8.2.7 ', 'php@8.2'],
      ['php@8.2', 'php@8.2'],
      ['php@default', 'php@default'],
      ['default', 'php@default'],
    ])('should normalize %p to %p', async (input, expected) => {
      expect(await resolver.normalize(input)).toBe(expected);
    });

    it('should leave a canonical identifier unchanged on a second pass', async () => {
      const once = await resolver.normalize('8.3');

      expect(await resolver.normalize(once)).toBe(once);
    });

    it('should pick the highest installed minor for a bare major, numerically', async () => {
      const installed = jest.fn(async (): Promise<VersionIdentifier[]> => ['php@8.2', 'php@8.10', 'php@7.4', 'php@default']);
      const withInstalled = new ProjectVersionResolver(installed);

      expect(await withInstalled.normalize('8')).toBe('php@8.10');
      expect(await withInstalled.normalize('7')).toBe('php@7.4');
    });

    it('should guess X.0 when nothing under the major is installed', async () => {
      expect(await resolver.normalize('9')).toBe('php@9.0');
    });

    it.each(['8.x', 'php8', '^8.1', 'php@8'])('should reject %p as an unknown format', async input => {
      await expect(resolver.normalize(input)).rejects.toBeInstanceOf(UnknownVersionFormatError);
    });

    it('should name the file in the error message', async () => {
      await expect(resolver.normalize('eight', '/srv/app/.php-version')).rejects.toThrow(
        "Unrecognized PHP version 'eight' in /srv/app/.php-version"
      );
    });

    it('should check length before anything else', async () => {
      await expect(resolver.normalize(`php@8.2${' '.repeat(5)}${'x'.repeat(30)}`)).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('lowerBound', () => {
    it.each<[string, string | null]>([
      ['^8.1', '8.1'],
      ['>=7.2.5', '7.2.5'],
      ['~7.4 || ~8.0 || ^8.3', '8.3'],
      ['8.*', '8'],
      ['*', null],
    ])('should read %p as %p', (constraint, expected) => {
      expect(ProjectVersionResolver.lowerBound(constraint)).toBe(expected);
    });
  });

  describe('fromToolVersions', () => {
    it('should return the first php entry', () => {
      expect(ProjectVersionResolver.fromToolVersions('ruby 3.3.0\n  php   8.1.2 8.2.0\n')).toBe('8.1.2');
    });

    it('should return null without a php entry', () => {
      expect(ProjectVersionResolver.fromToolVersions('python 3.12.1\nphp\n')).toBeNull();
    });
  });

  describe('setProjectVersion', () => {
    it('should write the short form that resolves back to the same version', async () => {
      const file = await resolver.setProjectVersion(tempDir, 'php@8.2');

      expect(file).toBe(path.join(tempDir, '.php-version'));
      expect(await fs.readFile(file, 'utf8')).toBe('8.2\n');
      expect((await resolver.resolve(tempDir))?.version).toBe('php@8.2');
    });

    it('should round-trip the default version', async () => {
      await resolver.setProjectVersion(tempDir, 'php@default');

      expect((await resolver.resolve(tempDir))?.version).toBe('php@default');
    });
  });
});
