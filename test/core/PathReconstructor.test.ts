import { PathReconstructor } from '../../src/core/shell/PathReconstructor';
import { ShellDialectRegistry } from '../../src/core/shell/ShellDialectRegistry';
import { HomebrewLayout } from '../../src/core/brew/HomebrewLayout';
import { createTempDir, cleanupTempDir, createFakeKeg } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('PathReconstructor', () => {
  let tempDir: string;
  let prefix: string;
  let layout: HomebrewLayout;

  beforeEach(async () => {
    tempDir = await createTempDir();
    prefix = path.join(tempDir, 'brew');
    layout = new HomebrewLayout(prefix);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('rebuild', () => {
    it('should drop interpreter entries and put the new paths first', () => {
      const reconstructor = new PathReconstructor({ layout, env: {} });

      expect(reconstructor.rebuild('/usr/bin:/opt/php7/bin:/bin', ['/a/bin', '/a/sbin'])).toBe(
        '/a/bin:/a/sbin:/usr/bin:/bin'
      );
    });

    it('should match the interpreter name case-insensitively and skip empty entries', () => {
      const reconstructor = new PathReconstructor({ layout, env: {} });

      expect(reconstructor.rebuild('/Apps/PHP/bin::/usr/local/bin:', ['/a/bin'])).toBe('/a/bin:/usr/local/bin');
    });

    it('should honour another separator', () => {
      const reconstructor = new PathReconstructor({ layout, env: {} });

      expect(reconstructor.rebuild('C:\\php\\8.1;C:\\Windows', ['D:\\php\\8.2'], ';')).toBe(
        'D:\\php\\8.2;C:\\Windows'
      );
    });
  });

  describe('apply', () => {
    it('should rebuild PATH in-process and verify the new binary', async () => {
      await createFakeKeg(prefix, 'php@8.2');
      const env: NodeJS.ProcessEnv = { PATH: '/usr/bin:/opt/php7/bin:/bin' };
      const reconstructor = new PathReconstructor({ layout, env });
      const paths = layout.pathsFor('php@8.2');

      const result = await reconstructor.apply(ShellDialectRegistry.get('zsh'), 'php@8.2', '/home/tester/.zshrc');

      expect(env.PATH).toBe(`${paths.binDir}:${paths.sbinDir}:/usr/bin:/bin`);
      expect(result).toEqual({
        dialect: 'zsh',
        liveUpdated: true,
        searchPath: env.PATH,
        resolvedBinary: path.join(paths.binDir, 'php'),
        verified: true,
        instructions: [
          "To update your current shell, run: source '/home/tester/.zshrc'",
          `Or paste: export PATH='${paths.binDir}':'${paths.sbinDir}':"$PATH"; hash -r`,
        ],
      });
    });

    it('should report an unverified switch when the binary is missing', async () => {
      const env: NodeJS.ProcessEnv = { PATH: '/nonexistent/bin' };
      const reconstructor = new PathReconstructor({ layout, env });

      const result = await reconstructor.apply(ShellDialectRegistry.get('bash'), 'php@8.3');

      expect(result.liveUpdated).toBe(true);
      expect(result.verified).toBe(false);
      expect(result.resolvedBinary).toBeUndefined();
      expect(result.instructions).toHaveLength(1);
    });

    it('should write a reload script for fish instead of touching PATH', async () => {
      const scriptDir = path.join(tempDir, 'scripts');
      const env: NodeJS.ProcessEnv = { PATH: '/usr/bin' };
      const reconstructor = new PathReconstructor({ layout, env, scriptDir });
      const paths = layout.pathsFor('php@8.1');

      const result = await reconstructor.apply(ShellDialectRegistry.get('fish'), 'php@8.1');

      expect(env.PATH).toBe('/usr/bin');
      expect(result.liveUpdated).toBe(false);
      expect(result.verified).toBe(false);
      expect(result.reloadScript).toMatch(/phpswitch_reload_\d+\.fish$/);
      expect(path.dirname(result.reloadScript ?? '')).toBe(scriptDir);
      expect(result.instructions).toEqual([
        `To use php@8.1 in this fish session, run: source '${result.reloadScript}'`,
        `Or paste: set -gx PATH '${paths.binDir}' '${paths.sbinDir}' $PATH`,
      ]);

      const script = await fs.readFile(result.reloadScript ?? '', 'utf8');
      expect(script.split('\n')[0]).toBe('#!/usr/bin/env fish');
      expect(script).toContain(`set -gx PATH '${paths.binDir}' '${paths.sbinDir}' $phpswitch_kept`);
      expect((await fs.stat(result.reloadScript ?? '')).mode & 0o777).toBe(0o755);
    });
  });

  describe('verify', () => {
    it('should reject a php binary from another install', async () => {
      await createFakeKeg(prefix, 'php@8.2');
      const otherBin = path.join(tempDir, 'other', 'bin');
      await fs.ensureDir(otherBin);
      await fs.writeFile(path.join(otherBin, 'php'), '#!/bin/sh\n');
      await fs.chmod(path.join(otherBin, 'php'), 0o755);
      const reconstructor = new PathReconstructor({ layout, env: {} });
      const paths = layout.pathsFor('php@8.2');

      const result = await reconstructor.verify(`${otherBin}:${paths.binDir}`, paths);

      expect(result).toEqual({ resolvedBinary: path.join(otherBin, 'php'), verified: false });
    });
  });
});
