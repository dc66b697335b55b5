import { ExtensionManager } from '../../src/core/ExtensionManager';
import { HomebrewLayout } from '../../src/core/brew/HomebrewLayout';
import { ExternalCommandError, ValidationError } from '../../src/utils/errors';
import { ProcessResult } from '../../src/utils/ProcessUtils';
import { createTempDir, cleanupTempDir, writeFile } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

const MODULES_OUTPUT = ['[PHP Modules]', 'Core', 'date', 'Zend OPcache', 'intl', '', '[Zend Modules]', 'Zend OPcache', ''].join(
  '\n'
);

class ScriptedExtensionManager extends ExtensionManager {
  readonly calls: Array<[string, string[]]> = [];
  result: ProcessResult = { stdout: MODULES_OUTPUT, stderr: '', exitCode: 0 };

  protected override async run(binary: string, args: string[]): Promise<ProcessResult> {
    this.calls.push([binary, args]);
    return this.result;
  }
}

describe('ExtensionManager', () => {
  let tempDir: string;
  let layout: HomebrewLayout;
  let manager: ScriptedExtensionManager;
  let confDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    layout = new HomebrewLayout(path.join(tempDir, 'brew'));
    manager = new ScriptedExtensionManager(layout);
    confDir = path.join(tempDir, 'brew', 'etc', 'php', '8.2', 'conf.d');

    await writeFile(confDir, 'ext-opcache.ini', 'zend_extension="opcache.so"\n');
    await writeFile(confDir, 'ext-xdebug.ini.disabled', 'zend_extension="xdebug.so"\n');
    await writeFile(confDir, 'intl.ini', 'extension="intl.so"\n');
    await writeFile(confDir, 'README', 'not an ini file\n');
    await writeFile(path.dirname(confDir), 'php.ini', 'memory_limit=128M\n');
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('HomebrewLayout.iniDir', () => {
    it('should use the numeric version, or etc/php for the unversioned formula', () => {
      expect(layout.iniDir('php@8.2')).toBe(path.join(tempDir, 'brew', 'etc', 'php', '8.2'));
      expect(layout.iniDir('php@default')).toBe(path.join(tempDir, 'brew', 'etc', 'php'));
    });
  });

  describe('details', () => {
    it('should locate php.ini and conf.d', async () => {
      expect(await manager.details('php@8.2')).toEqual({
        iniDir: path.dirname(confDir),
        phpIni: path.join(path.dirname(confDir), 'php.ini'),
        phpIniExists: true,
        confDir,
        confDirExists: true,
      });
      expect((await manager.details('php@8.1')).phpIniExists).toBe(false);
    });
  });

  describe('listConfigs', () => {
    it('should list ini files with their state', async () => {
      expect(await manager.listConfigs('php@8.2')).toEqual([
        { name: 'opcache', file: path.join(confDir, 'ext-opcache.ini'), enabled: true },
        { name: 'xdebug', file: path.join(confDir, 'ext-xdebug.ini.disabled'), enabled: false },
        { name: 'intl', file: path.join(confDir, 'intl.ini'), enabled: true },
      ]);
    });

    it('should return nothing without a conf.d directory', async () => {
      expect(await manager.listConfigs('php@7.4')).toEqual([]);
    });
  });

  describe('disable', () => {
    it('should rename the ini file', async () => {
      expect(await manager.disable('php@8.2', 'opcache')).toBe('changed');

      expect(await fs.pathExists(path.join(confDir, 'ext-opcache.ini'))).toBe(false);
      expect(await fs.readFile(path.join(confDir, 'ext-opcache.ini.disabled'), 'utf8')).toBe(
        'zend_extension="opcache.so"\n'
      );
    });

    it('should handle files without the ext- prefix', async () => {
      expect(await manager.disable('php@8.2', 'intl')).toBe('changed');

      expect(await fs.pathExists(path.join(confDir, 'intl.ini.disabled'))).toBe(true);
    });

    it('should leave an already disabled extension alone', async () => {
      expect(await manager.disable('php@8.2', 'xdebug')).toBe('unchanged');
      expect(await fs.pathExists(path.join(confDir, 'ext-xdebug.ini.disabled'))).toBe(true);
    });
  });

  describe('enable', () => {
    it('should restore a disabled ini file', async () => {
      expect(await manager.enable('php@8.2', 'xdebug')).toBe('changed');

      expect(await fs.pathExists(path.join(confDir, 'ext-xdebug.ini'))).toBe(true);
      expect(await fs.pathExists(path.join(confDir, 'ext-xdebug.ini.disabled'))).toBe(false);
    });

    it('should report an enabled extension as unchanged', async () => {
      expect(await manager.enable('php@8.2', 'opcache')).toBe('unchanged');
    });

    it('should reject an extension without a configuration file', async () => {
      await expect(manager.enable('php@8.2', 'redis')).rejects.toMatchObject({
        reason: 'invalid-value',
        hint: "Install it first, for example with 'pecl install redis'",
      });
    });

    it('should reject names that could leave conf.d', async () => {
      await expect(manager.enable('php@8.2', '../php')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('loadedModules', () => {
    it('should run the version binary and drop section headers and duplicates', async () => {
      expect(await manager.loadedModules('php@8.2')).toEqual(['Core', 'date', 'intl', 'Zend OPcache']);
      expect(manager.calls).toEqual([[layout.phpBinary('php@8.2'), ['-m']]]);
    });

    it('should raise an ExternalCommandError when php fails', async () => {
      manager.result = { stdout: '', stderr: 'broken extension', exitCode: 255 };

      const failure = manager.loadedModules('php@8.2');

      await expect(failure).rejects.toBeInstanceOf(ExternalCommandError);
      await expect(failure).rejects.toMatchObject({ message: 'php -m failed: broken extension', exitCode: 255 });
    });
  });
});
