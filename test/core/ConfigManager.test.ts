import { ConfigManager, DEFAULT_CONFIG } from '../../src/core/ConfigManager';
import { ValidationError } from '../../src/utils/errors';
import { createTempDir, cleanupTempDir } from '../setup';
import * as fs from 'fs-extra';
import * as path from 'path';

describe('ConfigManager', () => {
  let tempDir: string;
  let configManager: ConfigManager;

  beforeEach(async () => {
    tempDir = await createTempDir();
    configManager = new ConfigManager(path.join(tempDir, '.phpswitch'), tempDir);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('getInstance', () => {
    it('should return a singleton instance', () => {
      const instance1 = ConfigManager.getInstance();
      const instance2 = ConfigManager.getInstance();
      expect(instance1).toBe(instance2);
    });
  });

  describe('load', () => {
    it('should return the defaults when there is no config file', async () => {
      expect(await configManager.load()).toEqual(DEFAULT_CONFIG);
      expect(await fs.pathExists(configManager.configPath)).toBe(false);
    });

    it('should merge the file over the defaults', async () => {
      await fs.outputFile(configManager.configPath, 'maxBackups: 2\ndefaultVersion: php@8.2\n');

      const config = await configManager.load();

      expect(config.maxBackups).toBe(2);
      expect(config.defaultVersion).toBe('php@8.2');
      expect(config.autoRestart).toBe(true);
    });

    it('should treat an empty file as defaults', async () => {
      await fs.outputFile(configManager.configPath, '');

      expect(await configManager.load()).toEqual(DEFAULT_CONFIG);
    });

    it('should reject invalid yaml', async () => {
      await fs.outputFile(configManager.configPath, 'maxBackups: [1,\n');

      await expect(configManager.load()).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject values of the wrong type', async () => {
      await fs.outputFile(configManager.configPath, 'backupEnabled: sometimes\n');

      await expect(configManager.load()).rejects.toThrow(
        `Config key 'backupEnabled' must be true or false, got "sometimes"`
      );
    });
  });

  describe('set', () => {
    it('should parse the text form and persist it', async () => {
      const updated = await configManager.set('maxBackups', '3');

      expect(updated.maxBackups).toBe(3);
      expect(await fs.readFile(configManager.configPath, 'utf8')).toBe(
        [
          'autoRestart: true',
          'backupEnabled: true',
          'maxBackups: 3',
          'autoSwitch: false',
          'cacheTtlSeconds: 3600',
          'searchTimeoutSeconds: 10',
          '',
        ].join('\n')
      );
      expect((await new ConfigManager(configManager.configDir, tempDir).load()).maxBackups).toBe(3);
    });

    it('should restore the default for an empty value', async () => {
      await configManager.set('autoRestart', 'false');

      const updated = await configManager.set('autoRestart', '');

      expect(updated.autoRestart).toBe(true);
    });

    it('should reject unknown keys', async () => {
      await expect(configManager.set('colour', 'blue')).rejects.toMatchObject({ reason: 'invalid-value' });
    });

    it('should enforce minimums', async () => {
      await expect(configManager.set('maxBackups', '0')).rejects.toThrow(
        "Config key 'maxBackups' must be an integer of at least 1, got 0"
      );
    });

    it('should reject a default version that is not an identifier', async () => {
      await expect(configManager.set('defaultVersion', '8.2')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('update', () => {
    it('should keep unrelated settings', async () => {
      await configManager.set('maxBackups', '7');

      const updated = await configManager.update({ autoSwitch: true });

      expect(updated).toMatchObject({ maxBackups: 7, autoSwitch: true });
    });
  });

  describe('cacheDir', () => {
    it('should default under the home directory', async () => {
      expect(configManager.cacheDir(await configManager.load())).toBe(path.join(tempDir, '.cache', 'phpswitch'));
    });

    it('should use the override', () => {
      expect(configManager.cacheDir({ ...DEFAULT_CONFIG, cacheDir: '/var/cache/php' })).toBe('/var/cache/php');
    });
  });

  describe('parseText', () => {
    it.each<[string, unknown]>([
      ['true', true],
      ['false', false],
      ['42', 42],
      [' php@8.1 ', 'php@8.1'],
      ['', undefined],
    ])('should parse %p', (text, expected) => {
      expect(ConfigManager.parseText(text)).toBe(expected);
    });
  });
});
