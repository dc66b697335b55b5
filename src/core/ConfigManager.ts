import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { ConfigFile, ConfigKey, PhpSwitchConfig } from '../types/Config';
import { VersionIdentifier } from '../types/Version';
import { Versions } from './version/Versions';
import { FileSystem } from '../utils/FileSystem';
import { ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/Logger';

export const DEFAULT_CONFIG: Readonly<PhpSwitchConfig> = {
  autoRestart: true,
  backupEnabled: true,
  maxBackups: 5,
  autoSwitch: false,
  cacheTtlSeconds: 3600,
  searchTimeoutSeconds: 10,
};

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'autoRestart',
  'backupEnabled',
  'defaultVersion',
  'maxBackups',
  'cacheDir',
  'autoSwitch',
  'cacheTtlSeconds',
  'searchTimeoutSeconds',
  'homebrewPrefix',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private static instance: ConfigManager;
  readonly configDir: string;
  readonly configPath: string;
  private config: PhpSwitchConfig | null = null;

  constructor(
    configDir: string = path.join(os.homedir(), '.phpswitch'),
    private readonly homeDir: string = os.homedir()
  ) {
    this.configDir = configDir;
    this.configPath = path.join(this.configDir, 'config.yml');
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  static isConfigKey(value: string): value is ConfigKey {
    return CONFIG_KEYS.some(key => key === value);
  }

  async load(): Promise<PhpSwitchConfig> {
    if (this.config) {
      return this.config;
    }

    if (!(await fs.pathExists(this.configPath))) {
      logger.debug(`No config at ${this.configPath}, using defaults`);
      this.config = { ...DEFAULT_CONFIG };
      return this.config;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(await fs.readFile(this.configPath, 'utf8'));
    } catch (error) {
      throw new ValidationError(
        `Failed to load config ${this.configPath}: ${errorMessage(error)}`,
        'invalid-value',
        `Fix or delete ${this.configPath}`
      );
    }

    this.config = ConfigManager.validate(parsed);
    return this.config;
  }

  async save(config: PhpSwitchConfig): Promise<void> {
    const content = yaml.stringify(ConfigManager.toFile(config), {
      indent: 2,
      lineWidth: 100,
      minContentWidth: 0,
    });

    await FileSystem.writeFileAtomic(this.configPath, content);
    this.config = config;
    logger.debug(`Saved config to ${this.configPath}`);
  }

  async update(changes: Partial<PhpSwitchConfig>): Promise<PhpSwitchConfig> {
    const next = ConfigManager.validate({ ...ConfigManager.toFile(await this.load()), ...changes });
    await this.save(next);
    return next;
  }

  /**
   * Sets one key from its command-line text form.
   */
  async set(key: string, value: string): Promise<PhpSwitchConfig> {
    if (!ConfigManager.isConfigKey(key)) {
      throw new ValidationError(
        `Unknown config key '${key}'`,
        'invalid-value',
        `Known keys: ${CONFIG_KEYS.join(', ')}`
      );
    }

    const current = ConfigManager.toFile(await this.load());
    const next = ConfigManager.validate({ ...current, [key]: ConfigManager.parseText(value) });
    await this.save(next);
    return next;
  }

  cacheDir(config: PhpSwitchConfig): string {
    return config.cacheDir ?? path.join(this.homeDir, '.cache', 'phpswitch');
  }

  /**
   * `true`/`false` become booleans, digits become numbers, an empty string
   * clears the key.
   */
  static parseText(value: string): unknown {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    if (trimmed === 'true') return true;
    if (trimmed === 'false') return false;
    if (/^\d+$/.test(trimmed)) return Number(trimmed);
    return trimmed;
  }

  static validate(raw: unknown): PhpSwitchConfig {
    if (raw === null || raw === undefined) {
      return { ...DEFAULT_CONFIG };
    }

    if (!isRecord(raw)) {
      throw new ValidationError('Config must be a mapping of keys to values', 'invalid-value');
    }

    for (const key of Object.keys(raw)) {
      if (!ConfigManager.isConfigKey(key)) {
        logger.warn(`Ignoring unknown config key '${key}'`);
      }
    }

    return {
      autoRestart: readBoolean(raw, 'autoRestart'),
      backupEnabled: readBoolean(raw, 'backupEnabled'),
      defaultVersion: readVersion(raw, 'defaultVersion'),
      maxBackups: readInteger(raw, 'maxBackups', 1),
      cacheDir: readString(raw, 'cacheDir'),
      autoSwitch: readBoolean(raw, 'autoSwitch'),
      cacheTtlSeconds: readInteger(raw, 'cacheTtlSeconds', 0),
      searchTimeoutSeconds: readInteger(raw, 'searchTimeoutSeconds', 1),
      homebrewPrefix: readString(raw, 'homebrewPrefix'),
    };
  }

  private static toFile(config: PhpSwitchConfig): ConfigFile {
    const file: ConfigFile = {};
    for (const key of CONFIG_KEYS) {
      if (config[key] !== undefined) {
        file[key] = config[key];
      }
    }
    return file;
  }
}

function invalid(key: ConfigKey, expected: string, value: unknown): ValidationError {
  return new ValidationError(
    `Config key '${key}' must be ${expected}, got ${JSON.stringify(value)}`,
    'invalid-value'
  );
}

function readBoolean(raw: Record<string, unknown>, key: 'autoRestart' | 'backupEnabled' | 'autoSwitch'): boolean {
  const value = raw[key];
  if (value === undefined) return DEFAULT_CONFIG[key];
  if (typeof value !== 'boolean') throw invalid(key, 'true or false', value);
  return value;
}

function readInteger(
  raw: Record<string, unknown>,
  key: 'maxBackups' | 'cacheTtlSeconds' | 'searchTimeoutSeconds',
  min: number
): number {
  const value = raw[key];
  if (value === undefined) return DEFAULT_CONFIG[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw invalid(key, `an integer of at least ${min}`, value);
  }
  return value;
}

function readString(raw: Record<string, unknown>, key: 'cacheDir' | 'homebrewPrefix'): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value === '') throw invalid(key, 'a path', value);
  return value;
}

function readVersion(raw: Record<string, unknown>, key: 'defaultVersion'): VersionIdentifier | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || !Versions.isIdentifier(value)) {
    throw invalid(key, 'a version like php@8.2', value);
  }
  return value;
}
