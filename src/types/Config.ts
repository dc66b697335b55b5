import { VersionIdentifier } from './Version';

export interface PhpSwitchConfig {
  autoRestart: boolean;
  backupEnabled: boolean;
  defaultVersion?: VersionIdentifier | undefined;
  maxBackups: number;
  cacheDir?: string | undefined;
  autoSwitch: boolean;
  cacheTtlSeconds: number;
  searchTimeoutSeconds: number;
  homebrewPrefix?: string | undefined;
}

export type ConfigKey = keyof PhpSwitchConfig;

/**
 * Shape of config.yml on disk. Every field is optional; missing ones take defaults.
 */
export type ConfigFile = Partial<Record<ConfigKey, unknown>>;
