
export type ShellDialect = 'bash' | 'zsh' | 'fish' | 'unknown';

export const SHELL_DIALECTS: readonly ShellDialect[] = ['bash', 'zsh', 'fish', 'unknown'];

export interface StartupFile {
  path: string;
  dialect: ShellDialect;
  exists: boolean;
  writable: boolean;
  created: boolean;
}

export interface BackupSnapshot {
  path: string;
  source: string;
  createdAt: Date;
}

export interface MarkerPair {
  begin: string;
  end: string;
}

export interface ManagedBlockContent {
  /** Comment line rendered under the begin marker */
  header: string;
  body: string;
}

/**
 * Directories that make up one PHP install, in PATH order.
 */
export interface VersionPaths {
  installDir: string;
  binDir: string;
  sbinDir: string;
}

export interface PathUpdateResult {
  dialect: ShellDialect;
  liveUpdated: boolean;
  /** Set when PATH was rebuilt in-process */
  searchPath?: string;
  /** Resolved php binary after the rebuild, if one was found */
  resolvedBinary?: string;
  verified: boolean;
  reloadScript?: string;
  instructions: string[];
}
