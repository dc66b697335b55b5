export type VersionIdentifier = `php@${number}.${number}` | 'php@default';

export type ProjectVersionSource = 'marker-file' | 'composer' | 'tool-versions';

export interface ProjectVersion {
  version: VersionIdentifier;
  source: ProjectVersionSource;
  file: string;
  raw: string;
}

export interface VersionCacheEntry {
  versions: VersionIdentifier[];
  fetchedAt: Date;
  source: 'cache' | 'live' | 'fallback';
}

export interface InstalledVersion {
  version: VersionIdentifier;
  formula: string;
  installDir: string;
  isCurrent: boolean;
}
