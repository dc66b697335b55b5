import { ShellDialect, VersionPaths } from '../../types/Shell';
import { VersionIdentifier } from '../../types/Version';

export interface AutoSwitchHookOptions {
  /** Command the hook invokes, normally `phpswitch` */
  command: string;
}

/**
 * Abstract base class for the per-dialect shell strategies.
 * Everything that differs between bash, zsh, fish and plain sh lives behind this.
 */
export abstract class ShellDialectStrategy {
  abstract readonly dialect: ShellDialect;

  /** Whether a PATH change made by phpswitch can take effect in-process */
  abstract readonly supportsLiveUpdate: boolean;

  readonly pathSeparator: string = ':';

  abstract readonly reloadScriptExtension: string;

  /**
   * Startup files in order of preference. The first existing one wins; when none
   * exist the last one is created.
   */
  abstract startupCandidates(homeDir: string): string[];

  /**
   * Body of the managed PATH block (without markers or header).
   */
  abstract renderPathBlock(paths: VersionPaths): string;

  /**
   * A standalone script that performs the same PATH rebuild when sourced.
   */
  abstract renderReloadScript(version: VersionIdentifier, paths: VersionPaths): string;

  /**
   * Directory-change hook, or null when the dialect has none.
   */
  abstract renderAutoSwitchHook(options: AutoSwitchHookOptions): string | null;

  /**
   * One line a user can paste to get the new PATH in the current session.
   */
  abstract exportCommand(paths: VersionPaths): string;

  sourceCommand(file: string): string {
    return `source ${this.quote(file)}`;
  }

  abstract quote(value: string): string;
}
