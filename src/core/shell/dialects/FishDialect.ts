import * as path from 'path';
import { ShellDialectStrategy, AutoSwitchHookOptions } from '../ShellDialectStrategy';
import { VersionPaths } from '../../../types/Shell';
import { VersionIdentifier } from '../../../types/Version';

/**
 * fish keeps PATH as a list and cannot be changed from outside its own session,
 * so a switch produces a reload script instead of a live update.
 */
export class FishDialect extends ShellDialectStrategy {
  readonly dialect = 'fish';
  readonly supportsLiveUpdate = false;
  readonly reloadScriptExtension = '.fish';

  startupCandidates(homeDir: string): string[] {
    return [path.join(homeDir, '.config', 'fish', 'config.fish')];
  }

  renderPathBlock(paths: VersionPaths): string {
    return [
      '# Rebuild PATH without PHP entries, then put the selected version first',
      'set -l phpswitch_kept',
      'for phpswitch_entry in $PATH',
      "    if not string match -qi '*php*' -- $phpswitch_entry",
      '        set -a phpswitch_kept $phpswitch_entry',
      '    end',
      'end',
      `set -gx PATH ${this.quote(paths.binDir)} ${this.quote(paths.sbinDir)} $phpswitch_kept`,
      'set -e phpswitch_kept',
    ].join('\n');
  }

  renderReloadScript(version: VersionIdentifier, paths: VersionPaths): string {
    return [
      '#!/usr/bin/env fish',
      `# phpswitch reload script for ${version}`,
      `# Generated: ${new Date().toISOString()}`,
      '# Source this file to use the new version in the current shell.',
      '',
      this.renderPathBlock(paths),
      '',
      'echo "Active PHP: "(php -v 2>/dev/null | head -n 1)',
      '',
    ].join('\n');
  }

  renderAutoSwitchHook(options: AutoSwitchHookOptions): string {
    return [
      'function _phpswitch_auto_switch --on-variable PWD',
      `    ${options.command} auto --shell fish 2>/dev/null | source`,
      'end',
      '',
      '_phpswitch_auto_switch',
    ].join('\n');
  }

  exportCommand(paths: VersionPaths): string {
    return `set -gx PATH ${this.quote(paths.binDir)} ${this.quote(paths.sbinDir)} $PATH`;
  }

  quote(value: string): string {
    return `'${value.replace(/[\\']/g, match => `\\${match}`)}'`;
  }
}
