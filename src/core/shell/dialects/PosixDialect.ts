import { ShellDialectStrategy } from '../ShellDialectStrategy';
import { VersionPaths } from '../../../types/Shell';
import { VersionIdentifier } from '../../../types/Version';

/**
 * Shared rendering for dialects that keep PATH as one colon-joined string.
 */
export abstract class PosixDialect extends ShellDialectStrategy {
  readonly supportsLiveUpdate = true;
  readonly reloadScriptExtension = '.sh';

  renderPathBlock(paths: VersionPaths): string {
    return [
      '# Drop PHP entries from PATH, keeping the rest in order',
      'phpswitch_strip_php_paths() {',
      '  _phpswitch_rest="$1:"',
      '  _phpswitch_out=""',
      '  while [ -n "$_phpswitch_rest" ]; do',
      '    _phpswitch_entry="${_phpswitch_rest%%:*}"',
      '    _phpswitch_rest="${_phpswitch_rest#*:}"',
      '    case "$_phpswitch_entry" in',
      '      ""|*[Pp][Hh][Pp]*) ;;',
      '      *) _phpswitch_out="${_phpswitch_out:+$_phpswitch_out:}$_phpswitch_entry" ;;',
      '    esac',
      '  done',
      '  printf \'%s\' "$_phpswitch_out"',
      '  unset _phpswitch_rest _phpswitch_entry _phpswitch_out',
      '}',
      '',
      `export PATH=${this.quote(paths.binDir)}:${this.quote(paths.sbinDir)}:"$(phpswitch_strip_php_paths "$PATH")"`,
      '',
      '# Forget cached command locations',
      'hash -r 2>/dev/null || true',
    ].join('\n');
  }

  renderReloadScript(version: VersionIdentifier, paths: VersionPaths): string {
    return [
      '#!/bin/sh',
      `# phpswitch reload script for ${version}`,
      `# Generated: ${new Date().toISOString()}`,
      '# Source this file to use the new version in the current shell.',
      '',
      this.renderPathBlock(paths),
      '',
      'echo "Active PHP: $(php -v 2>/dev/null | head -n 1)"',
      '',
    ].join('\n');
  }

  exportCommand(paths: VersionPaths): string {
    return `export PATH=${this.quote(paths.binDir)}:${this.quote(paths.sbinDir)}:"$PATH"; hash -r`;
  }

  quote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
  }
}
