import * as path from 'path';
import { PosixDialect } from './PosixDialect';
import { AutoSwitchHookOptions } from '../ShellDialectStrategy';

export class BashDialect extends PosixDialect {
  readonly dialect = 'bash';

  startupCandidates(homeDir: string): string[] {
    return [
      path.join(homeDir, '.bashrc'),
      path.join(homeDir, '.bash_profile'),
      path.join(homeDir, '.profile'),
    ];
  }

  renderAutoSwitchHook(options: AutoSwitchHookOptions): string {
    return [
      '_phpswitch_auto_switch() {',
      '  if [ "$PWD" != "${_PHPSWITCH_LAST_DIR:-}" ]; then',
      '    _PHPSWITCH_LAST_DIR="$PWD"',
      `    eval "$(${options.command} auto --shell bash 2>/dev/null)"`,
      '  fi',
      '}',
      '',
      'case ";${PROMPT_COMMAND:-};" in',
      '  *";_phpswitch_auto_switch;"*) ;;',
      '  *) PROMPT_COMMAND="_phpswitch_auto_switch${PROMPT_COMMAND:+;$PROMPT_COMMAND}" ;;',
      'esac',
      '',
      '_phpswitch_auto_switch',
    ].join('\n');
  }
}
