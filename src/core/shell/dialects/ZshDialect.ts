import * as path from 'path';
import { PosixDialect } from './PosixDialect';
import { AutoSwitchHookOptions } from '../ShellDialectStrategy';

export class ZshDialect extends PosixDialect {
  readonly dialect = 'zsh';

  startupCandidates(homeDir: string): string[] {
    return [path.join(homeDir, '.zshrc'), path.join(homeDir, '.zprofile')];
  }

  renderAutoSwitchHook(options: AutoSwitchHookOptions): string {
    return [
      '_phpswitch_auto_switch() {',
      `  eval "$(${options.command} auto --shell zsh 2>/dev/null)"`,
      '}',
      '',
      'autoload -U add-zsh-hook',
      'add-zsh-hook chpwd _phpswitch_auto_switch',
      '',
      '_phpswitch_auto_switch',
    ].join('\n');
  }
}
