import * as path from 'path';
import { PosixDialect } from './PosixDialect';

/**
 * Any sh-compatible shell phpswitch does not know by name. Only ~/.profile is
 * managed and there is no directory-change hook.
 */
export class UnknownDialect extends PosixDialect {
  readonly dialect = 'unknown';

  startupCandidates(homeDir: string): string[] {
    return [path.join(homeDir, '.profile')];
  }

  renderAutoSwitchHook(): null {
    return null;
  }

  override sourceCommand(file: string): string {
    return `. ${this.quote(file)}`;
  }
}
