import { ShellDialect } from '../../types/Shell';
import { ShellDialectStrategy } from './ShellDialectStrategy';
import { BashDialect } from './dialects/BashDialect';
import { ZshDialect } from './dialects/ZshDialect';
import { FishDialect } from './dialects/FishDialect';
import { UnknownDialect } from './dialects/UnknownDialect';

/**
 * Registry for the shell dialect strategies
 */
export class ShellDialectRegistry {
  private static readonly strategies: Record<ShellDialect, ShellDialectStrategy> = {
    bash: new BashDialect(),
    zsh: new ZshDialect(),
    fish: new FishDialect(),
    unknown: new UnknownDialect(),
  };

  static get(dialect: ShellDialect): ShellDialectStrategy {
    return this.strategies[dialect];
  }

  static isSupported(value: string): value is ShellDialect {
    return Object.prototype.hasOwnProperty.call(this.strategies, value);
  }
}
