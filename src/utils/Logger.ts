import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type StatusKind = 'success' | 'warning' | 'error' | 'info';

/**
 * Diagnostic logger. Writes to stderr so that commands whose stdout is consumed
 * by shell hooks (`project --print`, `current`) stay clean.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = 'warn';
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
  };

  private constructor() {
    if (process.env.PHPSWITCH_DEBUG === '1') {
      this.logLevel = 'debug';
    }
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const prefix = this.getLevelPrefix(level);
    const formatted = this.formatMessage(level, message);
    const metaStr = meta ? ` ${this.formatMeta(meta)}` : '';

    console.error(`${this.getTimestamp()} ${prefix} ${formatted}${metaStr}`);
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.logLevel];
  }

  private getTimestamp(): string {
    return chalk.gray(new Date().toISOString());
  }

  private getLevelPrefix(level: Exclude<LogLevel, 'silent'>): string {
    const prefixes = {
      debug: chalk.cyan('[DEBUG]'),
      info: chalk.blue('[INFO]'),
      warn: chalk.yellow('[WARN]'),
      error: chalk.red('[ERROR]'),
    };
    return prefixes[level];
  }

  private formatMessage(level: Exclude<LogLevel, 'silent'>, message: string): string {
    switch (level) {
      case 'error':
        return chalk.red(message);
      case 'warn':
        return chalk.yellow(message);
      case 'info':
        return chalk.white(message);
      case 'debug':
        return chalk.gray(message);
    }
  }

  private formatMeta(meta: unknown): string {
    if (typeof meta === 'string') {
      return chalk.gray(`(${meta})`);
    }

    if (meta instanceof Error) {
      return chalk.red(`(${meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export const logger = Logger.getInstance();

/**
 * Renders a user-facing status line, the way every command reports its outcome.
 */
export function formatStatus(kind: StatusKind, message: string): string {
  switch (kind) {
    case 'success':
      return chalk.green(`✅ ${message}`);
    case 'warning':
      return chalk.yellow(`⚠️  ${message}`);
    case 'error':
      return chalk.red(`❌ ${message}`);
    case 'info':
      return chalk.blue(`ℹ️  ${message}`);
  }
}
