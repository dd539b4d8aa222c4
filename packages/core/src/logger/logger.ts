import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** A logger that prepends `[name] ` to this one's prefix */
  child(name: string): Logger;
}

const TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red.bold('ERROR'),
};

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string = '', level: LogLevel = 'info') {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.level !== 'silent' && LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level);
  }

  private format(level: Exclude<LogLevel, 'silent'>, message: string): string {
    return `${chalk.dim(new Date().toISOString())} ${TAGS[level]} ${this.prefix}${message}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) console.log(this.format('debug', message), ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) console.log(this.format('info', message), ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) console.warn(this.format('warn', message), ...args);
  }

  // Errors print with their stack
  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message), ...args.map(a => (a instanceof Error ? a.stack ?? a.message : a)));
    }
  }

  child(name: string): Logger {
    return new ConsoleLogger(`${this.prefix}[${name}] `, this.level);
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(l => l === value);
}

export function createLogger(prefix: string = '', level?: LogLevel): Logger {
  const fromEnv = process.env['LOG_LEVEL'];
  const logLevel = level
    ?? (process.env['NODE_ENV'] === 'test' ? 'silent' : undefined)
    ?? (isLogLevel(fromEnv) ? fromEnv : undefined)
    ?? 'info';

  return new ConsoleLogger(prefix, logLevel);
}
