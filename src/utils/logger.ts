import chalk from 'chalk';
import { format } from 'util';

export type LogLevel = 'debug' | 'verbose' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'verbose',
  'info',
  'warning',
  'error',
];

export type LogMethod = (message: string, ...args: unknown[]) => void;

/**
 * Leveled logging capability the runner reports progress through.
 * Messages take `util.format` placeholders (`%s`, `%d`, `%o`).
 */
export interface Logger {
  debug: LogMethod;
  verbose: LogMethod;
  info: LogMethod;
  warning: LogMethod;
  error: LogMethod;
  exception(message: string, error: unknown, ...args: unknown[]): void;
}

const noop: LogMethod = () => {};

export const silentLogger: Logger = {
  debug: noop,
  verbose: noop,
  info: noop,
  warning: noop,
  error: noop,
  exception: () => {},
};

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  verbose: chalk.cyan,
  info: (text) => text,
  warning: chalk.yellow,
  error: chalk.red,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  /** Prefix written before every line, e.g. a module name. */
  name?: string;
}

export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private readonly name?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.name = options.name;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  verbose(message: string, ...args: unknown[]): void {
    this.write('verbose', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  exception(message: string, error: unknown, ...args: unknown[]): void {
    if (!this.isEnabled('error')) {
      return;
    }
    const detail =
      error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.emit('error', `${format(message, ...args)}\n  ${detail}`);
    if (error instanceof Error && error.stack && this.isEnabled('debug')) {
      console.error(COLORS.debug(error.stack));
    }
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    this.emit(level, format(message, ...args));
  }

  private emit(level: LogLevel, text: string): void {
    const line = COLORS[level](this.name ? `[${this.name}] ${text}` : text);
    if (level === 'warning' || level === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new Error(
      `Invalid log level: "${value}". Must be one of ${LOG_LEVELS.join(', ')}`,
    );
  }
  return level;
}
