import chalk from 'chalk';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LASERLINK_LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return process.env.DEBUG ? 'debug' : 'info';
}

export class Logger {
  private static level: LogLevel = levelFromEnv();

  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }

  constructor(private context: string) {}

  child(scope: string): Logger {
    return new Logger(`${this.context}:${scope}`);
  }

  info(message: string, ...args: unknown[]) {
    if (!this.enabled('info')) return;
    console.log(chalk.blue(`[${this.context}]`), message, ...args);
  }

  success(message: string, ...args: unknown[]) {
    if (!this.enabled('info')) return;
    console.log(chalk.green(`✓ [${this.context}]`), message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    if (!this.enabled('warn')) return;
    console.log(chalk.yellow(`⚠ [${this.context}]`), message, ...args);
  }

  error(message: string, error?: unknown) {
    if (!this.enabled('error')) return;
    console.error(chalk.red(`✗ [${this.context}]`), message);
    if (error) {
      console.error(chalk.red('Error details:'), error);
    }
  }

  debug(message: string, ...args: unknown[]) {
    if (!this.enabled('debug')) return;
    console.log(chalk.gray(`[${this.context}]`), message, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[Logger.level] >= LEVEL_ORDER[level];
  }
}
