import type { LoggerPort } from './logger.interface';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/** Console logger used when the host does not supply its own `LoggerPort`. */
export class RewriteLogger implements LoggerPort {
  constructor(
    private readonly scope = 'nest-rewrite',
    private readonly minLevel: LogLevel = 'info',
  ) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.print('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.print('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.print('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.print('error', message, meta);
  }

  private print(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const line = `[${this.scope}] [${level.toUpperCase()}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      // eslint-disable-next-line no-console
      console.log(line, meta);
      return;
    }
    // eslint-disable-next-line no-console
    console.log(line);
  }
}
