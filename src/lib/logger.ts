/**
 * Component-tagged console logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
  constructor(private component: string) {}

  private format(level: LogLevel, message: string, data?: unknown): string {
    const prefix = `[${level.toUpperCase()}] [${this.component}]`;
    const dataStr = data === undefined ? '' : ` ${JSON.stringify(data)}`;
    return `${prefix} ${message}${dataStr}`;
  }

  debug(message: string, data?: unknown): void {
    console.debug(this.format('debug', message, data));
  }

  info(message: string, data?: unknown): void {
    console.info(this.format('info', message, data));
  }

  warn(message: string, data?: unknown): void {
    console.warn(this.format('warn', message, data));
  }

  error(message: string, data?: unknown, error?: Error): void {
    const errorStr = error?.stack ? `\n${error.stack}` : '';
    console.error(this.format('error', message, data) + errorStr);
  }
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
