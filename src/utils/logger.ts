export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export class Logger {
  constructor(private readonly namespace: string, private readonly level: LogThreshold = 'info') {}

  static levels = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 50,
  } as const;

  private shouldLog(level: LogLevel) {
    return Logger.levels[level] >= Logger.levels[this.level];
  }

  private emit(level: LogLevel, ...args: unknown[]) {
    if (!this.shouldLog(level)) return;
    const tag = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.namespace}]`;
    /* eslint-disable no-console */
    switch (level) {
      case 'debug':
        console.log(tag, ...args);
        break;
      case 'info':
        console.info(tag, ...args);
        break;
      case 'warn':
        console.warn(tag, ...args);
        break;
      case 'error':
        console.error(tag, ...args);
        break;
    }
    /* eslint-enable no-console */
  }

  child(namespace: string) {
    return new Logger(`${this.namespace}.${namespace}`, this.level);
  }

  debug(...args: unknown[]) { this.emit('debug', ...args); }
  info(...args: unknown[]) { this.emit('info', ...args); }
  warn(...args: unknown[]) { this.emit('warn', ...args); }
  error(...args: unknown[]) { this.emit('error', ...args); }
}

export const createLogger = (namespace: string, level: LogThreshold = 'info') => new Logger(namespace, level);

export const silentLogger = () => new Logger('silent', 'silent');
