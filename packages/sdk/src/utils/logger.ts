/**
 * Namespaced debug logger
 *
 * Each LrcLibClient owns a root logger; API modules log through children
 * (`LrcLib:HTTPClient`, `LrcLib:LyricsAPI`, ...). Two clients never share
 * logging state.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  enabled?: boolean;
  level?: LogLevel;
  namespace?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly config: Required<LoggerConfig>;

  constructor(config?: LoggerConfig) {
    this.config = {
      enabled: config?.enabled ?? false,
      level: config?.level ?? 'info',
      namespace: config?.namespace ?? 'LrcLib',
    };
  }

  get namespace(): string {
    return this.config.namespace;
  }

  isEnabled(level: LogLevel): boolean {
    return this.config.enabled && LEVEL_RANK[level] >= LEVEL_RANK[this.config.level];
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Logger for a sub-namespace, with this logger's level and switch
   */
  child(namespace: string): Logger {
    return new Logger({ ...this.config, namespace: `${this.config.namespace}:${namespace}` });
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (!this.isEnabled(level)) return;

    const head = `[${new Date().toISOString()}] [${this.config.namespace}]`;
    const method = level === 'debug' ? 'log' : level;
    console[method](head, message, data ?? '');
  }
}

export function createLogger(config?: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Disabled logger used where no client logger is passed in
 */
export const silentLogger = createLogger({ enabled: false });
