/**
 * Tagged console logger.
 *
 * Output looks like `[Pipeline] Packaged 4 images`, the same prefix style
 * used by every module. The threshold is process-wide and set once from
 * config at startup.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, message: string, data?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const line = `[${tag}] ${message}`;
    const args = data === undefined ? [line] : [line, data];
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.log(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}
