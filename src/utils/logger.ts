export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]` and drops anything
 * below the level set by {@link setLogLevel}.
 */
export function createLogger(tag: string): Logger {
  const emit = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVELS[level] < LEVELS[minLevel]) return;
    const line = `[${tag}] ${message}`;
    switch (level) {
      case 'debug':
        console.debug(line, ...details);
        break;
      case 'info':
        console.log(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      case 'error':
        console.error(line, ...details);
        break;
    }
  };

  return {
    debug: (message, ...details) => emit('debug', message, details),
    info: (message, ...details) => emit('info', message, details),
    warn: (message, ...details) => emit('warn', message, details),
    error: (message, ...details) => emit('error', message, details),
  };
}
