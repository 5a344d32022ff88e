export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const PREFIX = '[circuit-jobs]';

/**
 * Leveled logger writing to the console. Messages below `level` are dropped.
 */
export function createConsoleLogger(level: LogLevel = 'info', sink: Pick<Console, 'debug' | 'info' | 'warn' | 'error'> = console): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug(message, ...details) {
      if (enabled('debug')) sink.debug(`${PREFIX} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) sink.info(`${PREFIX} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) sink.warn(`${PREFIX} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) sink.error(`${PREFIX} ${message}`, ...details);
    }
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
