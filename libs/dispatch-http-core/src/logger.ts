import type { Logger, LoggerMeta } from './types';

/**
 * Console logger used when the caller does not supply one.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta ?? {});
  }
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
