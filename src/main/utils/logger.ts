import log from 'electron-log/node';
import { LOG_LEVELS } from '@shared/constants';

class Logger {
  constructor() {
    // The engine is embedded by a host application that owns log files
    log.transports.file.level = false;
    log.transports.console.level = LOG_LEVELS.INFO;
  }

  error(message: string, ...args: unknown[]): void {
    log.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(message, ...args);
  }
}

export const logger = new Logger();
