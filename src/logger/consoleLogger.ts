import type { LogData, Logger } from '../types/logger.js';

const PREFIX = '[toggl-rest-client]';

/**
 * {@link Logger} writing to the console, one prefixed line per call.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, data?: LogData): void {
    this.#write(console.debug, `${PREFIX} [DEBUG] ${message}`, data);
  }

  info(message: string, data?: LogData): void {
    this.#write(console.info, `${PREFIX} ${message}`, data);
  }

  warn(message: string, data?: LogData): void {
    this.#write(console.warn, `${PREFIX} ${message}`, data);
  }

  error(message: string, data?: LogData): void {
    this.#write(console.error, `${PREFIX} ${message}`, data);
  }

  #write(sink: (...args: unknown[]) => void, line: string, data?: LogData): void {
    if (data) {
      sink(line, data);
    } else {
      sink(line);
    }
  }
}
