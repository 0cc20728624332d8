/** Structured context attached to a log line. */
export type LogData = Record<string, unknown>;

/**
 * Logging port accepted by the client. The client itself only emits `debug`
 * traces; errors are returned to the caller, never logged in their place.
 */
export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
}
