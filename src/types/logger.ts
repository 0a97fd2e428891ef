/**
 * Logger interface for dependency injection.
 *
 * Matches the subset of Pino's API the simulation uses, so components
 * can take a logger without depending on Pino directly.
 */
export interface Logger {
  trace(obj: object, msg?: string): void;
  trace(msg: string): void;
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Log levels accepted by configuration.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
