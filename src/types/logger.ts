/**
 * Logger interface for dependency injection.
 *
 * Shaped after pino's call signatures so a pino instance can be passed
 * straight in, while tests hand over a vi.fn() based double.
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

  child(bindings: Record<string, unknown>): Logger;
}
