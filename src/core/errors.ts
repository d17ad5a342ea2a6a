/**
 * Monitor Error Types
 *
 * Typed errors for the failure paths the monitor distinguishes.
 * Callers branch on `code` instead of parsing messages.
 */

export type MonitorErrorCode =
  | 'CONFIG_INVALID'
  | 'STORE_UNREACHABLE'
  | 'FEED_LOAD_FAILED'
  | 'RECORD_DECODE_FAILED';

/**
 * Base monitor error class.
 */
export class MonitorError extends Error {
  constructor(
    message: string,
    public readonly code: MonitorErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MonitorError';
  }
}

/**
 * Config file present but unreadable or failing validation.
 * Fatal at startup.
 */
export class ConfigError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

/**
 * Shared store could not be reached when it was built.
 * Fatal at startup - the store is never half-constructed.
 */
export class StoreConnectionError extends MonitorError {
  constructor(
    public readonly url: string,
    cause: unknown
  ) {
    super(`Failed to connect to Redis at ${url}: ${describeError(cause)}`, 'STORE_UNREACHABLE', {
      cause,
    });
    this.name = 'StoreConnectionError';
  }
}

/**
 * Feed source could not be read or parsed.
 * Terminal for the current replay run only.
 */
export class FeedLoadError extends MonitorError {
  constructor(
    public readonly source: string,
    cause: unknown
  ) {
    super(`Failed to load feed ${source}: ${describeError(cause)}`, 'FEED_LOAD_FAILED', { cause });
    this.name = 'FeedLoadError';
  }
}

/**
 * Persisted scored-article record is not valid JSON or fails the schema.
 */
export class RecordDecodeError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RECORD_DECODE_FAILED', options);
    this.name = 'RecordDecodeError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
