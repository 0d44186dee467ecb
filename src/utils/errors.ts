/**
 * Error taxonomy
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Navigation or transport failure while loading a page
 */
export class NavigationError extends Error {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'NavigationError';
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Sink rejected a record for a reason other than a duplicate key
 */
export class SinkError extends Error {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SinkError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
