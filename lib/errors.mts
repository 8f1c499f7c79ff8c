/**
 * Error types raised by the coordinator
 */

/**
 * Opening the session, authenticating or the full-state fetch failed
 */
export class ConnectionFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionFailedError';
  }
}

/**
 * A command or data read was issued while no session is connected
 */
export class NotConnectedError extends Error {
  constructor(message = 'Not connected to panel') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

/**
 * Coordinator configuration is invalid
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
