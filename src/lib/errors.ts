/**
 * Error types raised by the config loader and the remote session.
 */

export class RemoteSessionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteSessionError';
  }
}

export class ConfigNotFoundError extends RemoteSessionError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super(`Config file not found: ${path}`, options);
    this.name = 'ConfigNotFoundError';
    this.path = path;
  }
}

export class ConnectionFailedError extends RemoteSessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionFailedError';
  }
}

export class NotConnectedError extends RemoteSessionError {
  constructor(operation: string) {
    super(`Cannot ${operation}: session is not connected`);
    this.name = 'NotConnectedError';
  }
}

export class TransferFailedError extends RemoteSessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferFailedError';
  }
}

// Handed to the keepalive loss hook; never thrown at callers.
export class KeepaliveLostError extends RemoteSessionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeepaliveLostError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
