/**
 * Error Types
 *
 * Typed errors for the fixture sync. Each carries a stable code and optional
 * context so log lines and command replies can say what failed.
 */

/** Base error for everything the fixture sync raises */
export class FixtureSyncError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FixtureSyncError';
  }
}

/** Schedule page could not be fetched (network, non-2xx status, timeout) */
export class FetchError extends FixtureSyncError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'FETCH_ERROR', { url, statusCode, ...context });
    this.name = 'FetchError';
  }
}

/** Schedule page no longer looks like a schedule page */
export class ParseError extends FixtureSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', context);
    this.name = 'ParseError';
  }
}

export type RemoteOperation = 'list' | 'create' | 'update' | 'delete' | 'announce';

/** A Discord operation for a single fixture failed */
export class RemoteApiError extends FixtureSyncError {
  constructor(
    message: string,
    public readonly operation: RemoteOperation,
    context?: Record<string, unknown>
  ) {
    super(message, 'REMOTE_API_ERROR', { operation, ...context });
    this.name = 'RemoteApiError';
  }
}

/** Manual sync invoked by someone without the privileged role */
export class AuthorizationError extends FixtureSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'AUTHORIZATION_ERROR', context);
    this.name = 'AuthorizationError';
  }
}

/** Environment is missing or has invalid values */
export class ConfigError extends FixtureSyncError {
  constructor(
    message: string,
    public readonly variables: string[]
  ) {
    super(message, 'CONFIG_ERROR', { variables });
    this.name = 'ConfigError';
  }
}

/** A cycle was triggered while another one was still running */
export class SyncInProgressError extends FixtureSyncError {
  constructor() {
    super('A fixture sync is already in progress', 'SYNC_IN_PROGRESS');
    this.name = 'SyncInProgressError';
  }
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
