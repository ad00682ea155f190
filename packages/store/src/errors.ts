/**
 * Storage error taxonomy. Absence (no record for an id) is not an error;
 * lookups return `undefined` instead.
 */
export type StorageErrorCode =
  | 'CONFIG_INVALID'
  | 'MAPPING_INCONSISTENT'
  | 'BACKEND_FAILURE'
  | 'UNSUPPORTED_OPERATION'
  | 'CONNECTOR_CLOSED';

export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends StorageError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class MappingError extends StorageError {
  constructor(message: string) {
    super('MAPPING_INCONSISTENT', message);
  }
}

/** Wraps whatever the backend client threw; the original is kept as `cause`. */
export class BackendError extends StorageError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('BACKEND_FAILURE', `${operation} failed: ${detail}`, { cause });
    this.operation = operation;
  }
}

export class UnsupportedOperationError extends StorageError {
  readonly operation: string;
  readonly backend: string;

  constructor(operation: string, backend: string) {
    super('UNSUPPORTED_OPERATION', `${operation} is not supported by the ${backend} backend`);
    this.operation = operation;
    this.backend = backend;
  }
}

export class ConnectorClosedError extends StorageError {
  constructor(collection: string) {
    super('CONNECTOR_CLOSED', `Connector for collection "${collection}" is closed`);
  }
}

export type StorageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StorageError };

export function fail<T = never>(error: StorageError): StorageResult<T> {
  return { ok: false, error };
}
