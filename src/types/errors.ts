/** Missing or invalid operator configuration. Raised before any network call. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The request never produced an HTTP response (DNS, refused connection, reset). */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** An error body returned by Splunk ACS. */
export class RemoteServiceError extends Error {
  readonly code: string;
  readonly remoteMessage: string;
  readonly status: number;

  constructor(code: string, remoteMessage: string, status: number) {
    super(`received error response ${code}: ${remoteMessage}`);
    this.name = 'RemoteServiceError';
    this.code = code;
    this.remoteMessage = remoteMessage;
    this.status = status;
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export class NotFoundError extends Error {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string) {
    super(`${kind} "${key}" not found`);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.key = key;
  }
}

export class AlreadyExistsError extends Error {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string) {
    super(`${kind} "${key}" already exists`);
    this.name = 'AlreadyExistsError';
    this.kind = kind;
    this.key = key;
  }
}

/** Optimistic-concurrency failure: the caller wrote against a stale resourceVersion. */
export class ConflictError extends Error {
  readonly kind: string;
  readonly key: string;

  constructor(kind: string, key: string, expected: string, actual: string) {
    super(
      `${kind} "${key}" was modified concurrently (resourceVersion ${expected}, stored ${actual}); reload and retry`,
    );
    this.name = 'ConflictError';
    this.kind = kind;
    this.key = key;
  }
}

export class LabelMissingError extends Error {
  readonly label: string;

  constructor(label: string, kind: string) {
    super(`label ${label} not found on ${kind}`);
    this.name = 'LabelMissingError';
    this.label = label;
  }
}

export function isNotFound(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
