export class AutoregError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AutoregError';
  }
}

export class ConfigurationError extends AutoregError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class SchemaValidationError extends AutoregError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class LlmError extends AutoregError {
  constructor(
    message: string,
    public readonly isTransient: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

/** One site failed to yield content. Recoverable: the site contributes nothing. */
export class SiteFetchError extends AutoregError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, 'SITE_FETCH_ERROR', cause);
    this.name = 'SiteFetchError';
  }
}

export class SecondarySourceError extends AutoregError {
  constructor(message: string, cause?: Error) {
    super(message, 'SECONDARY_SOURCE_ERROR', cause);
    this.name = 'SecondarySourceError';
  }
}

export class NoDataFoundError extends AutoregError {
  constructor(message: string) {
    super(message, 'NO_DATA_FOUND');
    this.name = 'NoDataFoundError';
  }
}

export class SynthesisError extends AutoregError {
  constructor(message: string, cause?: Error) {
    super(message, 'SYNTHESIS_ERROR', cause);
    this.name = 'SynthesisError';
  }
}

export class CacheIOError extends AutoregError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_IO_ERROR', cause);
    this.name = 'CacheIOError';
  }
}

export class PersistenceError extends AutoregError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SessionNotFoundError extends AutoregError {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
