export class JournalError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'JournalError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DuplicateDateError extends JournalError {
  public readonly date: string;

  constructor(date: string, options?: ErrorOptions) {
    super(`An entry for ${date} already exists`, 'DUPLICATE_DATE', options);
    this.name = 'DuplicateDateError';
    this.date = date;
  }
}

/**
 * Raised for every decryption failure. Wrong passwords and damaged files are
 * reported identically.
 */
export class InvalidCredentialError extends JournalError {
  constructor(options?: ErrorOptions) {
    super('Invalid password', 'INVALID_CREDENTIAL', options);
    this.name = 'InvalidCredentialError';
  }
}

export class NotFoundError extends JournalError {
  public readonly kind: 'entry' | 'attachment';
  public readonly id: string;

  constructor(kind: 'entry' | 'attachment', id: string, options?: ErrorOptions) {
    super(`No ${kind} with id ${id}`, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.id = id;
  }
}

export class IOFailureError extends JournalError {
  public readonly path: string;

  constructor(operation: string, path: string, options?: ErrorOptions) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to ${operation} ${path}${detail}`, 'IO_FAILURE', options);
    this.name = 'IOFailureError';
    this.path = path;
  }
}

export class SchemaMigrationError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'SCHEMA_MIGRATION', options);
    this.name = 'SchemaMigrationError';
  }
}

export class InvalidEntryError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'INVALID_ENTRY', options);
    this.name = 'InvalidEntryError';
  }
}

export class ConfigError extends JournalError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/** Runs a filesystem operation, rethrowing any failure as an IOFailureError. */
export function ioOperation<T>(operation: string, path: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof JournalError) {
      throw error;
    }
    throw new IOFailureError(operation, path, { cause: error });
  }
}
