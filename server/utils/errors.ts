export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', false, details);
  }
}

export class StoreError extends AppError {
  public readonly table?: string;
  public readonly operation: string;
  public readonly originalError?: Error;

  constructor(
    operation: string,
    message: string,
    options: { table?: string; originalError?: Error; status?: number } = {}
  ) {
    super(message, 'STORE_ERROR', true, {
      operation,
      table: options.table,
      status: options.status,
    });
    this.operation = operation;
    this.table = options.table;
    this.originalError = options.originalError;
  }
}

export class RateLimitError extends StoreError {
  public readonly retryAfter?: number;

  constructor(operation: string, table?: string, retryAfter?: number, originalError?: Error) {
    super(operation, `Spreadsheet quota exceeded during ${operation}`, {
      table,
      originalError,
      status: 429,
    });
    this.retryAfter = retryAfter;
  }
}

/**
 * A record key survived into WRITE_BACK more than once. Always a bug in the
 * merge pass; the snapshot must not be written.
 */
export class DuplicateKeyError extends AppError {
  public readonly duplicateKeys: string[];

  constructor(table: string, duplicateKeys: string[]) {
    super(
      `Refusing to write '${table}': ${duplicateKeys.length} duplicate record key(s)`,
      'DUPLICATE_KEY',
      false,
      { table, duplicateKeys: duplicateKeys.slice(0, 20) }
    );
    this.duplicateKeys = duplicateKeys;
  }
}

export class SnapshotCorruptionError extends AppError {
  public readonly rowIndex: number;

  constructor(table: string, rowIndex: number, reason: string) {
    super(
      `Snapshot '${table}' row ${rowIndex} cannot be decoded: ${reason}`,
      'SNAPSHOT_CORRUPTION',
      false,
      { table, rowIndex, reason }
    );
    this.rowIndex = rowIndex;
  }
}

export const isOperationalError = (error: Error): boolean =>
  error instanceof AppError && error.isOperational;

const TRANSIENT_MESSAGES = [
  'timeout',
  'etimedout',
  'econnreset',
  'econnrefused',
  'socket hang up',
  'network',
  'quota exceeded',
];

/** Worth another attempt: quota, 5xx, or a connection-level failure. */
export const isTransientError = (error: unknown): boolean => {
  if (error instanceof RateLimitError) return true;

  if (error instanceof StoreError) {
    const status = error.details?.status;
    if (typeof status === 'number') return status >= 500 || status === 429;
    return error.originalError !== undefined && isTransientError(error.originalError);
  }

  if (!(error instanceof Error) || error instanceof AppError) return false;

  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some(fragment => message.includes(fragment));
};

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
