// ---------------------------------------------------------------------------
// Error codes and PhiError class
// ---------------------------------------------------------------------------

export enum ErrorCode {
  // Keys
  KEY_UNAVAILABLE = "KEY_UNAVAILABLE",

  // Cipher operations
  ENCRYPTION_FAILURE = "ENCRYPTION_FAILURE",
  DECRYPTION_FAILURE = "DECRYPTION_FAILURE",

  // Schema / codec
  SCHEMA_DRIFT = "SCHEMA_DRIFT",
  FIELD_NOT_SEARCHABLE = "FIELD_NOT_SEARCHABLE",

  // Validation
  INVALID_INPUT = "INVALID_INPUT",
  CONFIG_INVALID = "CONFIG_INVALID",

  // Records
  RECORD_NOT_FOUND = "RECORD_NOT_FOUND",

  // System
  DATABASE_ERROR = "DATABASE_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

// Recovered per field by the codec; everything else aborts the enclosing operation.
const RECOVERABLE: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.DECRYPTION_FAILURE,
  ErrorCode.SCHEMA_DRIFT,
]);

export class PhiError extends Error {
  readonly code: ErrorCode;
  readonly recoverable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PhiError";
    this.code = code;
    this.recoverable = RECOVERABLE.has(code);
    this.details = details;
  }

  static keyUnavailable(detail: string, cause?: unknown): PhiError {
    return new PhiError(ErrorCode.KEY_UNAVAILABLE, `Key unavailable: ${detail}`, undefined, {
      cause,
    });
  }

  static encryptionFailure(entityKind: string, fieldName: string, cause?: unknown): PhiError {
    const reason = cause instanceof Error ? `: ${cause.message}` : "";
    return new PhiError(
      ErrorCode.ENCRYPTION_FAILURE,
      `Failed to encrypt ${entityKind}.${fieldName}${reason}`,
      { entityKind, fieldName },
      { cause },
    );
  }

  static decryptionFailure(detail: string, cause?: unknown): PhiError {
    return new PhiError(ErrorCode.DECRYPTION_FAILURE, `Decryption failed: ${detail}`, undefined, {
      cause,
    });
  }

  static schemaDrift(entityKind: string, fieldName: string, detail: string): PhiError {
    return new PhiError(
      ErrorCode.SCHEMA_DRIFT,
      `Unreadable value for ${entityKind}.${fieldName}: ${detail}`,
      { entityKind, fieldName },
    );
  }

  static fieldNotSearchable(entityKind: string, fieldName: string): PhiError {
    return new PhiError(
      ErrorCode.FIELD_NOT_SEARCHABLE,
      `${entityKind}.${fieldName} is randomly encrypted and cannot be searched`,
      { entityKind, fieldName },
    );
  }

  static invalidInput(message: string): PhiError {
    return new PhiError(ErrorCode.INVALID_INPUT, message);
  }

  static configInvalid(message: string, issues?: string[]): PhiError {
    return new PhiError(ErrorCode.CONFIG_INVALID, message, issues ? { issues } : undefined);
  }

  static recordNotFound(collection: string, id: string): PhiError {
    return new PhiError(ErrorCode.RECORD_NOT_FOUND, `Record not found: ${collection}/${id}`);
  }

  static databaseError(message: string, cause?: unknown): PhiError {
    return new PhiError(ErrorCode.DATABASE_ERROR, message, undefined, { cause });
  }

  static fileIoError(message: string, cause?: unknown): PhiError {
    return new PhiError(ErrorCode.FILE_IO_ERROR, message, undefined, { cause });
  }

  static internalError(message: string): PhiError {
    return new PhiError(ErrorCode.INTERNAL_ERROR, message);
  }
}

export function isPhiError(err: unknown, code?: ErrorCode): err is PhiError {
  return err instanceof PhiError && (code === undefined || err.code === code);
}

// ---------------------------------------------------------------------------
// Result type for operations whose failure mode the caller decides
// ---------------------------------------------------------------------------

export type Result<T, E = PhiError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Unwrap a result, throwing its error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}
