/**
 * Standardized error codes for HTTP responses.
 */
export enum HttpErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED_MEDIA_TYPE',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

/**
 * Base class for all custom application errors.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: HttpErrorCode;

  public constructor(message: string, statusCode: number, code: HttpErrorCode) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Extra payload rendered under `error.details`. */
  public get details(): unknown {
    return undefined;
  }
}

/**
 * Represents a validation error (HTTP 422).
 */
export class ValidationError extends AppError {
  private readonly issues?: unknown[];

  public constructor(message: string, issues?: unknown[]) {
    super(message, 422, HttpErrorCode.VALIDATION_ERROR);
    this.issues = issues;
  }

  public override get details(): unknown {
    return this.issues;
  }
}

export type TagNameErrorReason = 'EMPTY_NAME' | 'INVALID_CHARACTERS' | 'TOO_LONG';

/**
 * A tag name that cannot be stored, even after normalization.
 */
export class TagNameError extends ValidationError {
  public readonly reason: TagNameErrorReason;

  public constructor(reason: TagNameErrorReason, message: string) {
    super(message, [{ path: ['name'], reason, message }]);
    this.reason = reason;
  }
}

/**
 * Represents a "not found" error (HTTP 404).
 */
export class NotFoundError extends AppError {
  public constructor(message = 'Resource not found') {
    super(message, 404, HttpErrorCode.NOT_FOUND);
  }
}

/**
 * Represents a duplicate resource error (HTTP 409).
 */
export class DuplicateError extends AppError {
  public constructor(message: string) {
    super(message, 409, HttpErrorCode.CONFLICT);
  }
}

/**
 * One or more ids in a request body point at nothing (HTTP 400).
 * Carries every offending id, not just the first.
 */
export class ReferentialError extends AppError {
  public readonly missingIds: string[];

  public constructor(message: string, missingIds: string[]) {
    super(message, 400, HttpErrorCode.INVALID_REFERENCE);
    this.missingIds = missingIds;
  }

  public override get details(): unknown {
    return { missingIds: this.missingIds };
  }
}
