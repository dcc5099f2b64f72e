import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Base class for failures of the upload/download flow.
 * The response body carries a stable `code` picked up by HttpExceptionFilter.
 */
export abstract class AddonUploadError extends HttpException {
  readonly code: string;

  protected constructor(code: string, message: string, status: HttpStatus) {
    super({ code, message }, status);
    this.code = code;
  }
}

/** Anti-forgery token missing or not matching the form. */
export class SecurityError extends AddonUploadError {
  constructor(message = 'Security check failed. Please try again.') {
    super('SECURITY_CHECK_FAILED', message, HttpStatus.FORBIDDEN);
  }
}

/** Extension outside the allow-set, or content that does not match it. */
export class InvalidTypeError extends AddonUploadError {
  constructor(allowedExts: readonly string[]) {
    super(
      'INVALID_FILE_TYPE',
      `Invalid file type. Allowed types: ${allowedExts.join(', ')}.`,
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

export class StorageError extends AddonUploadError {
  constructor(message: string) {
    super('STORAGE_FAILED', message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

/** File exists but could not be removed. Operator-visible only. */
export class DeletionError extends AddonUploadError {
  constructor(message = 'Failed to delete the file.') {
    super('DELETION_FAILED', message, HttpStatus.INTERNAL_SERVER_ERROR);
  }
}

export class NotFoundError extends AddonUploadError {
  constructor(message = 'File not found.') {
    super('FILE_NOT_FOUND', message, HttpStatus.NOT_FOUND);
  }
}

/** Download gate called without the expected action/file parameters. */
export class UnauthorizedAccessError extends AddonUploadError {
  constructor() {
    super('UNAUTHORIZED_ACCESS', 'Unauthorized access.', HttpStatus.FORBIDDEN);
  }
}

/** Errors that reject an upload without failing the surrounding cart action. */
export const isUploadRejection = (
  error: unknown,
): error is SecurityError | InvalidTypeError | StorageError =>
  error instanceof SecurityError ||
  error instanceof InvalidTypeError ||
  error instanceof StorageError;
