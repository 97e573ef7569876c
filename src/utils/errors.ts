/**
 * Application errors
 *
 * Every error the API reports on purpose extends AppError, which carries the
 * HTTP status and a stable machine-readable code. The error middleware
 * serializes these; anything else becomes a 500.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get details(): unknown {
    return undefined;
  }
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'validation_error';

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super(message);
  }

  override get details(): ValidationIssue[] {
    return this.issues;
  }
}

export class UnauthorizedError extends AppError {
  readonly statusCode = 401;
  readonly code = 'unauthorized';
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'not_found';

  constructor(resource: string, key: string | number) {
    super(`${resource} ${key} not found`);
  }
}

export class DuplicateFilenameError extends AppError {
  readonly statusCode = 409;
  readonly code = 'duplicate_filename';

  constructor(readonly filename: string) {
    super(`Filename '${filename}' is already in use`);
  }
}

/**
 * The TTS provider (or writing its output) failed. The original error is kept
 * as `cause` so the admin sees what the provider reported.
 */
export class SynthesisFailure extends AppError {
  readonly statusCode = 502;
  readonly code = 'synthesis_failed';

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }

  override get details(): { cause: string } | undefined {
    if (this.cause === undefined) return undefined;
    return { cause: this.cause instanceof Error ? this.cause.message : String(this.cause) };
  }
}
