import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Body of every error response.
 */
export interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId?: string;
    stack?: string;
  };
}

/**
 * Base API exception that extends Hono's HTTPException.
 * Carries a machine-readable code and optional details next to the message.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'email' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  /**
   * Converts the exception to the error envelope.
   */
  toJSON(): ErrorBody {
    const body: ErrorBody = {
      success: false,
      error: {
        code: this.code,
        message: this.message,
      },
    };
    if (this.details !== undefined) {
      body.error.details = this.details;
    }
    return body;
  }

  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

/**
 * One entry of `InputValidationException#details`.
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: ValidationIssue[]) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: Pick<ZodError, 'issues'>): InputValidationException {
    const issues: ValidationIssue[] = error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

export class NotFoundException extends ApiException {
  constructor(resource: string = 'Resource', id?: string | number) {
    super(
      id === undefined ? `${resource} not found` : `${resource} with id '${id}' not found`,
      404,
      'NOT_FOUND'
    );
    this.name = 'NotFoundException';
  }
}

export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationException';
  }
}
