/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In service
 * throw new FeatureLoadError('Features file is not valid JSON', ErrorCode.FEATURES_FILE_INVALID);
 *
 * // In a gRPC handler
 * callback(toServiceError(error));
 * ```
 *
 * Every AppError carries the gRPC status it maps to, so handlers never pick
 * status codes themselves.
 * =============================================================================
 */

import { status as GrpcStatus, Metadata } from '@grpc/grpc-js';
import type { StatusObject } from '@grpc/grpc-js';
import { ErrorCode } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly grpcStatus: GrpcStatus;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: string;

  constructor(
    message: string,
    grpcStatus: GrpcStatus = GrpcStatus.INTERNAL,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.grpcStatus = grpcStatus;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;
    this.timestamp = new Date().toISOString();

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to the status object a gRPC callback or stream expects
   */
  toStatus(): Partial<StatusObject> {
    const metadata = new Metadata();
    metadata.set('error-code', this.code);
    return {
      code: this.grpcStatus,
      details: this.message,
      metadata
    };
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * INVALID_ARGUMENT - inbound message does not match the wire schema
 */
export class InvalidArgumentError extends AppError {
  public readonly issues: MessageIssue[];

  constructor(
    message: string = 'Invalid message',
    issues: MessageIssue[] = [],
    code: ErrorCode | string = ErrorCode.INVALID_MESSAGE
  ) {
    super(message, GrpcStatus.INVALID_ARGUMENT, code, true, { issues });
    this.issues = issues;
  }

  static fromZodError(
    messageType: string,
    zodError: { issues: Array<{ path: (string | number)[]; message: string }> }
  ): InvalidArgumentError {
    const issues = zodError.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message
    }));
    const summary = issues.map(i => (i.field ? `${i.field}: ${i.message}` : i.message)).join('; ');
    return new InvalidArgumentError(`Invalid ${messageType}: ${summary}`, issues);
  }
}

export interface MessageIssue {
  field: string;
  message: string;
}

/**
 * FAILED_PRECONDITION - operation issued in a state that does not allow it
 */
export class FailedPreconditionError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string,
    details?: Record<string, unknown>
  ) {
    super(message, GrpcStatus.FAILED_PRECONDITION, code, true, details);
  }
}

/**
 * Feature dataset could not be loaded. Fatal at startup.
 */
export class FeatureLoadError extends AppError {
  constructor(
    message: string,
    code: ErrorCode | string = ErrorCode.FEATURES_FILE_INVALID,
    details?: Record<string, unknown>
  ) {
    super(message, GrpcStatus.UNAVAILABLE, code, false, details);
  }
}

/**
 * INTERNAL - unexpected error
 */
export class InternalError extends AppError {
  constructor(
    message: string = 'Internal server error',
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, GrpcStatus.INTERNAL, code, false, details);
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

/**
 * Map any thrown value to a gRPC status.
 * Unknown errors never leak their message to the caller.
 */
export function toServiceError(error: unknown): Partial<StatusObject> {
  if (error instanceof AppError) {
    return error.toStatus();
  }
  return new InternalError().toStatus();
}
