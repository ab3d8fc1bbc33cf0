import { AppError, ERROR_STATUS_MAP, ErrorCode, ErrorDetails } from "./AppError";

/**
 * Malformed input: empty names, unknown effects, malformed condition shapes,
 * invalid configuration.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly entityId: string,
  ) {
    super(
      ErrorCode.RESOURCE_NOT_FOUND,
      `${entity} not found`,
      404,
      true,
      { entity, id: entityId },
    );
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.RESOURCE_CONFLICT, message, 409, true, details);
  }
}

export type AuthenticationErrorCode =
  | ErrorCode.INVALID_CREDENTIALS
  | ErrorCode.ACCOUNT_INACTIVE
  | ErrorCode.ACCOUNT_LOCKED
  | ErrorCode.TOKEN_INVALID
  | ErrorCode.TOKEN_EXPIRED
  | ErrorCode.TOKEN_MISSING;

export class AuthenticationError extends AppError {
  constructor(
    code: AuthenticationErrorCode,
    message?: string,
    details?: ErrorDetails,
  ) {
    super(
      code,
      message ?? ERROR_STATUS_MAP[code].defaultMessage,
      401,
      true,
      details,
    );
  }

  static accountLocked(lockedUntil: Date): AuthenticationError {
    return new AuthenticationError(
      ErrorCode.ACCOUNT_LOCKED,
      `Account is locked until ${lockedUntil.toISOString()}`,
      { lockedUntil: lockedUntil.toISOString() },
    );
  }
}

/**
 * Cache or store temporarily unavailable. Only this error class is retried.
 */
export class TransientInfrastructureError extends AppError {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(ErrorCode.TRANSIENT_INFRASTRUCTURE, message, 503, true);
  }
}
