export enum ErrorCode {
  // Authentication errors
  INVALID_CREDENTIALS = "INVALID_CREDENTIALS",
  ACCOUNT_INACTIVE = "ACCOUNT_INACTIVE",
  ACCOUNT_LOCKED = "ACCOUNT_LOCKED",
  TOKEN_EXPIRED = "TOKEN_EXPIRED",
  TOKEN_INVALID = "TOKEN_INVALID",
  TOKEN_MISSING = "TOKEN_MISSING",

  // Validation errors
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Resource errors
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  RESOURCE_CONFLICT = "RESOURCE_CONFLICT",

  // System errors
  TRANSIENT_INFRASTRUCTURE = "TRANSIENT_INFRASTRUCTURE",
  INTERNAL_SERVER_ERROR = "INTERNAL_SERVER_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly details?: ErrorDetails;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    details?: ErrorDetails,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  static fromErrorCode(
    code: ErrorCode,
    message?: string,
    details?: ErrorDetails,
  ): AppError {
    const errorConfig = ERROR_STATUS_MAP[code];
    return new AppError(
      code,
      message || errorConfig.defaultMessage,
      errorConfig.statusCode,
      true,
      details,
    );
  }
}

// Status code mapping for error codes
export const ERROR_STATUS_MAP: Record<
  ErrorCode,
  { statusCode: number; defaultMessage: string }
> = {
  [ErrorCode.INVALID_CREDENTIALS]: {
    statusCode: 401,
    defaultMessage: "Invalid credentials",
  },
  [ErrorCode.ACCOUNT_INACTIVE]: {
    statusCode: 401,
    defaultMessage: "Account is inactive",
  },
  [ErrorCode.ACCOUNT_LOCKED]: {
    statusCode: 401,
    defaultMessage: "Account is locked",
  },
  [ErrorCode.TOKEN_EXPIRED]: {
    statusCode: 401,
    defaultMessage: "Token has expired",
  },
  [ErrorCode.TOKEN_INVALID]: {
    statusCode: 401,
    defaultMessage: "Invalid token provided",
  },
  [ErrorCode.TOKEN_MISSING]: {
    statusCode: 401,
    defaultMessage: "Authentication token is required",
  },
  [ErrorCode.VALIDATION_ERROR]: {
    statusCode: 400,
    defaultMessage: "Validation failed",
  },
  [ErrorCode.RESOURCE_NOT_FOUND]: {
    statusCode: 404,
    defaultMessage: "Resource not found",
  },
  [ErrorCode.RESOURCE_CONFLICT]: {
    statusCode: 409,
    defaultMessage: "Resource already exists",
  },
  [ErrorCode.TRANSIENT_INFRASTRUCTURE]: {
    statusCode: 503,
    defaultMessage: "A backing service is temporarily unavailable",
  },
  [ErrorCode.INTERNAL_SERVER_ERROR]: {
    statusCode: 500,
    defaultMessage: "Internal server error",
  },
};
