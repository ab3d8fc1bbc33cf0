export { AppError, ErrorCode, ERROR_STATUS_MAP } from "./AppError";
export type { ErrorDetails } from "./AppError";
export {
  ValidationError,
  NotFoundError,
  ConflictError,
  AuthenticationError,
  TransientInfrastructureError,
} from "./DomainErrors";
export type { AuthenticationErrorCode } from "./DomainErrors";
