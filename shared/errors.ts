export enum ErrorCode {
  // Configuration
  INVALID_CONFIG = "INVALID_CONFIG",
  API_KEY_MISSING = "API_KEY_MISSING",
  NOT_INITIALIZED = "NOT_INITIALIZED",
  INITIALIZATION_ERROR = "INITIALIZATION_ERROR",

  // Assistant related
  ASSISTANT_ERROR = "ASSISTANT_ERROR",
  ASSISTANT_TIMEOUT = "ASSISTANT_TIMEOUT",
  VALIDATION_ERROR = "VALIDATION_ERROR",

  // Ingestion
  INVALID_PAYLOAD = "INVALID_PAYLOAD",

  // Storage
  STORAGE_ERROR = "STORAGE_ERROR",

  // General
  UNKNOWN = "UNKNOWN",
}

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.INVALID_CONFIG]: "Invalid configuration value",
  [ErrorCode.API_KEY_MISSING]: "Please configure API Key",
  [ErrorCode.NOT_INITIALIZED]: "Assistant not initialized",
  [ErrorCode.INITIALIZATION_ERROR]: "Assistant initialization failed",
  [ErrorCode.ASSISTANT_ERROR]: "Assistant request failed",
  [ErrorCode.ASSISTANT_TIMEOUT]: "Assistant did not answer in time",
  [ErrorCode.VALIDATION_ERROR]: "Response format error",
  [ErrorCode.INVALID_PAYLOAD]: "Collector payload could not be read",
  [ErrorCode.STORAGE_ERROR]: "Session storage failed",
  [ErrorCode.UNKNOWN]: "An unknown error occurred, please try again",
};

export function getErrorMessage(code: ErrorCode | string): string {
  if (Object.prototype.hasOwnProperty.call(ERROR_MESSAGES, code)) {
    return ERROR_MESSAGES[code as ErrorCode];
  }
  return ERROR_MESSAGES[ErrorCode.UNKNOWN];
}

export class ServiceError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "ServiceError";
  }
}

/**
 * Normalize anything thrown into a ServiceError, keeping the original as details
 */
export function toServiceError(error: unknown, fallbackCode: ErrorCode = ErrorCode.UNKNOWN): ServiceError {
  if (error instanceof ServiceError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ServiceError(fallbackCode, message || getErrorMessage(fallbackCode), error);
}
