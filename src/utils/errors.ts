// Standardized error types
// Infrastructure failures surface as AppError; tool failures are folded back into the conversation

export enum ErrorCode {
  BACKEND_ERROR = 'backend_error',
  UNAUTHORIZED = 'unauthorized',
  RATE_LIMITED = 'rate_limited',
  INVALID_RESPONSE = 'invalid_response',
  CONFIGURATION_ERROR = 'configuration_error',
  VALIDATION_ERROR = 'validation_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode?: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static backend(message: string, statusCode?: number, details?: unknown): AppError {
    return new AppError(ErrorCode.BACKEND_ERROR, message, statusCode, details);
  }

  static unauthorized(message: string = 'Unauthorized', statusCode: number = 401): AppError {
    return new AppError(ErrorCode.UNAUTHORIZED, message, statusCode);
  }

  static rateLimited(retryAfter: number | undefined, message: string = 'Too many requests'): AppError {
    return new AppError(ErrorCode.RATE_LIMITED, message, 429, { retryAfter });
  }

  static invalidResponse(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.INVALID_RESPONSE, message, undefined, details);
  }

  static configuration(message: string): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message);
  }

  static validation(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, undefined, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
