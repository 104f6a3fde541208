/**
 * Custom error types for the login sentinel
 */

export class SentinelError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SentinelError";
    Object.setPrototypeOf(this, SentinelError.prototype);
  }
}

export class ValidationError extends SentinelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Validation failed: ${message}`,
      "VALIDATION_ERROR",
      400,
      details
    );
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class StorageError extends SentinelError {
  constructor(
    message: string,
    public operation: string,
    public key?: string,
    public originalError?: Error
  ) {
    super(
      `Storage error (${operation}): ${message}`,
      "STORAGE_ERROR",
      503,
      { operation, key, originalError: originalError?.message }
    );
    this.name = "StorageError";
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class ConfigurationError extends SentinelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Configuration error: ${message}`,
      "CONFIGURATION_ERROR",
      500,
      details
    );
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class AuthenticationError extends SentinelError {
  constructor(message: string) {
    super(message, "UNAUTHORIZED", 401);
    this.name = "AuthenticationError";
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
