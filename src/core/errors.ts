/**
 * Error types for modelhub.
 *
 * Every error raised by the core extends ModelHubError so callers can branch
 * on `code` and decide on retries via `retryable`; the core never retries.
 */

export type ModelHubErrorCode =
  | "AUTHENTICATION_REQUIRED"
  | "BACKEND_UNREACHABLE"
  | "TIMEOUT"
  | "UNSUPPORTED_OPERATION"
  | "SCHEMA_VIOLATION"
  | "INVALID_RESPONSE"
  | "BACKEND_ERROR"
  | "CANCELLED"
  | "HOST_SHUTDOWN"
  | "VALIDATION_ERROR"
  | "MODEL_NOT_FOUND"
  | "PROVIDER_NOT_FOUND"
  | "UNKNOWN";

export class ModelHubError extends Error {
  constructor(
    message: string,
    public readonly code: ModelHubErrorCode,
    public readonly retryable: boolean = false,
    public readonly details?: Record<string, unknown>,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "ModelHubError";
    Object.setPrototypeOf(this, ModelHubError.prototype);
  }
}

export class AuthenticationRequiredError extends ModelHubError {
  constructor(providerId: string) {
    super(
      `Provider ${providerId} is not authenticated: no reachable backend or no models available`,
      "AUTHENTICATION_REQUIRED",
      false,
      { providerId }
    );
    this.name = "AuthenticationRequiredError";
    Object.setPrototypeOf(this, AuthenticationRequiredError.prototype);
  }
}

export class BackendUnreachableError extends ModelHubError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    originalError?: unknown
  ) {
    super(message, "BACKEND_UNREACHABLE", true, { url, status }, originalError);
    this.name = "BackendUnreachableError";
    Object.setPrototypeOf(this, BackendUnreachableError.prototype);
  }
}

export class TimeoutError extends ModelHubError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, "TIMEOUT", true, { timeoutMs });
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

export class UnsupportedOperationError extends ModelHubError {
  constructor(operation: string, providerId: string) {
    super(
      `${operation} is not supported by provider ${providerId}`,
      "UNSUPPORTED_OPERATION",
      false,
      { operation, providerId }
    );
    this.name = "UnsupportedOperationError";
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}

export class SchemaViolationError extends ModelHubError {
  constructor(toolName: string, public readonly issues: string[]) {
    super(
      `Output for tool ${toolName} does not match the requested schema: ${issues.join("; ")}`,
      "SCHEMA_VIOLATION",
      false,
      { toolName, issues }
    );
    this.name = "SchemaViolationError";
    Object.setPrototypeOf(this, SchemaViolationError.prototype);
  }
}

export class InvalidResponseError extends ModelHubError {
  constructor(message: string, public readonly payload?: string) {
    super(`Invalid backend response: ${message}`, "INVALID_RESPONSE", false, { payload });
    this.name = "InvalidResponseError";
    Object.setPrototypeOf(this, InvalidResponseError.prototype);
  }
}

/**
 * Error reported by the backend itself inside an otherwise valid response.
 */
export class BackendError extends ModelHubError {
  constructor(message: string, public readonly providerId: string) {
    super(message, "BACKEND_ERROR", false, { providerId });
    this.name = "BackendError";
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}

export class CancelledError extends ModelHubError {
  constructor(message = "Operation cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

export class HostShutdownError extends ModelHubError {
  constructor() {
    super("Host application is shutting down", "HOST_SHUTDOWN");
    this.name = "HostShutdownError";
    Object.setPrototypeOf(this, HostShutdownError.prototype);
  }
}

export class ValidationError extends ModelHubError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, "VALIDATION_ERROR", false, details);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ModelNotFoundError extends ModelHubError {
  constructor(providerId: string, modelId: string) {
    super(`Model ${modelId} not found in provider ${providerId}`, "MODEL_NOT_FOUND", false, {
      providerId,
      modelId,
    });
    this.name = "ModelNotFoundError";
    Object.setPrototypeOf(this, ModelNotFoundError.prototype);
  }
}

export class ProviderNotFoundError extends ModelHubError {
  constructor(providerId: string) {
    super(`Provider not found: ${providerId}`, "PROVIDER_NOT_FOUND", false, { providerId });
    this.name = "ProviderNotFoundError";
    Object.setPrototypeOf(this, ProviderNotFoundError.prototype);
  }
}

/**
 * Normalize anything thrown into a ModelHubError.
 */
export function toModelHubError(error: unknown): ModelHubError {
  if (error instanceof ModelHubError) {
    return error;
  }
  if (error instanceof Error) {
    return new ModelHubError(error.message, "UNKNOWN", false, undefined, error);
  }
  return new ModelHubError(String(error), "UNKNOWN");
}

export function isRetryable(error: unknown): boolean {
  return error instanceof ModelHubError && error.retryable;
}
