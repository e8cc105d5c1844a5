export type ErrorCode =
  | "VALIDATION_FAILED"
  | "NOT_FOUND"
  | "CONFLICT"
  | "PROVIDER_FAILED"
  | "CONNECTOR_FETCH_FAILED";

export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  serialize() {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("VALIDATION_FAILED", message, options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super("CONFLICT", message);
  }
}

/** Embedding computation failed or produced a vector of the wrong size. */
export class ProviderError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("PROVIDER_FAILED", message, options);
  }
}

export class ConnectorFetchError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONNECTOR_FETCH_FAILED", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
