// lib/errors.ts

/** Local input problems (file type, size, quiz count). Raised before any provider call. */
export class ValidationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** A failed provider call. `message` is the provider's own wording and is shown to the user as is. */
export class ProviderError extends Error {
  readonly status: number;

  constructor(message: string, status = 502, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
    this.status = status;
  }
}

export class SessionError extends Error {
  readonly status = 401;

  constructor(message = "No active session. Reload the page to start a new one.") {
    super(message);
    this.name = "SessionError";
  }
}

export class ConfigError extends Error {
  readonly status = 500;

  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type AppError = ValidationError | ProviderError | SessionError | ConfigError;

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof ValidationError ||
    error instanceof ProviderError ||
    error instanceof SessionError ||
    error instanceof ConfigError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
