/**
 * Error types raised by the session core.
 * Callers switch on `code` to decide whether to retry, abort or start fresh.
 */

export type SessionErrorCode =
  | "ALREADY_ACTIVE"
  | "INVALID_STATE"
  | "DIRECTORY_CREATION_FAILED"
  | "MANIFEST_WRITE_FAILED"
  | "INVALID_ARGUMENT";

export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionError";
    this.code = code;
  }
}

/** Raised when a recording configuration file cannot be read or validated */
export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`Invalid configuration at ${path}: ${message}`, options);
    this.name = "ConfigError";
    this.path = path;
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
