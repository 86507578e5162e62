export type AppErrorCode =
  | "CONFIG_ERROR"
  | "AUTH_ERROR"
  | "NETWORK_ERROR"
  | "GENERATION_ERROR";

export interface AppErrorOptions {
  /** HTTP status code, when the failure came from a response */
  status?: number;
  cause?: unknown;
}

/**
 * Base class for the errors the pipeline raises on purpose.
 */
export class AppError extends Error {
  public readonly status?: number;

  constructor(
    message: string,
    public readonly code: AppErrorCode,
    options: AppErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "AppError";
    this.status = options.status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A required setting or credential is missing or invalid. */
export class ConfigError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

/** A remote service rejected our credentials or permissions. */
export class AuthError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "AUTH_ERROR", options);
    this.name = "AuthError";
  }
}

/** Transport failure or an unexpected HTTP status. */
export class NetworkError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "NETWORK_ERROR", options);
    this.name = "NetworkError";
  }
}

/** A generation backend failed or returned something unusable. */
export class GenerationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(message, "GENERATION_ERROR", options);
    this.name = "GenerationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a non-success HTTP status to the matching error kind.
 */
export function httpError(service: string, status: number, body: string): AuthError | NetworkError {
  const message = `${service} responded with ${status}${body ? `: ${body}` : ""}`;
  if (status === 401 || status === 403) {
    return new AuthError(message, { status });
  }
  return new NetworkError(message, { status });
}
