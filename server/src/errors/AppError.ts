export type ErrorCode =
  | 'InvalidInput'
  | 'NotAuthorized'
  | 'RateLimited'
  | 'TargetUnreachable'
  | 'ModelUnavailable'
  | 'NotFound'
  | 'ConfigurationError';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, status: number, message: string) {
    super(message);
    this.name = `${code}Error`;
    this.code = code;
    this.status = status;
  }
}

/** Malformed URL, e-mail or request body. */
export class InvalidInputError extends AppError {
  constructor(message: string) {
    super('InvalidInput', 400, message);
  }
}

/** Scan refused before any work was done. */
export class NotAuthorizedError extends AppError {
  constructor(message: string) {
    super('NotAuthorized', 403, message);
  }
}

export class RateLimitedError extends AppError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super(
      'RateLimited',
      429,
      `Rate limit exceeded. Please wait ${Math.ceil(retryAfterSeconds / 60)} minute(s) before scanning again.`
    );
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class TargetUnreachableError extends AppError {
  constructor(host: string, reason: string) {
    super('TargetUnreachable', 502, `Target ${host} is unreachable: ${reason}`);
  }
}

export class ModelUnavailableError extends AppError {
  constructor(message: string) {
    super('ModelUnavailable', 503, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFound', 404, message);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super('ConfigurationError', 500, message);
  }
}

/** System errors from node (`ECONNREFUSED`, `ENODATA`, ...) carry a string `code`. */
export const hasErrorCode = (err: unknown): err is { code: string } =>
  typeof err === 'object' &&
  err !== null &&
  'code' in err &&
  typeof err.code === 'string';
