export enum ErrorCode {
  // Authentication
  UNAUTHORIZED = 'UNAUTHORIZED',

  // Validation
  INVALID_REQUEST = 'INVALID_REQUEST',

  // Lookup
  HUB_NOT_FOUND = 'HUB_NOT_FOUND',

  // External
  HOMGAR_API_ERROR = 'HOMGAR_API_ERROR',
  HOMGAR_RATE_LIMITED = 'HOMGAR_RATE_LIMITED',
  HOMGAR_UNAVAILABLE = 'HOMGAR_UNAVAILABLE',
  HOMGAR_INVALID_RESPONSE = 'HOMGAR_INVALID_RESPONSE',

  // Decoding
  STATUS_DECODE_FAILED = 'STATUS_DECODE_FAILED',

  // Internal
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface ErrorDetails {
  field?: string;
  received?: unknown;
  expected?: string;
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, statusCode: number, details?: ErrorDetails) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: ErrorCode; message: string; details?: ErrorDetails } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.INVALID_REQUEST, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(ErrorCode.UNAUTHORIZED, message, 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.HUB_NOT_FOUND, message, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Raised for transport failures and for envelopes with a non-zero `code`.
 * `homgarCode` holds the envelope code, or the HTTP status for transport errors.
 */
export class HomgarApiError extends AppError {
  public readonly homgarCode?: number;

  constructor(code: ErrorCode, message: string, statusCode: number, homgarCode?: number, details?: ErrorDetails) {
    super(code, message, statusCode, details);
    this.name = 'HomgarApiError';
    this.homgarCode = homgarCode;
  }

  static rejected(homgarCode: number | null, msg?: string | null): HomgarApiError {
    let message = `HomGar API returned code ${homgarCode ?? 'null'}`;
    if (msg) {
      message += ` ('${msg}')`;
    }
    return new HomgarApiError(ErrorCode.HOMGAR_API_ERROR, message, 502, homgarCode ?? undefined);
  }

  static rateLimited(): HomgarApiError {
    return new HomgarApiError(
      ErrorCode.HOMGAR_RATE_LIMITED,
      'HomGar API rate limit exceeded. Please try again later.',
      503,
      429
    );
  }

  static unavailable(message = 'HomGar API is unavailable', httpStatus?: number): HomgarApiError {
    return new HomgarApiError(ErrorCode.HOMGAR_UNAVAILABLE, message, 502, httpStatus);
  }

  static httpError(message: string, httpStatus: number): HomgarApiError {
    return new HomgarApiError(ErrorCode.HOMGAR_API_ERROR, message, 502, httpStatus);
  }

  static invalidResponse(message: string, details?: ErrorDetails): HomgarApiError {
    return new HomgarApiError(ErrorCode.HOMGAR_INVALID_RESPONSE, message, 502, undefined, details);
  }
}

/**
 * A status payload did not have the delimiter or numeric shape its decoder expects.
 * Only the record being decoded is affected.
 */
export class DeviceStatusDecodeError extends AppError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.STATUS_DECODE_FAILED, message, 502, details);
    this.name = 'DeviceStatusDecodeError';
  }
}

export function mapZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
  const firstIssue = zodError.issues[0];
  if (firstIssue === undefined) {
    return new ValidationError('Validation failed');
  }
  const field = firstIssue.path.join('.');
  return new ValidationError(firstIssue.message, { field });
}
