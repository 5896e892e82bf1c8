export type ErrorKind =
  | 'unauthenticated'
  | 'transport'
  | 'validation'
  | 'not_found'
  | 'analysis'
  | 'configuration'
  | 'auth';

export type AuthFailureReason =
  | 'invalid_credentials'
  | 'email_not_confirmed'
  | 'weak_password'
  | 'already_registered'
  | 'rate_limited'
  | 'network'
  | 'unknown';

export class AppError extends Error {
  kind: ErrorKind;
  status: number;
  code: number;
  details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    status: number,
    code: number,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.kind = kind;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export class AuthFailure extends AppError {
  reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string, options?: { cause?: unknown }) {
    super('auth', AUTH_STATUS[reason], AUTH_CODES[reason], message, { reason }, options);
    this.name = 'AuthFailure';
    this.reason = reason;
  }
}

const AUTH_STATUS: Record<AuthFailureReason, number> = {
  invalid_credentials: 401,
  email_not_confirmed: 403,
  weak_password: 422,
  already_registered: 409,
  rate_limited: 429,
  network: 503,
  unknown: 500
};

const AUTH_CODES: Record<AuthFailureReason, number> = {
  invalid_credentials: 40111,
  email_not_confirmed: 40311,
  weak_password: 42211,
  already_registered: 40911,
  rate_limited: 42911,
  network: 50311,
  unknown: 50011
};

export function unauthenticated(message = 'Sign in to continue'): AppError {
  return new AppError('unauthenticated', 401, 40101, message);
}

export function notFound(what: 'entry' | 'profile', id: string): AppError {
  const code = what === 'entry' ? 40401 : 40402;
  const label = what === 'entry' ? 'Journal entry' : 'Profile';
  return new AppError('not_found', 404, code, `${label} not found`, { id });
}

export function validationError(message: string, details?: Record<string, unknown>): AppError {
  return new AppError('validation', 422, 42201, message, details);
}

export function transportError(operation: string, cause: unknown): AppError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new AppError(
    'transport',
    502,
    50201,
    `${operation} failed`,
    { operation, reason },
    { cause }
  );
}

export function configurationError(message: string): AppError {
  return new AppError('configuration', 503, 50301, message);
}

export function analysisFailure(message: string, cause?: unknown): AppError {
  return new AppError('analysis', 502, 50202, message, undefined, { cause });
}

const AUTH_MESSAGES: Record<AuthFailureReason, string> = {
  invalid_credentials: 'Invalid email or password',
  email_not_confirmed: 'Please check your email and confirm your account',
  weak_password: 'Password must be at least 6 characters',
  already_registered: 'An account with this email already exists',
  rate_limited: 'Too many attempts. Please wait a moment and try again.',
  network: 'Network connection error. Please try again.',
  unknown: 'Something went wrong. Please try again.'
};

export const GENERIC_MESSAGE = 'Something went wrong. Please try again.';

/**
 * Maps any error to one of a closed set of user-facing messages. Raw transport
 * text never reaches the user.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof AuthFailure) {
    return AUTH_MESSAGES[error.reason];
  }
  if (!(error instanceof AppError)) {
    return GENERIC_MESSAGE;
  }
  switch (error.kind) {
    case 'unauthenticated':
      return 'Your session has ended. Please sign in again.';
    case 'transport':
      return 'Network connection error. Please try again.';
    case 'validation':
    case 'not_found':
      return error.message;
    case 'analysis':
      return 'AI analysis is unavailable right now.';
    case 'configuration':
      return 'AI analysis is not configured.';
    default:
      return GENERIC_MESSAGE;
  }
}
