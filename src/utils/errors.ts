/**
 * Error taxonomy shared by repositories, services and controllers.
 * The error middleware turns any AppError into a response using its
 * statusCode and code; everything else becomes a generic 500.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Invalid request data') {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class InvalidTokenError extends AppError {
  constructor(message = 'Could not validate credentials') {
    super(message, 401, 'INVALID_TOKEN');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'You do not have permission to perform this action') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor() {
    super('User not found');
  }
}

export class DuplicateUserError extends AppError {
  constructor(message = 'Account already exists') {
    super(message, 400, 'DUPLICATE_USER');
  }
}

export class DuplicateEmailError extends AppError {
  constructor(message = 'Email address is already used by another contact') {
    super(message, 400, 'DUPLICATE_EMAIL');
  }
}

export class DuplicateRoleError extends AppError {
  constructor() {
    super('Role already exists', 400, 'DUPLICATE_ROLE');
  }
}

// Always surfaced after the enclosing transaction has been rolled back.
export class RepositoryError extends AppError {
  constructor(message = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type PgErrorLike = { code: string; constraint?: string };

export const isPgError = (error: unknown): error is PgErrorLike =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  typeof error.code === 'string';

export const isUniqueViolation = (error: unknown, constraint?: string): boolean =>
  isPgError(error) && error.code === '23505' && (!constraint || error.constraint === constraint);
