import type { ApiErrorCode } from '@sensor-registry/shared-types';

export class AppError extends Error {
  constructor(
    readonly code: ApiErrorCode,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class DuplicateDeviceError extends AppError {
  constructor(deviceId: string) {
    super('DUPLICATE_DEVICE', `Device ${deviceId} already exists`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Cannot change device status from ${from} to ${to}`);
  }
}

export class InvalidCredentialsError extends AppError {
  constructor() {
    super('INVALID_CREDENTIALS', 'Invalid username or password');
  }
}

export class TokenExpiredError extends AppError {
  constructor() {
    super('TOKEN_EXPIRED', 'Token has expired');
  }
}

export class TokenInvalidSignatureError extends AppError {
  constructor() {
    super('TOKEN_INVALID_SIGNATURE', 'Token signature is invalid');
  }
}

export class PoolExhaustedError extends AppError {
  constructor(timeoutMs: number) {
    super('POOL_EXHAUSTED', `No database connection became available within ${timeoutMs}ms`);
  }
}

export class PoolClosedError extends AppError {
  constructor() {
    super('SERVICE_UNAVAILABLE', 'Connection pool is closed');
  }
}
