// server/src/lib/errors.ts

export type ErrorDetails = Record<string, unknown>;

export class AppError extends Error {
  readonly statusCode: number;
  readonly details: ErrorDetails;

  constructor(message: string, statusCode = 500, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication failed', details: ErrorDetails = {}) {
    super(message, 401, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details: ErrorDetails = {}) {
    super(message, 404, details);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details: ErrorDetails = {}) {
    super(message, 422, details);
  }
}

export class InvalidQuantityError extends ValidationError {
  constructor(quantity: unknown) {
    super(`quantity must be a positive integer, got ${String(quantity)}`, { field: 'quantity', value: quantity });
  }
}

export class InvalidFactorError extends ValidationError {
  constructor(factor: unknown) {
    super(`performance_factor must be a positive number with at most 2 decimals (<= 9999.99), got ${String(factor)}`, {
      field: 'performanceFactor',
      value: factor,
    });
  }
}

export class DuplicateImportError extends AppError {
  constructor(key: string) {
    super(`Production info already imported: ${key}`, 409, { key });
  }
}

export class UnmatchedOrderError extends AppError {
  constructor(orderNo: string, jobType: string) {
    super(`No production info for order ${orderNo} / ${jobType}`, 404, { orderNo, jobType });
  }
}

export class FileUploadError extends AppError {
  constructor(message = 'File upload failed', details: ErrorDetails = {}) {
    super(message, 400, details);
  }
}
