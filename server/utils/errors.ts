/**
 * Domain error classes. Each carries the HTTP status the error handler
 * answers with; services throw these instead of bare Error.
 */

export interface CustomError extends Error {
  readonly statusCode: number;
}

/**
 * Bad input: schema failures, duplicate SKUs, cross-field rules such as a
 * payment larger than the remaining debt.
 */
export class ValidationError extends Error implements CustomError {
  readonly name = 'ValidationError' as const;
  readonly statusCode = 400 as const;
  readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message);
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class UnauthorizedError extends Error implements CustomError {
  readonly name = 'UnauthorizedError' as const;
  readonly statusCode = 401 as const;

  constructor(message: string = 'Unauthorized') {
    super(message);
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

/**
 * @example
 * throw new NotFoundError('Sale not found', 'sale', 42);
 */
export class NotFoundError extends Error implements CustomError {
  readonly name = 'NotFoundError' as const;
  readonly statusCode = 404 as const;
  readonly resourceType: string | null;
  readonly resourceId: string | number | null;

  constructor(
    message: string = 'Resource not found',
    resourceType: string | null = null,
    resourceId: string | number | null = null
  ) {
    super(message);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** The request is valid but collides with existing records. */
export class ConflictError extends Error implements CustomError {
  readonly name = 'ConflictError' as const;
  readonly statusCode = 409 as const;

  constructor(message: string = 'Resource conflict') {
    super(message);
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export type StockKind = 'retail' | 'wholesale';

export class InsufficientStockError extends Error implements CustomError {
  readonly name = 'InsufficientStockError' as const;
  readonly statusCode = 409 as const;
  readonly itemName: string;
  readonly itemKind: StockKind;
  readonly available: number;
  readonly requested: number;

  constructor(itemName: string, itemKind: StockKind, available: number, requested: number) {
    const unit = itemKind === 'wholesale' ? ' cartons' : '';
    super(
      `Insufficient stock for ${itemName}. Available: ${available}${unit}, Requested: ${requested}${unit}`
    );
    this.itemName = itemName;
    this.itemKind = itemKind;
    this.available = available;
    this.requested = requested;
    Object.setPrototypeOf(this, InsufficientStockError.prototype);
  }
}

/** A report renderer (e.g. the PDF library) could not be loaded. */
export class ReportUnavailableError extends Error implements CustomError {
  readonly name = 'ReportUnavailableError' as const;
  readonly statusCode = 503 as const;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, ReportUnavailableError.prototype);
  }
}

export function isCustomError(error: unknown): error is CustomError {
  return (
    error instanceof ValidationError ||
    error instanceof UnauthorizedError ||
    error instanceof NotFoundError ||
    error instanceof ConflictError ||
    error instanceof InsufficientStockError ||
    error instanceof ReportUnavailableError
  );
}
