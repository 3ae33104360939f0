export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly isOperational: boolean;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Configuration Error: ${message}`, context);
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Validation Error: ${message}`, context);
  }
}

export class LedgerError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Ledger Error: ${message}`, context);
  }
}

export class StatusTransitionError extends AppError {
  readonly statusCode = 409;
  readonly isOperational = false;

  constructor(from: string, to: string, trackUri: string) {
    super(`Illegal status transition '${from || 'pending'}' -> '${to || 'pending'}'`, {
      trackUri,
      from,
      to,
    });
  }
}

export class DiscogsAPIError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Discogs API Error: ${message}`, context);
  }
}

export class ScrapingError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Scraping Error: ${message}`, context);
  }
}

export class RetrievalError extends AppError {
  readonly statusCode = 503;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
  }
}

export class TaggingError extends AppError {
  readonly statusCode = 500;
  readonly isOperational = true;

  constructor(message: string, context?: Record<string, unknown>) {
    super(`Tagging Error: ${message}`, context);
  }
}
