import type { HttpMethod, TransportResponse } from '../config/types.js';

/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * URL validation error (400)
 */
export class UrlValidationError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 400, 'INVALID_URL');
    this.url = url;
  }
}

/**
 * Remote host could not be reached; no HTTP response exists
 */
export class NetworkError extends AppError {
  public readonly url: string;
  public readonly causeCode?: string;

  constructor(url: string, causeCode?: string, detail?: string) {
    super(
      `Network error: Could not reach ${url}${detail ? ` (${detail})` : ''}`,
      502,
      'NETWORK_ERROR'
    );
    this.url = url;
    this.causeCode = causeCode;
  }
}

/**
 * Redirect chain longer than the configured limit
 */
export class InfiniteRedirectError extends AppError {
  public readonly url: string;
  public readonly limit: number;
  public readonly chain: readonly string[];

  constructor(url: string, limit: number, chain: readonly string[]) {
    super(
      `Redirected more than ${limit} times, check for infinite redirects (last URL: ${url})`,
      508,
      'INFINITE_REDIRECT'
    );
    this.url = url;
    this.limit = limit;
    this.chain = chain;
  }
}

/**
 * Error status received while server errors are raised
 */
export class ServerError extends AppError {
  public readonly method: HttpMethod;
  public readonly path: string;
  public readonly response: TransportResponse;

  constructor(method: HttpMethod, path: string, response: TransportResponse) {
    const reason = response.statusText
      ? `${response.status} ${response.statusText}`
      : `${response.status}`;
    super(
      `Received the following error for a ${method} request to ${path}: '${reason}'`,
      response.status,
      'SERVER_ERROR'
    );
    this.method = method;
    this.path = path;
    this.response = response;
  }
}

/**
 * Element cannot take the requested action
 */
export class ElementError extends AppError {
  public readonly tagName: string;

  constructor(message: string, tagName: string) {
    super(message, 422, 'ELEMENT_ERROR');
    this.tagName = tagName;
  }
}
