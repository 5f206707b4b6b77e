/**
 * Error classes for the Privacy Platform SDK
 */

import type {APIErrorResponse, ErrorContext} from '../types';

export class PlatformError extends Error {
  public readonly context?: ErrorContext;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.name = 'PlatformError';
    this.context = context;
    Object.setPrototypeOf(this, PlatformError.prototype);
  }
}

export class ConfigurationError extends PlatformError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class NetworkError extends PlatformError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Response body did not have the shape the SDK expects.
 */
export class DecodeError extends PlatformError {
  constructor(message: string, context?: ErrorContext) {
    super(message, context);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

export interface APIErrorDetails {
  status: number;
  requestId?: string;
  /** Structured `error` payload, when the server sent one */
  errorJson?: Record<string, unknown>;
  context?: ErrorContext;
}

/**
 * The server answered with a status >= 400.
 */
export class APIError extends PlatformError {
  public readonly status: number;
  public readonly requestId?: string;
  public readonly errorJson?: Record<string, unknown>;

  constructor(message: string, details: APIErrorDetails) {
    super(message, details.context);
    this.name = 'APIError';
    this.status = details.status;
    this.requestId = details.requestId;
    this.errorJson = details.errorJson;
    Object.setPrototypeOf(this, APIError.prototype);
  }

  toString(): string {
    const requestId = this.requestId ? `, request ${this.requestId}` : '';
    return `${this.name}: ${this.message} (HTTP ${this.status}${requestId})`;
  }
}

export class ValidationError extends APIError {
  constructor(message: string, details: APIErrorDetails) {
    super(message, details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class AuthenticationError extends APIError {
  constructor(message: string, details: APIErrorDetails) {
    super(message, details);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class AuthorizationError extends APIError {
  constructor(message: string, details: APIErrorDetails) {
    super(message, details);
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

export class NotFoundError extends APIError {
  constructor(message: string, details: APIErrorDetails) {
    super(message, details);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConflictError extends APIError {
  /** Present when the body describes the conflicting resource */
  public readonly conflict?: APIErrorResponse;

  constructor(message: string, details: APIErrorDetails, conflict?: APIErrorResponse) {
    super(message, details);
    this.name = 'ConflictError';
    this.conflict = conflict;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class RateLimitError extends APIError {
  public readonly retryAfter?: number;

  constructor(message: string, details: APIErrorDetails, retryAfter?: number) {
    super(message, details);
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export class ServerError extends APIError {
  constructor(message: string, details: APIErrorDetails) {
    super(message, details);
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}
