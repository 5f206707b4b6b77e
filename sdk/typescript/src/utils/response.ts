/**
 * Translation of failed HTTP responses into SDK errors
 */

import type {APIErrorResponse, ErrorContext} from '../types';
import {
    APIError,
    APIErrorDetails,
    AuthenticationError,
    AuthorizationError,
    ConflictError,
    NotFoundError,
    RateLimitError,
    ServerError,
    ValidationError,
} from '../errors';
import {isRecord} from './json';

export function isJsonResponse(response: Response): boolean {
  const contentType = response.headers.get('Content-Type') ?? '';
  return contentType.split(';')[0].trim().toLowerCase() === 'application/json';
}

/**
 * Reads the conflicting resource out of a 409 error payload.
 */
export function parseConflict(errorJson: Record<string, unknown> | undefined): APIErrorResponse | undefined {
  if (!errorJson) {
    return undefined;
  }
  const {error, id, identical} = errorJson;
  if (typeof id !== 'string' || typeof identical !== 'boolean') {
    return undefined;
  }
  return {
    error: typeof error === 'string' ? error : '',
    id,
    identical,
  };
}

/**
 * Build the error for a response with status >= 400. Consumes the body.
 */
export async function errorFromResponse(
  response: Response,
  context: ErrorContext
): Promise<APIError> {
  const text = await response.text();
  let message = `HTTP ${response.status} - ${text}`;
  let requestId = response.headers.get('X-Request-Id') ?? undefined;
  let errorJson: Record<string, unknown> | undefined;

  if (isJsonResponse(response)) {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      body = undefined;
    }

    if (isRecord(body)) {
      const {error} = body;
      if (typeof error === 'string') {
        message = error;
      } else if (isRecord(error)) {
        errorJson = error;
        message = typeof error.error === 'string' ? error.error : JSON.stringify(error);
      }
      if (typeof body.request_id === 'string') {
        requestId = body.request_id;
      }
    }
  }

  const details: APIErrorDetails = {
    status: response.status,
    requestId,
    errorJson,
    context,
  };

  switch (response.status) {
    case 400:
    case 422:
      return new ValidationError(message, details);

    case 401:
      return new AuthenticationError(message, details);

    case 403:
      return new AuthorizationError(message, details);

    case 404:
      return new NotFoundError(message, details);

    case 409:
      return new ConflictError(message, details, parseConflict(errorJson));

    case 429: {
      const retryAfter = response.headers.get('Retry-After');
      return new RateLimitError(
        message,
        details,
        retryAfter ? parseInt(retryAfter, 10) : undefined
      );
    }

    default:
      if (response.status >= 500) {
        return new ServerError(message, details);
      }
      return new APIError(message, details);
  }
}
