/**
 * Helpers for RemoteStepService implementations that talk HTTP.
 *
 * Maps response status codes onto remote failure categories and pulls
 * field-level messages out of common error body shapes.
 *
 * @module errors/http-mapping
 */

import type { FieldError, RemoteFailure, RemoteFailureCategory } from './types.js';

/**
 * Map an HTTP status to a remote failure category.
 *
 * An undefined status means no response was received at all.
 */
export function categoryFromHttpStatus(status?: number): RemoteFailureCategory {
  if (status === undefined) return 'NetworkError';
  if (status === 400 || status === 422) return 'Validation';
  if (status === 401) return 'Unauthorized';
  if (status === 403) return 'Forbidden';
  if (status === 404) return 'NotFound';
  if (status === 408) return 'Timeout';
  if (status === 409) return 'Conflict';
  return 'ServerError';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract field errors from an error response body.
 *
 * Understands three shapes:
 * - `{ errors: { field: ["message", ...] | "message" } }`
 * - `{ errors: ["message", ...] }` (reported under the field `_`)
 * - `{ title: "message" }` (reported under the field `_`)
 */
export function extractFieldErrors(body: unknown): FieldError[] {
  if (!isRecord(body)) return [];

  const errors = body.errors;

  if (isRecord(errors)) {
    const result: FieldError[] = [];
    for (const [field, messages] of Object.entries(errors)) {
      if (Array.isArray(messages)) {
        for (const message of messages) {
          result.push({ field, message: String(message) });
        }
      } else {
        result.push({ field, message: String(messages) });
      }
    }
    return result;
  }

  if (Array.isArray(errors)) {
    return errors.map((message) => ({ field: '_', message: String(message) }));
  }

  if (typeof body.title === 'string' && body.title) {
    return [{ field: '_', message: body.title }];
  }

  return [];
}

/**
 * Build a failed RemoteResult from an HTTP response.
 */
export function failureFromHttpResponse(
  status: number | undefined,
  body: unknown,
  message: string,
): RemoteFailure {
  const fieldErrors = extractFieldErrors(body);
  return {
    success: false,
    category: categoryFromHttpStatus(status),
    message,
    ...(fieldErrors.length > 0 ? { fieldErrors } : {}),
  };
}
