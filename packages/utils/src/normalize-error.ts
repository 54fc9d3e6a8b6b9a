import { serializeError } from 'serialize-error-cjs';

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === 'string') {
    return new Error(error);
  }

  if (error === null || error === undefined) {
    return new Error(String(error));
  }

  if (typeof error === 'object') {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      // circular structures cannot be stringified
      return new Error(Object.prototype.toString.call(error));
    }
  }

  return new Error(String(error));
}

/**
 * Turns anything thrown into a plain, JSON-safe object for structured logs.
 */
export function sanitizeError(error: unknown): ReturnType<typeof serializeError> {
  return serializeError(normalizeError(error));
}
