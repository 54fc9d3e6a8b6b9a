import { randomUUID } from 'node:crypto';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

const MAX_CORRELATION_ID_LENGTH = 128;

/** Uses the caller's id when it is a sane header value, otherwise a fresh UUID. */
export function resolveCorrelationId(header: string | string[] | undefined): string {
  const candidate = (Array.isArray(header) ? header[0] : header)?.trim();
  if (candidate && candidate.length <= MAX_CORRELATION_ID_LENGTH) {
    return candidate;
  }
  return randomUUID();
}
