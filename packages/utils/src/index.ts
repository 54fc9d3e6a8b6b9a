export { normalizeError, sanitizeError } from './normalize-error';
export { Redacted } from './redacted';
