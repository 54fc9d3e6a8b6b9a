import { inspect } from 'node:util';

const REDACTED = '[Redacted]';

/**
 * Holds a sensitive value (client secret, inline secret reference, private key
 * password) so that it cannot leak through string interpolation, JSON
 * serialization or `util.inspect` (which is what pino-pretty and console use).
 * Read the raw value explicitly through `.value` at the point of use.
 */
export class Redacted<T> {
  public constructor(public readonly value: T) {}

  public toString(): string {
    return REDACTED;
  }

  public toJSON(): string {
    return REDACTED;
  }

  public [inspect.custom](): string {
    return REDACTED;
  }
}
