import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

/**
 * Line format of the audit stream: one JSON object per event carrying
 * `level`, the event's own `timestamp`, any flattened fields and `message`.
 * The timestamp comes from the event, so pino's clock is switched off.
 */
export const auditLoggerOptions: LoggerOptions = {
  level: 'info',
  base: undefined,
  timestamp: false,
  messageKey: 'message',
  formatters: {
    level: (label) => ({ level: label.toUpperCase() }),
  },
};

export function createAuditLogger(
  destination: DestinationStream = pino.destination({ dest: 1, sync: true }),
): Logger {
  return pino(auditLoggerOptions, destination);
}
