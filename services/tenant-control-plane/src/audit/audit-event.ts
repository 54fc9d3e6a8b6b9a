import { normalizeError } from '@control-plane/utils';

export const AuditLevel = {
  INFO: 'INFO',
  WARN: 'WARN',
  ERROR: 'ERROR',
} as const;

export type AuditLevel = (typeof AuditLevel)[keyof typeof AuditLevel];

export type AuditFields = Readonly<Record<string, unknown>>;

export interface AuditEvent {
  readonly timestamp: string;
  readonly level: AuditLevel;
  readonly message: string;
  readonly tenantId?: string;
  readonly correlationId?: string;
  readonly fields: AuditFields;
}

export interface AuditBindings {
  readonly tenantId?: string;
  readonly correlationId?: string;
}

const RESERVED_KEYS: ReadonlySet<string> = new Set([
  'timestamp',
  'level',
  'message',
  'tenantId',
  'correlationId',
]);

export function createAuditEvent(input: {
  level: AuditLevel;
  message: string;
  tenantId?: string;
  correlationId?: string;
  fields?: Record<string, unknown>;
  timestamp?: Date;
}): AuditEvent {
  const fields = Object.fromEntries(
    Object.entries(input.fields ?? {}).filter(([key]) => !RESERVED_KEYS.has(key)),
  );

  return Object.freeze({
    timestamp: (input.timestamp ?? new Date()).toISOString(),
    level: input.level,
    message: input.message,
    ...(input.tenantId !== undefined ? { tenantId: input.tenantId } : {}),
    ...(input.correlationId !== undefined ? { correlationId: input.correlationId } : {}),
    fields: Object.freeze(fields),
  });
}

/** Name and message only; stacks stay out of the audit trail. */
export function describeError(error: unknown): { name: string; message: string } {
  const { name, message } = normalizeError(error);
  return { name, message };
}
