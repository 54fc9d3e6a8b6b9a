import type { Logger } from 'pino';
import {
  type AuditBindings,
  type AuditEvent,
  type AuditFields,
  AuditLevel,
  createAuditEvent,
} from './audit-event';
import type { AuditEventStore } from './audit-event.store';

const LOGGER_METHOD = {
  [AuditLevel.INFO]: 'info',
  [AuditLevel.WARN]: 'warn',
  [AuditLevel.ERROR]: 'error',
} as const satisfies Record<AuditLevel, 'info' | 'warn' | 'error'>;

/**
 * Records structured audit events into the in-memory ring buffer and emits
 * each one as a JSON line on the audit logger. Children share both and stamp
 * their tenant and correlation ids on everything they record.
 */
export class AuditSink {
  public constructor(
    private readonly store: AuditEventStore,
    private readonly logger: Logger,
    private readonly bindings: AuditBindings = {},
  ) {}

  public child(bindings: AuditBindings): AuditSink {
    return new AuditSink(this.store, this.logger, { ...this.bindings, ...bindings });
  }

  public info(message: string, fields: AuditFields = {}): AuditEvent {
    return this.emit(AuditLevel.INFO, message, fields);
  }

  public warn(message: string, fields: AuditFields = {}): AuditEvent {
    return this.emit(AuditLevel.WARN, message, fields);
  }

  public error(message: string, fields: AuditFields = {}): AuditEvent {
    return this.emit(AuditLevel.ERROR, message, fields);
  }

  public record(event: AuditEvent): void {
    const stamped = this.stamp(event);
    this.store.append(stamped);

    const { timestamp, level, message, tenantId, correlationId, fields } = stamped;
    this.logger[LOGGER_METHOD[level]](
      {
        timestamp,
        ...(tenantId !== undefined ? { tenantId } : {}),
        ...(correlationId !== undefined ? { correlationId } : {}),
        ...fields,
      },
      message,
    );
  }

  public list(limit: number): readonly AuditEvent[] {
    return this.store.list(limit);
  }

  private emit(level: AuditLevel, message: string, fields: AuditFields): AuditEvent {
    const event = createAuditEvent({
      level,
      message,
      tenantId: typeof fields.tenantId === 'string' ? fields.tenantId : this.bindings.tenantId,
      correlationId:
        typeof fields.correlationId === 'string'
          ? fields.correlationId
          : this.bindings.correlationId,
      fields,
    });
    this.record(event);
    return event;
  }

  private stamp(event: AuditEvent): AuditEvent {
    const tenantId = event.tenantId ?? this.bindings.tenantId;
    const correlationId = event.correlationId ?? this.bindings.correlationId;
    if (tenantId === event.tenantId && correlationId === event.correlationId) {
      return event;
    }
    return createAuditEvent({
      ...event,
      tenantId,
      correlationId,
      fields: { ...event.fields },
      timestamp: new Date(event.timestamp),
    });
  }
}
