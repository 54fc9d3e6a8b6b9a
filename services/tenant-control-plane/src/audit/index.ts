export {
  type AuditBindings,
  type AuditEvent,
  type AuditFields,
  AuditLevel,
  createAuditEvent,
  describeError,
} from './audit-event';
export { AuditEventStore } from './audit-event.store';
export { AuditModule } from './audit.module';
export { AuditSink } from './audit.sink';
