import assert from 'node:assert';
import type { AuditEvent } from './audit-event';

export const DEFAULT_AUDIT_CAPACITY = 1000;

/**
 * Fixed-capacity ring buffer. Appending past capacity evicts the oldest event.
 */
export class AuditEventStore {
  private readonly buffer: Array<AuditEvent | undefined>;
  private next = 0;
  private count = 0;

  public constructor(public readonly capacity = DEFAULT_AUDIT_CAPACITY) {
    assert.ok(
      Number.isInteger(capacity) && capacity > 0,
      `Audit capacity must be a positive integer, got ${capacity}`,
    );
    this.buffer = new Array<AuditEvent | undefined>(capacity);
  }

  public get size(): number {
    return this.count;
  }

  public append(event: AuditEvent): void {
    this.buffer[this.next] = event;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /** Most recent first. */
  public list(limit: number): readonly AuditEvent[] {
    const take = Math.min(Math.max(Math.trunc(limit), 0), this.count);
    const events: AuditEvent[] = [];
    for (let offset = 1; offset <= take; offset++) {
      const event = this.buffer[(this.next - offset + this.capacity) % this.capacity];
      if (event) {
        events.push(event);
      }
    }
    return Object.freeze(events);
  }
}
