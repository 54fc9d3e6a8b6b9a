import { Controller, Get, Query } from '@nestjs/common';
import type { AuditEvent } from './audit-event';
import { AuditSink } from './audit.sink';
import { AuditQueryDto } from './dto/audit-query.dto';

@Controller('audit')
export class AuditController {
  public constructor(private readonly auditSink: AuditSink) {}

  @Get()
  public listEvents(@Query() query: AuditQueryDto): {
    events: readonly AuditEvent[];
    count: number;
  } {
    const events = this.auditSink.list(query.limit);
    return { events, count: events.length };
  }
}
