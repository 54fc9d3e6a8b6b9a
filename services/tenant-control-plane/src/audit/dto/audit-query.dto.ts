import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { DEFAULT_AUDIT_QUERY_LIMIT, MAX_AUDIT_QUERY_LIMIT } from '../audit.constants';

const AuditQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_AUDIT_QUERY_LIMIT)
    .prefault(DEFAULT_AUDIT_QUERY_LIMIT)
    .describe('Maximum number of events to return, most recent first'),
});

export class AuditQueryDto extends createZodDto(AuditQuerySchema) {}
