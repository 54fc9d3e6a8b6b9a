import { createAuditLogger } from '@control-plane/logger';
import { Module } from '@nestjs/common';
import { type AppConfig, appConfig } from '../config';
import { AuditController } from './audit.controller';
import { AuditEventStore } from './audit-event.store';
import { AuditSink } from './audit.sink';

@Module({
  controllers: [AuditController],
  providers: [
    {
      provide: AuditSink,
      useFactory: (config: AppConfig) =>
        new AuditSink(new AuditEventStore(config.auditBufferCapacity), createAuditLogger()),
      inject: [appConfig.KEY],
    },
  ],
  exports: [AuditSink],
})
export class AuditModule {}
