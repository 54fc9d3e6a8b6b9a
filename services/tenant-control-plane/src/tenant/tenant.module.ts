import { Module } from '@nestjs/common';
import { AuditModule } from '../audit';
import { AuthModule } from '../auth/auth.module';
import { GraphModule } from '../graph';
import { TenantController } from './tenant.controller';
import { TenantOrchestrator } from './tenant-orchestrator';
import { TenantRegistry } from './tenant-registry';

@Module({
  imports: [AuditModule, AuthModule, GraphModule],
  controllers: [TenantController],
  providers: [TenantRegistry, TenantOrchestrator],
  exports: [TenantRegistry, TenantOrchestrator],
})
export class TenantModule {}
