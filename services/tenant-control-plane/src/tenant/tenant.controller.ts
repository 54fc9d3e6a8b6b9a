import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Put,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodValidationPipe } from 'nestjs-zod';
import { type TenantConfig, TenantConfigSchema } from '../config';
import { CORRELATION_ID_HEADER, resolveCorrelationId } from './correlation-id';
import { CreateGroupDto, ListUsersDto } from './dto/operation.dtos';
import { type TenantSummary, toTenantSummary } from './dto/tenant-summary.dto';
import type { GraphGroup, GraphUser } from './tenant-operations';
import { TenantOrchestrator } from './tenant-orchestrator';
import { TenantRegistry } from './tenant-registry';

interface OperationResult<T> {
  correlationId: string;
  result: T;
}

@Controller('tenants')
export class TenantController {
  public constructor(
    private readonly registry: TenantRegistry,
    private readonly orchestrator: TenantOrchestrator,
  ) {}

  @Get()
  public listTenants(): TenantSummary[] {
    return this.registry.listTenants().map(toTenantSummary);
  }

  @Put(':tenantId')
  public onboardTenant(
    @Param('tenantId') tenantId: string,
    @Body(new ZodValidationPipe(TenantConfigSchema)) tenant: TenantConfig,
  ): TenantSummary {
    if (tenant.tenantId !== tenantId) {
      throw new BadRequestException(
        `Path tenant id ${tenantId} does not match body tenant id ${tenant.tenantId}`,
      );
    }
    this.registry.onboard(tenant);
    return toTenantSummary(tenant);
  }

  @Delete(':tenantId')
  @HttpCode(HttpStatus.NO_CONTENT)
  public offboardTenant(@Param('tenantId') tenantId: string): void {
    this.registry.offboard(tenantId);
  }

  @Post(':tenantId/users/list')
  @HttpCode(HttpStatus.OK)
  public async listUsers(
    @Param('tenantId') tenantId: string,
    @Body() body: ListUsersDto,
    @Headers(CORRELATION_ID_HEADER) correlationHeader: string | undefined,
    @Res({ passthrough: true }) response: Response,
  ): Promise<OperationResult<GraphUser[]>> {
    const correlationId = this.bindCorrelationId(correlationHeader, response);
    const result = await this.orchestrator.runOperation(
      tenantId,
      (operations) => operations.listUsers(body.top),
      correlationId,
    );
    return { correlationId, result };
  }

  @Post(':tenantId/groups')
  public async createGroup(
    @Param('tenantId') tenantId: string,
    @Body() body: CreateGroupDto,
    @Headers(CORRELATION_ID_HEADER) correlationHeader: string | undefined,
    @Res({ passthrough: true }) response: Response,
  ): Promise<OperationResult<GraphGroup>> {
    const correlationId = this.bindCorrelationId(correlationHeader, response);
    const result = await this.orchestrator.runOperation(
      tenantId,
      (operations) => operations.createGroup(body.displayName, body.description),
      correlationId,
    );
    return { correlationId, result };
  }

  private bindCorrelationId(header: string | undefined, response: Response): string {
    const correlationId = resolveCorrelationId(header);
    response.setHeader(CORRELATION_ID_HEADER, correlationId);
    return correlationId;
  }
}
